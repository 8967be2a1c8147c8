import { PromptDescriptor } from '../entities/Descriptors.js';

/**
 * Text content of a rendered prompt message
 */
export type PromptMessage = {
  role: 'user';
  content: { type: 'text'; text: string };
};

export type RenderedPrompt = {
  description: string;
  messages: PromptMessage[];
};

/**
 * Prompt template names
 */
export type TemplateName = 'research_topic' | 'quick_fact_check' | 'explain_concept';

/**
 * A named prompt template with placeholder arguments
 */
export interface PromptTemplate {
  readonly name: TemplateName;

  /**
   * Static descriptor advertised by prompts/list
   */
  describe(): PromptDescriptor;

  /**
   * Substitute arguments into the template.
   * Throws ValidationError when a required argument is missing or invalid.
   */
  render(args: Record<string, string>): RenderedPrompt;
}
