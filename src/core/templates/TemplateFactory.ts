import { PromptDescriptor } from '../entities/Descriptors.js';
import { NotFoundError } from '../errors.js';
import { ExplainConceptTemplate } from './ExplainConceptTemplate.js';
import { QuickFactCheckTemplate } from './QuickFactCheckTemplate.js';
import { ResearchTopicTemplate } from './ResearchTopicTemplate.js';
import { PromptTemplate } from './types.js';

/**
 * Registry of prompt templates
 */
export class TemplateFactory {
  private static templates: ReadonlyMap<string, PromptTemplate> = new Map<string, PromptTemplate>(
    [new ResearchTopicTemplate(), new QuickFactCheckTemplate(), new ExplainConceptTemplate()].map(
      (template): [string, PromptTemplate] => [template.name, template]
    )
  );

  /**
   * Get a template by name
   */
  static getTemplate(name: string): PromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new NotFoundError(`Unknown prompt: ${name}`, { prompt: name });
    }
    return template;
  }

  static describeAll(): PromptDescriptor[] {
    return [...this.templates.values()].map((template) => template.describe());
  }
}
