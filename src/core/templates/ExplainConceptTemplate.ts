import { PromptDescriptor } from '../entities/Descriptors.js';
import { ValidationError } from '../errors.js';
import { requireArgument, userMessage } from './arguments.js';
import { PromptTemplate, RenderedPrompt } from './types.js';

export const EXPLANATION_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;

export type ExplanationLevel = (typeof EXPLANATION_LEVELS)[number];

function isExplanationLevel(value: string): value is ExplanationLevel {
  return EXPLANATION_LEVELS.some((level) => level === value);
}

/**
 * Concept explanation at a chosen depth (default: intermediate)
 */
export class ExplainConceptTemplate implements PromptTemplate {
  readonly name = 'explain_concept';

  describe(): PromptDescriptor {
    return {
      name: this.name,
      description: 'Get a detailed explanation of a concept',
      arguments: [
        { name: 'concept', description: 'The concept to explain', required: true },
        {
          name: 'level',
          description: `Explanation level (${EXPLANATION_LEVELS.join(', ')})`,
          required: false,
        },
      ],
    };
  }

  render(args: Record<string, string>): RenderedPrompt {
    const concept = requireArgument(args, 'concept', this.name);
    const level = (args.level ?? '').trim().toLowerCase() || 'intermediate';

    if (!isExplanationLevel(level)) {
      throw new ValidationError(
        `Invalid level "${args.level}" for prompt ${this.name}: must be one of ${EXPLANATION_LEVELS.join(', ')}`,
        { prompt: this.name, field: 'level' }
      );
    }

    return {
      description: `Explain ${concept} at ${level} level`,
      messages: [
        userMessage(
          `Please explain ${concept} at a ${level} level. Include examples and practical applications.`
        ),
      ],
    };
  }
}
