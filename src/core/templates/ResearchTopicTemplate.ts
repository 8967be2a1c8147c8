import { PromptDescriptor } from '../entities/Descriptors.js';
import { requireArgument, userMessage } from './arguments.js';
import { PromptTemplate, RenderedPrompt } from './types.js';

export class ResearchTopicTemplate implements PromptTemplate {
  readonly name = 'research_topic';

  describe(): PromptDescriptor {
    return {
      name: this.name,
      description: 'Research a topic with detailed information and citations',
      arguments: [{ name: 'topic', description: 'The topic to research', required: true }],
    };
  }

  render(args: Record<string, string>): RenderedPrompt {
    const topic = requireArgument(args, 'topic', this.name);
    return {
      description: `Research information about ${topic}`,
      messages: [
        userMessage(
          `Please provide detailed research about ${topic}. Include key facts, recent developments, and reliable sources.`
        ),
      ],
    };
  }
}
