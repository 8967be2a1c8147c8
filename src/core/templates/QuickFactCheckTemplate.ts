import { PromptDescriptor } from '../entities/Descriptors.js';
import { requireArgument, userMessage } from './arguments.js';
import { PromptTemplate, RenderedPrompt } from './types.js';

export class QuickFactCheckTemplate implements PromptTemplate {
  readonly name = 'quick_fact_check';

  describe(): PromptDescriptor {
    return {
      name: this.name,
      description: 'Quickly verify a fact or claim',
      arguments: [{ name: 'claim', description: 'The claim or fact to verify', required: true }],
    };
  }

  render(args: Record<string, string>): RenderedPrompt {
    const claim = requireArgument(args, 'claim', this.name);
    return {
      description: `Verify the claim: ${claim}`,
      messages: [
        userMessage(
          `Is this claim accurate: ${claim}? Please verify with current information and sources.`
        ),
      ],
    };
  }
}
