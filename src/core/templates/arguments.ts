import { ValidationError } from '../errors.js';

export function requireArgument(
  args: Record<string, string>,
  name: string,
  prompt: string
): string {
  const value = args[name];
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(`Missing required argument "${name}" for prompt ${prompt}`, {
      prompt,
      field: name,
    });
  }
  return value;
}

export function userMessage(text: string) {
  return { role: 'user' as const, content: { type: 'text' as const, text } };
}
