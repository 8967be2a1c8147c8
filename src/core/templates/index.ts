/**
 * Prompt templates advertised through prompts/list
 */
export type { PromptTemplate, PromptMessage, RenderedPrompt, TemplateName } from './types.js';
export { ResearchTopicTemplate } from './ResearchTopicTemplate.js';
export { QuickFactCheckTemplate } from './QuickFactCheckTemplate.js';
export { ExplainConceptTemplate, EXPLANATION_LEVELS } from './ExplainConceptTemplate.js';
export type { ExplanationLevel } from './ExplainConceptTemplate.js';
export { TemplateFactory } from './TemplateFactory.js';
