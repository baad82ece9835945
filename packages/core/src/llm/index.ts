/**
 * LLM module barrel export.
 */

export type {
  ChatMessage,
  ChatRole,
  CompletionProvider,
  CompletionRequest,
  CompletionResult,
  SqlPlan,
} from './types.js';
export { OpenAIProvider } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
export { buildSchemaContext, estimateTokens } from './schema.js';
export type { SchemaContext, SchemaContextOpts } from './schema.js';
export { buildTranslationPrompt, buildCorrectionMessages, TRANSLATION_SYSTEM_PROMPT } from './prompt.js';
export type { ConversationTurn, PromptInput, TranslationPrompt } from './prompt.js';
export { parsePlan, extractJson } from './plan.js';
export type { PlanParse } from './plan.js';
export { sqlPlanSchema } from './schema_json.js';
