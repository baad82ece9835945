/**
 * Completion service seam. The pipeline only needs text in, text out;
 * tests stub this interface with fixed responses.
 */

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  model: string;
}

export interface CompletionProvider {
  readonly name: string;
  complete(req: CompletionRequest): Promise<CompletionResult>;
}

/** Plan returned by the model for a question. */
export interface SqlPlan {
  sql: string;
  assumptions: string[];
  confidence?: number;
}
