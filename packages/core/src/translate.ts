/**
 * Question-to-SQL translation with a bounded correction loop.
 *
 * Each attempt is one completion call. A response that cannot be used
 * (bad JSON, unparsable SQL, several statements) earns a correction
 * follow-up, at most `maxRetries` times. Unsafe statements and schema
 * mismatches end the loop at once; so does a failing completion call.
 * The data-modifying keyword scan sees the raw response, so a malformed
 * reply that still carries DROP TABLE is refused, not retried.
 */

import type { SchemaSnapshot } from './db/types.js';
import type { CompletionProvider, ChatMessage } from './llm/types.js';
import type { ConversationTurn } from './llm/prompt.js';
import { buildCorrectionMessages, buildTranslationPrompt } from './llm/prompt.js';
import { buildSchemaContext } from './llm/schema.js';
import { parsePlan } from './llm/plan.js';
import { SqlValidator, type CandidateValidator } from './policy/engine.js';
import { findForbiddenKeyword } from './policy/rules.js';
import { createCandidate, type ValidatedCandidate } from './policy/types.js';
import { CancelledError, SqlParseError, TranslationError, UnsafeStatementError } from './errors.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { translateLogger } from './util/logger.js';

export interface TranslationRequest {
  question: string;
  schema: SchemaSnapshot;
  /** Prior turns, most recent last */
  history?: readonly ConversationTurn[];
  signal?: AbortSignal;
}

export interface TranslatorOptions {
  maxRetries?: number;
  historyTurns?: number;
  schemaTokenBudget?: number;
  validator?: CandidateValidator;
  /** Max tokens per completion */
  maxTokens?: number;
}

export class Translator {
  private readonly maxRetries: number;
  private readonly historyTurns: number;
  private readonly schemaTokenBudget: number;
  private readonly validator: CandidateValidator;
  private readonly maxTokens: number;

  constructor(
    private readonly provider: CompletionProvider,
    opts: TranslatorOptions = {},
  ) {
    this.maxRetries = Math.max(0, opts.maxRetries ?? SAFE_DEFAULTS.maxRetries);
    this.historyTurns = Math.max(0, opts.historyTurns ?? SAFE_DEFAULTS.historyTurns);
    this.schemaTokenBudget = opts.schemaTokenBudget ?? SAFE_DEFAULTS.schemaTokenBudget;
    this.validator = opts.validator ?? new SqlValidator();
    this.maxTokens = opts.maxTokens ?? 1024;
  }

  /**
   * @throws TranslationError when no usable statement came back within the attempt budget
   * @throws UnsafeStatementError, SchemaMismatchError from validation, without retry
   */
  async translate(req: TranslationRequest): Promise<ValidatedCandidate> {
    const question = req.question.trim();
    if (!question) {
      throw new TranslationError(0, 'Question is empty.');
    }

    const schemaContext = buildSchemaContext(question, req.schema, { tokenBudget: this.schemaTokenBudget });
    const history = this.historyTurns > 0 ? (req.history ?? []).slice(-this.historyTurns) : [];
    const prompt = buildTranslationPrompt({ question, schemaContext: schemaContext.text, history });

    translateLogger.debug('translation prompt built', {
      tables: schemaContext.includedTables,
      omittedTables: schemaContext.omittedTables,
      schemaTokens: schemaContext.estimatedTokens,
      historyTurns: history.length,
    });

    const maxAttempts = 1 + this.maxRetries;
    let messages: ChatMessage[] = prompt.messages;
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (req.signal?.aborted) throw new CancelledError();

      let text: string;
      let model: string;
      try {
        const completion = await this.provider.complete({
          system: prompt.system,
          messages,
          maxTokens: this.maxTokens,
          signal: req.signal,
        });
        text = completion.text;
        model = completion.model;
      } catch (err: unknown) {
        if (req.signal?.aborted) throw new CancelledError();
        const reason = `Completion service failed: ${err instanceof Error ? err.message : String(err)}`;
        translateLogger.warn('completion call failed', { attempt, error: reason });
        throw new TranslationError(attempt, reason, { cause: err });
      }

      const keyword = findForbiddenKeyword(text);
      if (keyword) {
        translateLogger.info('translation refused', { attempt, error: keyword.reason });
        throw new UnsafeStatementError(keyword.offending, keyword.reason);
      }

      const planned = parsePlan(text);
      if (!planned.ok) {
        lastReason = planned.error;
        translateLogger.info('response rejected', { attempt, reason: lastReason });
        messages = buildCorrectionMessages(messages, text, lastReason);
        continue;
      }

      const candidate = createCandidate(planned.plan.sql, 'model', {
        model,
        attempts: attempt,
        assumptions: planned.plan.assumptions,
        confidence: planned.plan.confidence,
      });

      try {
        const validated = this.validator.validate(candidate, req.schema);
        translateLogger.info('translation validated', {
          attempt,
          tables: validated.tables,
          warnings: validated.warnings,
        });
        return validated;
      } catch (err: unknown) {
        if (!(err instanceof SqlParseError)) {
          translateLogger.info('translation refused', {
            attempt,
            error: err instanceof Error ? err.message : String(err),
          });
          throw err;
        }
        lastReason = err.message;
        translateLogger.info('response rejected', { attempt, reason: lastReason });
        messages = buildCorrectionMessages(messages, text, lastReason);
      }
    }

    throw new TranslationError(maxAttempts, lastReason);
  }
}

/** One-off translation without keeping a Translator around. */
export function translate(
  provider: CompletionProvider,
  req: TranslationRequest,
  opts?: TranslatorOptions,
): Promise<ValidatedCandidate> {
  return new Translator(provider, opts).translate(req);
}
