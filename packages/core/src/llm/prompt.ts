/**
 * Prompt construction for question-to-SQL translation.
 */

import type { ChatMessage } from './types.js';

export interface ConversationTurn {
  question: string;
  sql: string;
}

export interface PromptInput {
  question: string;
  schemaContext: string;
  /** Prior turns, most recent last. Already trimmed to the window. */
  history: readonly ConversationTurn[];
}

export interface TranslationPrompt {
  system: string;
  messages: ChatMessage[];
}

const JSON_FORMAT_INSTRUCTIONS = `You must respond with ONLY a JSON object matching this exact schema:
{
  "sql": "<single PostgreSQL SELECT statement>",
  "assumptions": ["<assumption 1>", ...],
  "confidence": <0.0 to 1.0>
}

Rules:
- Do NOT wrap in markdown code fences.
- Do NOT include any text before or after the JSON.`;

export const TRANSLATION_SYSTEM_PROMPT = `You translate questions about a PostgreSQL database into SQL for charting.

CONSTRAINTS:
- Generate a SINGLE SQL statement only. Never multiple statements.
- You MUST generate only SELECT statements or CTE (WITH ... SELECT) statements. No INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE or other DDL.
- Reference only tables and columns present in the provided schema. Double-quote identifiers that contain capital letters.
- Match names of things mentioned in the question (rooms, places, products) case-insensitively with ILIKE '%name%' rather than exact equality.
- Return columns in chart-friendly shape: a time bucket or category first, then numeric measures. Give computed columns short aliases.
- Aggregate (AVG, SUM, COUNT, MAX, MIN) when the question asks for totals, averages, peaks or rankings.
- Include a LIMIT clause (one is injected if missing).

${JSON_FORMAT_INSTRUCTIONS}`;

export function buildTranslationPrompt(input: PromptInput): TranslationPrompt {
  const messages: ChatMessage[] = [];

  for (const turn of input.history) {
    messages.push({ role: 'user', content: `Question: ${turn.question}` });
    messages.push({ role: 'assistant', content: JSON.stringify({ sql: turn.sql, assumptions: [] }) });
  }

  messages.push({
    role: 'user',
    content: `${input.schemaContext}

Question: ${input.question}

Generate the SQL query as a JSON object.`,
  });

  return { system: TRANSLATION_SYSTEM_PROMPT, messages };
}

/**
 * Follow-up prompt after a response that could not be used.
 */
export function buildCorrectionMessages(
  previous: readonly ChatMessage[],
  rawAssistantOutput: string,
  reason: string,
): ChatMessage[] {
  return [
    ...previous,
    { role: 'assistant', content: rawAssistantOutput },
    {
      role: 'user',
      content: `Your previous response was invalid. Errors:\n${reason}\n\nPlease return ONLY a corrected JSON object with a single valid PostgreSQL SELECT statement. No explanation, no markdown fences.`,
    },
  ];
}
