/**
 * Parsing of model output into a SqlPlan.
 *
 * The model is asked for a JSON object. A response without any JSON
 * object is taken as bare SQL (optionally fenced), so the validator still
 * sees statements the model returned in the wrong format.
 */

import { Ajv } from 'ajv';
import type { SqlPlan } from './types.js';
import { sqlPlanSchema } from './schema_json.js';

export type PlanParse = { ok: true; plan: SqlPlan } | { ok: false; error: string };

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validatePlan = ajv.compile<SqlPlan>(sqlPlanSchema);

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch && fenceMatch[1].trim().startsWith('{')) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}

function stripSqlFence(text: string): string {
  const fenceMatch = text.match(/```(?:sql|postgresql|pgsql)?\s*\n?([\s\S]*?)```/i);
  return (fenceMatch ? fenceMatch[1] : text).trim();
}

export function parsePlan(raw: string): PlanParse {
  const jsonStr = extractJson(raw);

  if (!jsonStr.startsWith('{')) {
    const sql = stripSqlFence(raw);
    if (!sql) return { ok: false, error: 'Empty response' };
    return { ok: true, plan: { sql, assumptions: [] } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    return { ok: false, error: `Invalid JSON: ${jsonStr.slice(0, 100)}${jsonStr.length > 100 ? '...' : ''}` };
  }

  if (validatePlan(parsed)) {
    return { ok: true, plan: { sql: parsed.sql.trim(), assumptions: parsed.assumptions, confidence: parsed.confidence } };
  }

  const errors = (validatePlan.errors ?? [])
    .map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    .join('; ');
  return { ok: false, error: errors || 'Unknown validation error' };
}
