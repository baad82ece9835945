import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parsePlan } from '../plan.js';
import { buildSchemaContext, estimateTokens } from '../schema.js';
import { buildCorrectionMessages, buildTranslationPrompt, TRANSLATION_SYSTEM_PROMPT } from '../prompt.js';
import { SCHEMA } from '../../__tests__/helpers.js';

describe('parsePlan', () => {
  it('parses a JSON plan', () => {
    const result = parsePlan('{"sql":"SELECT id FROM rooms","assumptions":["rooms are named"],"confidence":0.8}');
    assert.deepEqual(result, {
      ok: true,
      plan: { sql: 'SELECT id FROM rooms', assumptions: ['rooms are named'], confidence: 0.8 },
    });
  });

  it('unwraps a fenced JSON plan', () => {
    const result = parsePlan('```json\n{"sql":"SELECT 1","assumptions":[]}\n```');
    assert.deepEqual(result, { ok: true, plan: { sql: 'SELECT 1', assumptions: [], confidence: undefined } });
  });

  it('defaults missing assumptions', () => {
    const result = parsePlan('{"sql":"SELECT 2"}');
    assert.equal(result.ok, true);
    if (result.ok) assert.deepEqual(result.plan.assumptions, []);
  });

  it('accepts bare fenced SQL', () => {
    assert.deepEqual(parsePlan('```sql\nSELECT 3\n```'), { ok: true, plan: { sql: 'SELECT 3', assumptions: [] } });
  });

  it('reports broken JSON', () => {
    const result = parsePlan('{"sql": "SELECT 1",');
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error, 'Invalid JSON: {"sql": "SELECT 1",');
  });

  it('reports schema violations', () => {
    assert.deepEqual(parsePlan('{"assumptions": []}'), {
      ok: false,
      error: "/: must have required property 'sql'",
    });
  });

  it('reports an empty response', () => {
    assert.deepEqual(parsePlan('   '), { ok: false, error: 'Empty response' });
  });
});

describe('buildSchemaContext', () => {
  it('ranks tables by overlap with the question', () => {
    const ctx = buildSchemaContext('average value per room', SCHEMA);
    assert.deepEqual(ctx.includedTables, ['sensor_readings', 'rooms']);
    assert.equal(ctx.omittedTables, 0);
    assert.equal(
      ctx.text,
      [
        '-- Database schema (PostgreSQL)',
        [
          'TABLE sensor_readings',
          '  id integer NOT NULL PK',
          '  value numeric NULL',
          '  room_id integer NOT NULL',
          '  metric_name text NOT NULL',
          '  start_time timestamp without time zone NOT NULL',
          '  -- ~52000 rows',
        ].join('\n'),
        ['TABLE rooms', '  id integer NOT NULL PK', '  name text NOT NULL'].join('\n'),
      ].join('\n\n'),
    );
    assert.equal(ctx.estimatedTokens, estimateTokens(ctx.text));
  });

  it('keeps the top table and omits the rest past the budget', () => {
    const ctx = buildSchemaContext('average value per room', SCHEMA, { tokenBudget: 20 });
    assert.deepEqual(ctx.includedTables, ['sensor_readings']);
    assert.equal(ctx.omittedTables, 1);
    assert.ok(ctx.text.includes('  id integer NOT NULL PK\n  -- 4 more columns'));
    assert.ok(ctx.text.endsWith('-- 1 less relevant table omitted'));
  });
});

describe('prompts', () => {
  it('replays history turns before the question', () => {
    const prompt = buildTranslationPrompt({
      question: 'and for last week?',
      schemaContext: 'CTX',
      history: [{ question: 'average value per room', sql: 'SELECT 1' }],
    });
    assert.equal(prompt.system, TRANSLATION_SYSTEM_PROMPT);
    assert.deepEqual(prompt.messages, [
      { role: 'user', content: 'Question: average value per room' },
      { role: 'assistant', content: '{"sql":"SELECT 1","assumptions":[]}' },
      {
        role: 'user',
        content: 'CTX\n\nQuestion: and for last week?\n\nGenerate the SQL query as a JSON object.',
      },
    ]);
  });

  it('appends the rejected output and the reason', () => {
    const messages = buildCorrectionMessages([{ role: 'user', content: 'q' }], 'not json', 'Empty response');
    assert.equal(messages.length, 3);
    assert.deepEqual(messages[1], { role: 'assistant', content: 'not json' });
    assert.ok(messages[2]?.content.startsWith('Your previous response was invalid. Errors:\nEmpty response\n'));
  });
});
