import { describe, expect, it } from 'vitest';

import { parseJsonLines, parseStoredJson, serializeStoredJson, StoredValueError } from '../src/json';
import { checkResultSchema, transitionStateSchema } from '../src/schema';

const RECORD = '{"check_id":"api","timestamp":"2026-10-18T10:00:00Z","status":"up","response_time_ms":42}';

describe('stored json', () => {
  it('parses a valid record', () => {
    expect(parseStoredJson(checkResultSchema, RECORD, 'day.jsonl:1')).toEqual({
      check_id: 'api',
      timestamp: '2026-10-18T10:00:00Z',
      status: 'up',
      response_time_ms: 42,
    });
  });

  it('reports malformed JSON as a syntax problem at its source', () => {
    const err: unknown = (() => {
      try {
        return parseStoredJson(checkResultSchema, '{"check_id":', 'day.jsonl:3');
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(StoredValueError);
    expect(err).toMatchObject({ problem: 'syntax', source: 'day.jsonl:3' });
    expect(err instanceof Error ? err.message : '').toMatch(/^Invalid JSON in day\.jsonl:3: /);
  });

  it('reports schema mismatches as a schema problem', () => {
    const line = RECORD.replace('"up"', '"nodata"');
    expect(() => parseStoredJson(checkResultSchema, line, 'check_result')).toThrow(
      /^Invalid value in check_result: /,
    );
  });

  it('refuses to serialize an invalid value', () => {
    expect(() =>
      serializeStoredJson(checkResultSchema, {
        check_id: 'Bad Id',
        timestamp: '2026-10-18T10:00:00Z',
        status: 'up',
        response_time_ms: 1,
      }),
    ).toThrow(/^Invalid value in value: /);
  });

  it('pretty-prints on request', () => {
    const state = {
      overall: 'up' as const,
      checks: { api: 'up' as const },
      updated_at: '2026-10-18T10:00:00Z',
      outbox: [],
    };
    expect(serializeStoredJson(transitionStateSchema, state, { pretty: true })).toBe(
      JSON.stringify(state, null, 2),
    );
  });
});

describe('parseJsonLines', () => {
  it('numbers lines from one and skips blank ones', () => {
    const lines = parseJsonLines(checkResultSchema, `${RECORD}\n\n${RECORD}\n`, 'day.jsonl');

    expect(lines.map((l) => [l.line, l.ok])).toEqual([
      [1, true],
      [3, true],
    ]);
  });

  it('marks whether a failed line was followed by a newline', () => {
    const lines = parseJsonLines(checkResultSchema, `{"check_id":"a\n${RECORD}\n{"check_id"`, 'day.jsonl');

    expect(
      lines.map((l) => (l.ok ? [l.line, 'ok'] : [l.line, l.error.problem, l.error.source, l.terminated])),
    ).toEqual([
      [1, 'syntax', 'day.jsonl:1', true],
      [2, 'ok'],
      [3, 'syntax', 'day.jsonl:3', false],
    ]);
  });
});
