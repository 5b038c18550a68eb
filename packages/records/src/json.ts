import { z } from 'zod';

export type StoredValueProblem = 'syntax' | 'schema';

/** A stored value that is not JSON (`syntax`) or does not match its schema (`schema`). */
export class StoredValueError extends Error {
  constructor(
    public readonly problem: StoredValueProblem,
    // Where the value lives, e.g. `<file>:<line>`.
    public readonly source: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${problem === 'syntax' ? 'Invalid JSON' : 'Invalid value'} in ${source}: ${detail}`, options);
    this.name = 'StoredValueError';
  }
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function parseStoredJson<T>(schema: Schema<T>, text: string, source: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch (err) {
    throw new StoredValueError('syntax', source, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  const r = schema.safeParse(parsed);
  if (!r.success) {
    throw new StoredValueError('schema', source, r.error.message, { cause: r.error });
  }
  return r.data;
}

export function serializeStoredJson<T>(
  schema: Schema<T>,
  value: T,
  opts: { source?: string; pretty?: boolean } = {},
): string {
  const r = schema.safeParse(value);
  if (!r.success) {
    throw new StoredValueError('schema', opts.source ?? 'value', r.error.message, { cause: r.error });
  }
  return opts.pretty ? JSON.stringify(r.data, null, 2) : JSON.stringify(r.data);
}

export type JsonLine<T> =
  | { line: number; ok: true; value: T }
  | {
      line: number;
      ok: false;
      text: string;
      error: StoredValueError;
      // False only for a final line with no newline after it.
      terminated: boolean;
    };

/** Parses JSONL content line by line. Blank lines are skipped; line numbers are 1-based. */
export function parseJsonLines<T>(schema: Schema<T>, content: string, source: string): JsonLine<T>[] {
  const lines = content.split('\n');
  const out: JsonLine<T>[] = [];

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i]?.trim() ?? '';
    if (text.length === 0) continue;

    const line = i + 1;
    try {
      out.push({ line, ok: true, value: parseStoredJson(schema, text, `${source}:${line}`) });
    } catch (err) {
      if (!(err instanceof StoredValueError)) throw err;
      out.push({ line, ok: false, text, error: err, terminated: i < lines.length - 1 });
    }
  }

  return out;
}
