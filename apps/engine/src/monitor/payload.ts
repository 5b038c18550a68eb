const FORBIDDEN_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

type PathToken = { type: 'prop'; key: string } | { type: 'index'; index: number };

function parsePath(path: string): PathToken[] | null {
  const trimmed = path.trim();
  if (!trimmed) return null;

  const tokens: PathToken[] = [];
  let i = 0;

  while (i < trimmed.length) {
    // Skip leading dots.
    if (trimmed[i] === '.') {
      i++;
      continue;
    }

    const start = i;
    while (i < trimmed.length && trimmed[i] !== '.' && trimmed[i] !== '[') {
      i++;
    }
    if (i > start) {
      const key = trimmed.slice(start, i);
      if (!key || FORBIDDEN_KEYS.has(key)) return null;
      tokens.push({ type: 'prop', key });
    }

    while (i < trimmed.length && trimmed[i] === '[') {
      i++; // consume '['
      const idxStart = i;
      while (i < trimmed.length && trimmed[i] !== ']') {
        i++;
      }
      if (i >= trimmed.length) return null;
      const raw = trimmed.slice(idxStart, i).trim();
      i++; // consume ']'
      if (!/^\d+$/.test(raw)) return null;
      tokens.push({ type: 'index', index: Number(raw) });
    }

    if (i < trimmed.length && trimmed[i] === '.') {
      i++;
    }
  }

  return tokens.length > 0 ? tokens : null;
}

type Lookup = { found: true; value: unknown } | { found: false };

function lookupPath(root: unknown, path: string): Lookup {
  const tokens = parsePath(path);
  if (!tokens) return { found: false };

  let cur: unknown = root;
  for (const t of tokens) {
    if (cur === null || cur === undefined) return { found: false };

    if (t.type === 'index') {
      if (!Array.isArray(cur) || t.index >= cur.length) return { found: false };
      cur = cur[t.index];
      continue;
    }

    if (typeof cur !== 'object') return { found: false };
    if (!Object.prototype.hasOwnProperty.call(cur, t.key)) return { found: false };
    cur = Reflect.get(cur, t.key);
  }

  return { found: true, value: cur };
}

export function readPath(root: unknown, path: string): unknown {
  const r = lookupPath(root, path);
  return r.found ? r.value : undefined;
}

/** True when every segment of `path` exists, even if the final value is null. */
export function hasPath(root: unknown, path: string): boolean {
  return lookupPath(root, path).found;
}

function toTemplateString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function renderStringTemplate(template: string, vars: Record<string, unknown>): string {
  return template.replace(/\{\{\s*([^{}]+?)\s*\}\}/g, (_m, expr: string) =>
    toTemplateString(readPath(vars, expr)),
  );
}

export function renderJsonTemplate(
  value: unknown,
  vars: Record<string, unknown>,
  opts: { maxDepth?: number } = {},
): unknown {
  const maxDepth = opts.maxDepth ?? 32;

  function inner(v: unknown, depth: number): unknown {
    if (depth > maxDepth) return null;

    if (typeof v === 'string') {
      return renderStringTemplate(v, vars);
    }
    if (Array.isArray(v)) {
      return v.map((it) => inner(it, depth + 1));
    }
    if (v && typeof v === 'object') {
      const out: Record<string, unknown> = {};
      for (const [k, vv] of Object.entries(v)) {
        out[k] = inner(vv, depth + 1);
      }
      return out;
    }

    return v;
  }

  return inner(value, 0);
}
