import type { CteDefinition } from '../../query-builder/clause-types.js';

export interface ImportedSql {
  ctes: CteDefinition[];
  /** Statement after the WITH list, kept as literal text */
  statement: string;
}

/**
 * Blanks out comments and string literal contents while keeping every index,
 * so parenthesis matching can run on the masked copy.
 */
export const maskSql = (sql: string): string => {
  let out = '';
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];
    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      const stop = end === -1 ? sql.length : end;
      out += ' '.repeat(stop - i);
      i = stop;
      continue;
    }
    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      const stop = end === -1 ? sql.length : end + 2;
      out += sql.slice(i, stop).replace(/[^\n]/g, ' ');
      i = stop;
      continue;
    }
    if (ch === "'") {
      let j = i + 1;
      while (j < sql.length) {
        if (sql[j] === "'" && sql[j + 1] === "'") {
          j += 2;
          continue;
        }
        if (sql[j] === "'") break;
        j++;
      }
      const stop = Math.min(j + 1, sql.length);
      out += `'${' '.repeat(Math.max(stop - i - 2, 0))}${stop - i >= 2 ? "'" : ''}`;
      i = stop;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
};

const findClosingParen = (masked: string, open: number): number => {
  let depth = 0;
  for (let i = open; i < masked.length; i++) {
    if (masked[i] === '(') depth++;
    if (masked[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

const CTE_HEAD = /^\s*(\[[^\]]+\]|"[^"]+"|[A-Za-z_][\w$]*)\s*(\([^()]*\))?\s+AS\s*\(/i;
const WITH_HEAD = /^\s*WITH\s+(?:RECURSIVE\s+)?/i;

/**
 * Pulls the leading `WITH name AS (...)` blocks out of a statement.
 *
 * Only the CTE list is decomposed; the rest of the statement is returned as
 * literal text. Text that does not parse as a CTE list is returned whole with
 * no CTEs.
 */
export const importSql = (sql: string): ImportedSql => {
  const masked = maskSql(sql);
  const withMatch = WITH_HEAD.exec(masked);
  if (!withMatch) {
    return { ctes: [], statement: sql.trim() };
  }

  const ctes: CteDefinition[] = [];
  let cursor = withMatch[0].length;

  for (;;) {
    const head = CTE_HEAD.exec(masked.slice(cursor));
    if (!head) {
      return { ctes: [], statement: sql.trim() };
    }
    const open = cursor + head[0].length - 1;
    const close = findClosingParen(masked, open);
    if (close === -1) {
      return { ctes: [], statement: sql.trim() };
    }
    const name = `${head[1]}${head[2] ?? ''}`;
    ctes.push({ name, body: sql.slice(open + 1, close).trim() });
    cursor = close + 1;

    const separator = /^\s*,/.exec(masked.slice(cursor));
    if (!separator) break;
    cursor += separator[0].length;
  }

  return { ctes, statement: sql.slice(cursor).trim() };
};
