export type SqlTokenType = 'word' | 'number' | 'string' | 'identifier' | 'punctuation' | 'operator';

export interface SqlToken {
  type: SqlTokenType;
  /** Token text; words are upper-cased in `upper` */
  text: string;
  upper: string;
  position: number;
}

export type TokenizeResult =
  | { ok: true; tokens: SqlToken[] }
  | { ok: false; message: string; position: number };

const PUNCTUATION = new Set(['(', ')', ',', ';', '.', '*']);
const OPERATOR_CHARS = new Set(['=', '<', '>', '!', '+', '-', '/', '%', '|', '&', '^', '~']);

const isWordStart = (ch: string) => /[A-Za-z_#@$]/.test(ch);
const isWordPart = (ch: string) => /[\w#@$]/.test(ch);
const isDigit = (ch: string) => ch >= '0' && ch <= '9';

/**
 * Conservative SQL tokenizer. Comments and whitespace are dropped; string
 * literals, bracket and double-quoted identifiers must be closed.
 */
export const tokenizeSql = (sql: string): TokenizeResult => {
  const tokens: SqlToken[] = [];
  let i = 0;

  const push = (type: SqlTokenType, start: number, end: number) => {
    const text = sql.slice(start, end);
    tokens.push({ type, text, upper: type === 'word' ? text.toUpperCase() : text, position: start });
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      if (end === -1) {
        return { ok: false, message: `Unterminated block comment at position ${i}.`, position: i };
      }
      i = end + 2;
      continue;
    }

    if (ch === "'") {
      const start = i;
      i++;
      let closed = false;
      while (i < sql.length) {
        if (sql[i] === "'" && sql[i + 1] === "'") {
          i += 2;
          continue;
        }
        if (sql[i] === "'") {
          closed = true;
          i++;
          break;
        }
        i++;
      }
      if (!closed) {
        return { ok: false, message: `Unterminated string literal at position ${start}.`, position: start };
      }
      push('string', start, i);
      continue;
    }

    if (ch === '[' || ch === '"') {
      const close = ch === '[' ? ']' : '"';
      const end = sql.indexOf(close, i + 1);
      if (end === -1) {
        return { ok: false, message: `Unterminated quoted identifier at position ${i}.`, position: i };
      }
      push('identifier', i, end + 1);
      i = end + 1;
      continue;
    }

    if (isDigit(ch)) {
      const start = i;
      while (i < sql.length && (isDigit(sql[i]) || sql[i] === '.')) i++;
      push('number', start, i);
      continue;
    }

    if (isWordStart(ch)) {
      const start = i;
      while (i < sql.length && isWordPart(sql[i])) i++;
      push('word', start, i);
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      push('punctuation', i, i + 1);
      i++;
      continue;
    }

    if (OPERATOR_CHARS.has(ch)) {
      const start = i;
      while (i < sql.length && OPERATOR_CHARS.has(sql[i]) && !(sql[i] === '-' && sql[i + 1] === '-')) i++;
      push('operator', start, i);
      continue;
    }

    return { ok: false, message: `Unexpected character '${ch}' at position ${i}.`, position: i };
  }

  return { ok: true, tokens };
};
