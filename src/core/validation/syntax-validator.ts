import { tokenizeSql, type SqlToken } from './sql-tokenizer.js';

export interface ValidationResult {
  ok: boolean;
  message: string;
}

const STATEMENT_KEYWORDS = new Set(['SELECT', 'WITH', 'INSERT', 'UPDATE', 'DELETE']);

/** Keywords that cannot end a statement or stand in for a table name. */
const CLAUSE_KEYWORDS = new Set([
  'SELECT', 'FROM', 'WHERE', 'JOIN', 'ON', 'AND', 'OR', 'BY', 'GROUP', 'ORDER', 'HAVING',
  'SET', 'VALUES', 'INTO', 'LIMIT', 'OFFSET', 'FETCH', 'AS', 'IN', 'NOT', 'UNION', 'INTERSECT',
  'EXCEPT', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'OUTER', 'WITH', 'UPDATE', 'DELETE', 'INSERT'
]);

/** Keywords that close a list, so a comma right before them leaves an empty item. */
const LIST_TERMINATORS = new Set([
  'FROM', 'WHERE', 'GROUP', 'ORDER', 'HAVING', 'ON', 'SET', 'VALUES', 'LIMIT', 'OFFSET',
  'UNION', 'INTERSECT', 'EXCEPT'
]);

const fail = (message: string): ValidationResult => ({ ok: false, message });

const isWord = (token: SqlToken | undefined, ...words: string[]): boolean =>
  token !== undefined && token.type === 'word' && words.includes(token.upper);

const isPunct = (token: SqlToken | undefined, text: string): boolean =>
  token !== undefined && token.type === 'punctuation' && token.text === text;

const isSourceStart = (token: SqlToken | undefined): boolean =>
  token !== undefined &&
  (token.type === 'identifier' || isPunct(token, '(') || (token.type === 'word' && !CLAUSE_KEYWORDS.has(token.upper)));

/**
 * Index just past the parenthesis that closes the one at `open`, or -1.
 */
const skipParens = (tokens: readonly SqlToken[], open: number): number => {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], '(')) depth++;
    if (isPunct(tokens[i], ')')) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
};

/**
 * Advisory syntax check over generated SQL. No semantic validation: table and
 * column names are never resolved. Never throws.
 */
export class SyntaxValidator {
  validate(sql: string): ValidationResult {
    if (!sql.trim()) {
      return fail('No SQL to validate.');
    }

    const tokenized = tokenizeSql(sql);
    if (!tokenized.ok) {
      return fail(tokenized.message);
    }
    const tokens = tokenized.tokens;
    if (!tokens.length) {
      return fail('Nothing but comments: no statement to validate.');
    }

    const balance = this.checkParentheses(tokens);
    if (balance) return fail(balance);

    let start = 0;
    while (isPunct(tokens[start], '(')) start++;
    const first = tokens[start];
    if (first === undefined || !isWord(first, ...STATEMENT_KEYWORDS)) {
      return fail(`Unexpected statement start '${first?.text ?? ''}'.`);
    }

    let statement = first;
    if (first.upper === 'WITH') {
      const afterCtes = this.skipCtes(tokens, start + 1);
      if (afterCtes === -1) {
        return fail('Malformed WITH clause: expected <name> AS ( ... ).');
      }
      const main = tokens[afterCtes];
      if (!isWord(main, 'SELECT', 'INSERT', 'UPDATE', 'DELETE')) {
        return fail('WITH clause must be followed by SELECT, INSERT, UPDATE or DELETE.');
      }
      statement = main;
    }

    const structural = this.checkStructure(tokens);
    if (structural) return fail(structural);

    return { ok: true, message: `Valid ${statement.upper}.` };
  }

  private checkParentheses(tokens: readonly SqlToken[]): string | undefined {
    let depth = 0;
    for (const token of tokens) {
      if (isPunct(token, '(')) depth++;
      if (isPunct(token, ')')) {
        depth--;
        if (depth < 0) return `Unbalanced parentheses: unexpected ')' at position ${token.position}.`;
      }
    }
    return depth === 0 ? undefined : 'Unbalanced parentheses: missing \')\'.';
  }

  /**
   * @returns index of the first token after the CTE list, or -1
   */
  private skipCtes(tokens: readonly SqlToken[], index: number): number {
    let i = index;
    if (isWord(tokens[i], 'RECURSIVE')) i++;
    for (;;) {
      const name = tokens[i];
      if (!name || !(name.type === 'word' || name.type === 'identifier')) return -1;
      i++;
      if (isPunct(tokens[i], '(')) {
        i = skipParens(tokens, i);
        if (i === -1) return -1;
      }
      if (!isWord(tokens[i], 'AS') || !isPunct(tokens[i + 1], '(')) return -1;
      i = skipParens(tokens, i + 1);
      if (i === -1) return -1;
      if (!isPunct(tokens[i], ',')) return i;
      i++;
    }
  }

  private checkStructure(tokens: readonly SqlToken[]): string | undefined {
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      const next = tokens[i + 1];

      if (isWord(token, 'SELECT')) {
        let j = i + 1;
        if (isWord(tokens[j], 'DISTINCT', 'ALL')) j++;
        if (isWord(tokens[j], 'TOP')) j += 2;
        const item = tokens[j];
        if (!item || isPunct(item, ')') || isPunct(item, ',') || isWord(item, 'FROM')) {
          return 'Missing SELECT columns.';
        }
      }

      if (isWord(token, 'FROM', 'JOIN') && !isWord(tokens[i - 1], 'DELETE') && !isSourceStart(next)) {
        return `Missing table after ${token.upper}.`;
      }

      if (isPunct(token, ',') && (!next || isPunct(next, ',') || isPunct(next, ')') || isWord(next, ...LIST_TERMINATORS))) {
        return `Empty list item at position ${token.position}.`;
      }

      if (isPunct(token, '(') && isPunct(next, ',')) {
        return `Empty list item at position ${next?.position ?? token.position}.`;
      }
    }

    let last = tokens.length - 1;
    while (last > 0 && isPunct(tokens[last], ';')) last--;
    const tail = tokens[last];
    if (tail.type === 'word' && CLAUSE_KEYWORDS.has(tail.upper)) {
      return `Statement ends unexpectedly after '${tail.text}'.`;
    }
    if (tail.type === 'operator') {
      return `Statement ends unexpectedly after '${tail.text}'.`;
    }
    return undefined;
  }
}
