import { describe, it, expect } from 'vitest';
import { tokenizeSql } from '../../src/core/validation/sql-tokenizer.js';

describe('tokenizeSql', () => {
  it('splits words, literals, identifiers and operators and drops comments', () => {
    const result = tokenizeSql("SELECT a.b, 'x''y' FROM [t] -- note\nWHERE n >= 10 /* done */");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.tokens.map(token => [token.type, token.text])).toEqual([
      ['word', 'SELECT'],
      ['word', 'a'],
      ['punctuation', '.'],
      ['word', 'b'],
      ['punctuation', ','],
      ['string', "'x''y'"],
      ['word', 'FROM'],
      ['identifier', '[t]'],
      ['word', 'WHERE'],
      ['word', 'n'],
      ['operator', '>='],
      ['number', '10']
    ]);
  });

  it('upper-cases words and records positions', () => {
    const result = tokenizeSql('select x');
    expect(result.ok && result.tokens.map(token => [token.upper, token.position])).toEqual([
      ['SELECT', 0],
      ['X', 7]
    ]);
  });

  it.each([
    ["SELECT 'abc", 'Unterminated string literal at position 7.'],
    ['SELECT /* open', 'Unterminated block comment at position 7.'],
    ['SELECT [a', 'Unterminated quoted identifier at position 7.'],
    ['SELECT ?', "Unexpected character '?' at position 7."]
  ])('reports %s', (sql, message) => {
    const result = tokenizeSql(sql);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.message).toBe(message);
  });
});
