import { describe, it, expect } from 'vitest';
import { SyntaxValidator } from '../../src/core/validation/syntax-validator.js';

describe('SyntaxValidator', () => {
  const validator = new SyntaxValidator();

  it.each([
    ['SELECT a FROM t', 'Valid SELECT.'],
    ['(SELECT 1)', 'Valid SELECT.'],
    ['SELECT a FROM t;', 'Valid SELECT.'],
    ["SELECT a FROM t WHERE s IN ('A','B') ORDER BY a DESC", 'Valid SELECT.'],
    ['WITH c AS (SELECT 1) SELECT * FROM c', 'Valid SELECT.'],
    ['UPDATE T\nSET val=src.v\nFROM (\nSELECT S.id, S.v\nFROM S\n) AS src\nWHERE T.id=src.id', 'Valid UPDATE.'],
    ['DELETE FROM T\nWHERE id IN (\nSELECT R.id\nFROM S\n)', 'Valid DELETE.'],
    ['INSERT INTO T (val, id)\nSELECT S.v, S.id\nFROM S', 'Valid INSERT.'],
    ['SELECT ROW_NUMBER() OVER (ORDER BY a) AS rn FROM t', 'Valid SELECT.']
  ])('accepts %s', (sql, message) => {
    expect(validator.validate(sql)).toEqual({ ok: true, message });
  });

  it.each([
    ['', 'No SQL to validate.'],
    ['   \n', 'No SQL to validate.'],
    ['-- No data sources on the canvas.', 'Nothing but comments: no statement to validate.'],
    ['SELECT (a FROM t', "Unbalanced parentheses: missing ')'."],
    ['SELECT a) FROM t', "Unbalanced parentheses: unexpected ')' at position 8."],
    ["SELECT 'a FROM t", 'Unterminated string literal at position 7.'],
    ['FROM t', "Unexpected statement start 'FROM'."],
    ['SELECT FROM t', 'Missing SELECT columns.'],
    ['SELECT a FROM WHERE x = 1', 'Missing table after FROM.'],
    ['SELECT a FROM t INNER JOIN ON t.id = u.id', 'Missing table after JOIN.'],
    ['SELECT a, FROM t', 'Empty list item at position 8.'],
    ['SELECT COUNT(,a) FROM t', 'Empty list item at position 13.'],
    ['SELECT a FROM t WHERE', "Statement ends unexpectedly after 'WHERE'."],
    ['SELECT a FROM t WHERE x =', "Statement ends unexpectedly after '='."],
    ['WITH c SELECT 1', 'Malformed WITH clause: expected <name> AS ( ... ).'],
    ['WITH c AS (SELECT 1) FROM c', 'WITH clause must be followed by SELECT, INSERT, UPDATE or DELETE.']
  ])('rejects %j', (sql, message) => {
    expect(validator.validate(sql)).toEqual({ ok: false, message });
  });
});
