import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { QuerySession, type SessionSnapshot } from '../../src/session/query-session.js';
import type { SessionLogEntry } from '../../src/session/query-logger.js';
import type { DbExecutor } from '../../src/core/execution/db-executor.js';
import { EMPTY_GRAPH_COMMENT } from '../../src/core/compiler/query-compiler.js';
import {
  DuplicateCteError,
  ExecutorMissingError,
  InvalidClauseError,
  NodeNotFoundError
} from '../../src/core/errors.js';

const SCENARIO_SQL = 'SELECT A.id, A.name\nFROM A\nINNER JOIN B ON A.id=B.aid';

const buildJoinedSession = (session: QuerySession) => {
  session.addNode('A', ['id', 'name']);
  session.addNode('B', ['id', 'aid']);
  session.addJoinEdge('A', 'B', 'inner', 'A.id=B.aid');
  session.selectColumn('A', 'id');
  session.selectColumn('A', 'name');
};

describe('QuerySession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts with the empty canvas comment and no validation', () => {
    const session = new QuerySession();
    expect(session.sql).toBe(EMPTY_GRAPH_COMMENT);
    expect(session.status).toEqual({ state: 'idle', message: '' });
  });

  it('regenerates after every mutation and validates once the edits settle', () => {
    const session = new QuerySession({ validationDelayMs: 100 });
    buildJoinedSession(session);

    expect(session.sql).toBe(SCENARIO_SQL);
    expect(session.status.state).toBe('pending');

    vi.advanceTimersByTime(100);
    expect(session.status).toEqual({ state: 'valid', message: 'Valid SELECT.' });
  });

  it('produces the same text when nothing changed', () => {
    const session = new QuerySession();
    buildJoinedSession(session);
    const first = session.regenerate().sql;
    expect(session.regenerate().sql).toBe(first);
    expect(first).toBe(SCENARIO_SQL);
  });

  it('notifies listeners with the text and status', () => {
    const session = new QuerySession({ validationDelayMs: 50 });
    const seen: SessionSnapshot[] = [];
    const unsubscribe = session.onChange(snapshot => seen.push(snapshot));

    session.addNode('A', ['id']);
    vi.advanceTimersByTime(50);

    expect(seen).toEqual([
      { sql: 'SELECT *\nFROM A', status: { state: 'pending', message: 'Validation pending.' } },
      { sql: 'SELECT *\nFROM A', status: { state: 'valid', message: 'Valid SELECT.' } }
    ]);

    unsubscribe();
    session.addNode('B');
    expect(seen).toHaveLength(2);
  });

  it('leaves state and text alone when a mutation fails', () => {
    const session = new QuerySession();
    session.addNode('A');
    const listener = vi.fn();
    session.onChange(listener);

    expect(() => session.addJoinEdge('A', 'Z', 'INNER', 'A.id=Z.id')).toThrow(NodeNotFoundError);
    expect(() => session.addJoinEdge('A', 'A', 'SIDEWAYS', 'x')).toThrow('Unsupported join type');
    expect(listener).not.toHaveBeenCalled();
    expect(session.model.joinEdges()).toEqual([]);
  });

  it('waits for an explicit regenerate when auto-generation is off', () => {
    const session = new QuerySession({ autoGenerate: false });
    session.addNode('A', ['id']);
    expect(session.sql).toBe(EMPTY_GRAPH_COMMENT);

    session.regenerate();
    expect(session.sql).toBe('SELECT *\nFROM A');
  });

  it('switches to UPDATE and drops mappings when the target moves', () => {
    const session = new QuerySession();
    session.addNode('T', ['id', 'val']);
    session.addNode('S', ['id', 'v']);
    session.setOperationMode('update');
    expect(session.sql).toBe('-- No DML target: mark one node as the UPDATE target.');

    session.markDmlTarget('T');
    session.addMappingEdge('S.v', 'T.val');
    expect(session.sql).toBe('UPDATE T\nSET val=src.v\nFROM (\nSELECT S.id, S.v\nFROM S\n) AS src\nWHERE T.id=src.id');

    session.markDmlTarget('S');
    expect(session.model.mappingEdges()).toEqual([]);
    expect(session.sql).toBe("-- No column mappings for target 'S': map at least one source column.");
  });

  it('rejects unknown operation modes', () => {
    const session = new QuerySession();
    expect(() => session.setOperationMode('MERGE')).toThrow(InvalidClauseError);
    expect(session.mode).toBe('SELECT');
  });

  it('prefixes CTEs and rewrites linked-server sources', () => {
    const session = new QuerySession();
    session.addCte('recent', 'SELECT 1');
    expect(() => session.addCte('recent', 'SELECT 2')).toThrow(DuplicateCteError);

    session.setLinkedServerMap({ X: 'LS1' });
    session.addNode('X.db1.tbl1');
    expect(session.sql).toBe('WITH recent AS (\nSELECT 1\n)\nSELECT *\nFROM [LS1].[db1].dbo.[tbl1]');

    expect(session.removeCte('recent')).toBe(true);
    expect(session.sql).toBe('SELECT *\nFROM [LS1].[db1].dbo.[tbl1]');
  });

  it('adds window functions as derived columns', () => {
    const session = new QuerySession();
    session.addNode('sales', ['region', 'amount']);
    session.addWindowFunction('rn', { func: 'ROW_NUMBER', orderBy: ['sales.amount'] });
    expect(session.sql).toBe('SELECT ROW_NUMBER() OVER (ORDER BY sales.amount) AS rn\nFROM sales');
  });

  it('paginates with TOP, then OFFSET / FETCH, when configured for SQL Server', () => {
    const session = new QuerySession({ pagination: 'mssql' });
    session.addNode('A');
    session.setLimit(5);
    expect(session.sql).toBe('SELECT TOP 5 *\nFROM A');

    session.setOffset(10);
    expect(session.sql).toBe('SELECT *\nFROM A\nORDER BY (SELECT NULL)\nOFFSET 10 ROWS\nFETCH NEXT 5 ROWS ONLY');
  });

  it('imports SQL over the current content', () => {
    const entries: SessionLogEntry[] = [];
    const session = new QuerySession({ logger: entry => entries.push(entry) });
    session.addNode('old');
    session.addPredicate('WHERE', 'old.flag', '=', '1');

    session.importSql('WITH a AS (SELECT 1 AS n) SELECT n FROM a');

    expect(session.model.nodes()).toEqual([]);
    expect(session.clauses.wherePredicates).toEqual([]);
    expect(session.ctes).toEqual([{ name: 'a', body: 'SELECT 1 AS n' }]);
    expect(session.sql).toBe('WITH a AS (\nSELECT 1 AS n\n)\nSELECT n FROM a');
    expect(entries.filter(entry => entry.event === 'import')).toEqual([
      { event: 'import', cteCount: 1, statement: 'SELECT n FROM a' }
    ]);
  });

  it('resets nodes, clauses and CTEs together', () => {
    const session = new QuerySession();
    buildJoinedSession(session);
    session.addCte('c', 'SELECT 1');
    session.setLimit(3);

    session.reset();

    expect(session.sql).toBe(EMPTY_GRAPH_COMMENT);
    expect(session.ctes).toEqual([]);
    expect(session.clauses.limit).toBe(0);
  });

  it('flushes validation on demand and reports invalid text', () => {
    const session = new QuerySession();
    session.setOperationMode('DELETE');
    expect(session.flushValidation()).toEqual({
      state: 'invalid',
      message: 'Nothing but comments: no statement to validate.'
    });
  });

  it('logs generation and validation', () => {
    const entries: SessionLogEntry[] = [];
    const session = new QuerySession({ validationDelayMs: 10, logger: entry => entries.push(entry) });
    session.addNode('A');
    vi.advanceTimersByTime(10);

    expect(entries).toEqual([
      { event: 'generate', mode: 'SELECT', sql: 'SELECT *\nFROM A', complete: true },
      { event: 'validate', ok: true, message: 'Valid SELECT.' }
    ]);
  });

  it('cancels pending validation on dispose', async () => {
    const session = new QuerySession({ validationDelayMs: 10 });
    session.addNode('A');
    await session.dispose();
    vi.advanceTimersByTime(50);
    expect(session.status.state).toBe('pending');
  });

  describe('run', () => {
    it('fails without an executor', async () => {
      const session = new QuerySession();
      await expect(session.run()).rejects.toBeInstanceOf(ExecutorMissingError);
    });

    it('hands the generated text to the executor and logs it', async () => {
      const executed: string[] = [];
      const executor: DbExecutor = {
        async executeSql(sql) {
          executed.push(sql);
          return [{ columns: ['id'], values: [[1], [2]] }];
        }
      };
      const entries: SessionLogEntry[] = [];
      const session = new QuerySession({ executor, logger: entry => entries.push(entry) });
      session.addNode('A', ['id']);
      session.selectColumn('A', 'id');

      const results = await session.run();

      expect(executed).toEqual(['SELECT A.id\nFROM A']);
      expect(results).toEqual([{ columns: ['id'], values: [[1], [2]] }]);
      expect(entries.at(-1)).toEqual({ event: 'execute', sql: 'SELECT A.id\nFROM A', params: undefined });
    });
  });
});
