// tests/execution/mssql-executor.test.ts
import { describe, it, expect } from 'vitest';
import { TYPES, type Request } from 'tedious';
import {
  createMssqlExecutor,
  createTediousMssqlClient,
  type MssqlClientLike,
  type TediousConnectionLike,
} from '../../src/core/execution/executors/mssql-executor.js';

describe('createMssqlExecutor', () => {
  it('maps recordset correctly', async () => {
    const calls: { sql: string; params?: unknown[] }[] = [];

    const client: MssqlClientLike = {
      async query(sql, params) {
        calls.push({ sql, params });
        return {
          recordset: [
            { id: 1, name: 'a' },
            { id: 2, name: 'b' },
          ],
        };
      },
    };

    const executor = createMssqlExecutor(client);

    const [result] = await executor.executeSql(
      'SELECT [LS1].[sales].dbo.[orders].id\nFROM [LS1].[sales].dbo.[orders]'
    );

    expect(calls[0]).toEqual({
      sql: 'SELECT [LS1].[sales].dbo.[orders].id\nFROM [LS1].[sales].dbo.[orders]',
      params: undefined,
    });

    expect(result.columns).toEqual(['id', 'name']);
    expect(result.values).toEqual([
      [1, 'a'],
      [2, 'b'],
    ]);
  });

  it('returns an empty result for statements without rows', async () => {
    const executor = createMssqlExecutor({
      async query() {
        return { recordset: [] };
      },
    });

    expect(await executor.executeSql('DELETE FROM sales.orders WHERE id IN (SELECT 1)')).toEqual([
      { columns: [], values: [] },
    ]);
  });

  it('closes the client on dispose', async () => {
    const events: string[] = [];

    const client: MssqlClientLike = {
      async query() {
        return { recordset: [] };
      },
      async close() {
        events.push('close');
      },
    };

    const executor = createMssqlExecutor(client);
    await executor.dispose?.();

    expect(events).toEqual(['close']);
  });

  it('disposes clients without a close method', async () => {
    const executor = createMssqlExecutor({
      async query() {
        return { recordset: [] };
      },
    });

    await expect(executor.dispose?.()).resolves.toBeUndefined();
  });
});

describe('createTediousMssqlClient', () => {
  const fakeConnection = (rows: Array<Array<{ metadata: { colName: string }; value: unknown }>>) => {
    const requests: Request[] = [];
    let closed = 0;
    const connection: TediousConnectionLike = {
      execSql(request) {
        requests.push(request);
        for (const row of rows) {
          request.emit('row', row);
        }
        request.callback(null, rows.length);
      },
      close() {
        closed += 1;
      },
    };
    return { connection, requests, closedCount: () => closed };
  };

  it('binds parameters as p1..pn and maps rows by column name', async () => {
    const fake = fakeConnection([
      [
        { metadata: { colName: 'id' }, value: 1 },
        { metadata: { colName: 'name' }, value: 'a' },
      ],
      [
        { metadata: { colName: 'id' }, value: 2 },
        { metadata: { colName: 'name' }, value: 'b' },
      ],
    ]);
    const client = createTediousMssqlClient(fake.connection);

    const { recordset } = await client.query('SELECT id, name FROM t WHERE id > @p1 AND name <> @p2', [0, 'z']);

    expect(recordset).toEqual([
      { id: 1, name: 'a' },
      { id: 2, name: 'b' },
    ]);
    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0].parameters.map(p => [p.name, p.value])).toEqual([
      ['p1', 0],
      ['p2', 'z'],
    ]);
    expect(fake.requests[0].parameters[0].type).toBe(TYPES.Int);
    expect(fake.requests[0].parameters[1].type).toBe(TYPES.NVarChar);
  });

  it('uses a custom type inference when given', async () => {
    const fake = fakeConnection([]);
    const client = createTediousMssqlClient(fake.connection, { inferType: () => TYPES.VarChar });

    await client.query('SELECT @p1', [5]);

    expect(fake.requests[0].parameters[0].type).toBe(TYPES.VarChar);
  });

  it('rejects when the request completes with an error', async () => {
    const connection: TediousConnectionLike = {
      execSql(request) {
        request.callback(new Error('Invalid object name'));
      },
      close() {},
    };
    const client = createTediousMssqlClient(connection);

    await expect(client.query('SELECT 1 FROM missing')).rejects.toThrow('Invalid object name');
  });

  it('runs through an executor and closes the connection on dispose', async () => {
    const fake = fakeConnection([[{ metadata: { colName: 'total' }, value: 42 }]]);
    const executor = createMssqlExecutor(createTediousMssqlClient(fake.connection));

    expect(await executor.executeSql('SELECT COUNT(*) AS total FROM t')).toEqual([
      { columns: ['total'], values: [[42]] },
    ]);

    await executor.dispose?.();
    expect(fake.closedCount()).toBe(1);
  });
});
