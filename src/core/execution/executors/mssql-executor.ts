// src/core/execution/executors/mssql-executor.ts
import { Connection, Request, TYPES } from 'tedious';
import {
  type DbExecutor,
  rowsToQueryResult
} from '../db-executor.js';

export interface MssqlClientLike {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<{ recordset: Array<Record<string, unknown>> }>;
  close?(): Promise<void>;
}

/**
 * Creates a database executor for Microsoft SQL Server, where linked-server
 * four-part names are resolved.
 * @param client A SQL Server client instance.
 * @returns A DbExecutor implementation for MSSQL.
 */
export function createMssqlExecutor(
  client: MssqlClientLike
): DbExecutor {
  return {
    async executeSql(sql, params) {
      const { recordset } = await client.query(sql, params);
      const result = rowsToQueryResult(recordset ?? []);
      return [result];
    },
    async dispose() {
      await client.close?.();
    },
  };
}

// ---------------------------------------------------------------------------
// Tedious integration (driver adapter)
// ---------------------------------------------------------------------------

export type TediousConfig = ConstructorParameters<typeof Connection>[0];
type TediousParameterType = Parameters<Request['addParameter']>[1];

interface TediousColumn {
  metadata: { colName: string };
  value: unknown;
}

export interface CreateTediousClientOptions {
  inferType?(value: unknown): TediousParameterType;
}

const defaultInferType = (value: unknown): TediousParameterType => {
  if (value === null || value === undefined) return TYPES.NVarChar;
  if (typeof value === 'number') {
    return Number.isInteger(value) ? TYPES.Int : TYPES.Float;
  }
  if (typeof value === 'bigint') return TYPES.BigInt;
  if (typeof value === 'boolean') return TYPES.Bit;
  if (value instanceof Date) return TYPES.DateTime;
  if (Buffer.isBuffer(value)) return TYPES.VarBinary;
  return TYPES.NVarChar;
};

/**
 * The part of a tedious `Connection` the client drives.
 */
export type TediousConnectionLike = Pick<Connection, 'execSql' | 'close'>;

export function createTediousMssqlClient(
  connection: TediousConnectionLike,
  options?: CreateTediousClientOptions
): MssqlClientLike {
  const inferType = options?.inferType ?? defaultInferType;

  return {
    async query(sql: string, params: unknown[] = []) {
      const rows = await new Promise<Array<Record<string, unknown>>>(
        (resolve, reject) => {
          const collected: Record<string, unknown>[] = [];

          const request = new Request(sql, err => {
            if (err) return reject(err);
            resolve(collected);
          });

          params.forEach((value, idx) => {
            request.addParameter(`p${idx + 1}`, inferType(value), value);
          });

          request.on('row', (cols: TediousColumn[]) => {
            const row: Record<string, unknown> = {};
            for (const col of cols) {
              row[col.metadata.colName] = col.value;
            }
            collected.push(row);
          });

          connection.execSql(request);
        }
      );

      return { recordset: rows };
    },

    close: async () => {
      connection.close();
    },
  };
}

/**
 * Opens a tedious connection and wraps it in an executor.
 */
export function connectTediousExecutor(
  config: TediousConfig,
  options?: CreateTediousClientOptions
): Promise<DbExecutor> {
  return new Promise<DbExecutor>((resolve, reject) => {
    const connection = new Connection(config);
    connection.connect(err => {
      if (err) return reject(err);
      resolve(createMssqlExecutor(createTediousMssqlClient(connection, options)));
    });
  });
}
