import Database from 'better-sqlite3';

/** Node-style callback; `this` carries `lastID` and `changes` after `run()`. */
type SqliteCallback = (this: StatementInfo | void, error: Error | null, rows?: unknown[]) => void;

type BindValue = string | number | bigint | Buffer | null;
type BindParameters = BindValue[] | Record<string, BindValue>;

interface StatementInfo {
  readonly lastID: number;
  readonly changes: number;
}

/** Open flags, numbered as in the `sqlite3` package Sequelize expects. */
export const OPEN_READONLY = 0x01;
export const OPEN_READWRITE = 0x02;
export const OPEN_CREATE = 0x04;

function isCallback(value: unknown): value is SqliteCallback {
  return typeof value === 'function';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function toBindValue(value: unknown): BindValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (value instanceof Date) return value.toISOString();
  throw new TypeError(`Unsupported bind parameter of type ${typeof value}`);
}

function toBindParameters(params: unknown): BindParameters {
  if (params === undefined || params === null) return [];
  if (Array.isArray(params)) return params.map(toBindValue);
  if (typeof params !== 'object') return [toBindValue(params)];

  // better-sqlite3 expects named parameters without their `$`, `:` or `@` prefix
  const named: Record<string, BindValue> = {};
  for (const [key, value] of Object.entries(params)) {
    named[/^[$:@]/.test(key) ? key.slice(1) : key] = toBindValue(value);
  }
  return named;
}

/** Split `(params?, callback?)` the way the sqlite3 API accepts them. */
function splitArgs(args: unknown[]): { params: BindParameters; callback?: SqliteCallback } {
  const last = args.at(-1);
  const callback = isCallback(last) ? last : undefined;
  const rest = callback ? args.slice(0, -1) : args;
  return { params: toBindParameters(rest.length > 1 ? rest : rest[0]), callback };
}

/**
 * The subset of the `sqlite3` Database API that Sequelize's SQLite dialect
 * calls, implemented over better-sqlite3. Pass it as
 * `dialectModule: betterSqliteDialect`.
 *
 * Without `OPEN_CREATE` in the mode the database file must already exist.
 */
export class BetterSqliteDatabase {
  readonly filename: string;
  private readonly db: Database.Database | null = null;

  constructor(filename: string, mode?: number | SqliteCallback, callback?: SqliteCallback) {
    this.filename = filename;
    const done = isCallback(mode) ? mode : callback;
    const flags = typeof mode === 'number' ? mode : OPEN_READWRITE | OPEN_CREATE;

    try {
      this.db = new Database(filename, {
        readonly: (flags & OPEN_READONLY) !== 0,
        fileMustExist: (flags & OPEN_CREATE) === 0,
      });
    } catch (error) {
      if (!done) throw error;
      setImmediate(() => done(toError(error)));
      return;
    }
    if (done) setImmediate(() => done(null));
  }

  run(sql: string, ...args: unknown[]): this {
    const { params, callback } = splitArgs(args);
    let info: Database.RunResult;
    try {
      info = this.runStatement(this.prepare(sql), params);
    } catch (error) {
      return this.fail(error, callback);
    }
    callback?.call({ lastID: Number(info.lastInsertRowid), changes: info.changes }, null);
    return this;
  }

  all(sql: string, ...args: unknown[]): this {
    const { params, callback } = splitArgs(args);
    let rows: unknown[];
    try {
      const statement = this.prepare(sql);
      // DDL reaches all() too; statements that return no rows are run instead
      if (statement.reader) {
        rows = Array.isArray(params) ? statement.all(...params) : statement.all(params);
      } else {
        this.runStatement(statement, params);
        rows = [];
      }
    } catch (error) {
      return this.fail(error, callback);
    }
    callback?.(null, rows);
    return this;
  }

  exec(sql: string, callback?: SqliteCallback): this {
    try {
      this.open().exec(sql);
    } catch (error) {
      return this.fail(error, callback);
    }
    callback?.(null);
    return this;
  }

  serialize(callback?: () => void): void {
    callback?.();
  }

  parallelize(callback?: () => void): void {
    callback?.();
  }

  close(callback?: (error: Error | null) => void): void {
    try {
      if (this.db?.open) this.db.close();
    } catch (error) {
      if (!callback) throw error;
      callback(toError(error));
      return;
    }
    callback?.(null);
  }

  private open(): Database.Database {
    if (!this.db) throw new Error(`${this.filename}: database is not open`);
    return this.db;
  }

  private prepare(sql: string): Database.Statement {
    return this.open().prepare(sql);
  }

  private runStatement(statement: Database.Statement, params: BindParameters): Database.RunResult {
    return Array.isArray(params) ? statement.run(...params) : statement.run(params);
  }

  private fail(error: unknown, callback: SqliteCallback | undefined): this {
    if (!callback) throw error;
    callback(toError(error));
    return this;
  }
}

/** Value for Sequelize's `dialectModule` option. */
export const betterSqliteDialect = {
  Database: BetterSqliteDatabase,
  OPEN_READONLY,
  OPEN_READWRITE,
  OPEN_CREATE,
};
