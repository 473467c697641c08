/**
 * pg-fluent - Execution Configuration
 *
 * Frozen record describing where and what to execute. Every builder method
 * returns a new value, so partially configured props can be shared and
 * forked freely.
 */

import type { ClientCertificate, Result } from "../types/index.js";
import type { Driver, DriverConnection, DriverTransaction } from "../driver/types.js";
import type { RowReader } from "../driver/RowReader.js";
import type { SqlParameter } from "../values/SqlValue.js";
import { pgDriver } from "../driver/pg/PgDriver.js";
import {
  execute,
  executeSync,
  executeRow,
  executeRowSync,
  iter,
  iterSync,
  executeNonQuery,
  executeNonQuerySync,
} from "../execution/engine.js";
import {
  executeTransaction,
  executeTransactionSync,
  type TransactionQuery,
} from "../execution/transaction.js";

export type ExecutionTarget =
  | { kind: "connectionString"; connectionString: string }
  | { kind: "connection"; connection: DriverConnection }
  | { kind: "transaction"; transaction: DriverTransaction }
  | { kind: "empty" };

export interface SqlSettings {
  readonly target: ExecutionTarget;
  /** Zero or one entries; the first one is the command text */
  readonly queries: readonly string[];
  readonly parameters: readonly SqlParameter[];
  /** Treat the query as a function name (stored-procedure mode) */
  readonly isFunction: boolean;
  readonly needPrepare: boolean;
  readonly signal?: AbortSignal | undefined;
  readonly clientCertificate?: ClientCertificate | undefined;
  /** Opens connections for connection-string targets */
  readonly driver: Driver;
}

const DEFAULT_SETTINGS: SqlSettings = {
  target: { kind: "empty" },
  queries: [],
  parameters: [],
  isFunction: false,
  needPrepare: false,
  driver: pgDriver,
};

export class SqlProps {
  private constructor(public readonly settings: SqlSettings) {
    Object.freeze(settings);
    Object.freeze(this);
  }

  static create(settings: Partial<SqlSettings> = {}): SqlProps {
    return new SqlProps({ ...DEFAULT_SETTINGS, ...settings });
  }

  private with(patch: Partial<SqlSettings>): SqlProps {
    return new SqlProps({ ...this.settings, ...patch });
  }

  /** The SQL query to execute */
  query(sql: string): SqlProps {
    return this.with({ queries: [sql], isFunction: false });
  }

  /** Name of a function to call in stored-procedure mode */
  func(name: string): SqlProps {
    return this.with({ queries: [name], isFunction: true });
  }

  parameters(parameters: readonly SqlParameter[]): SqlProps {
    return this.with({ parameters: [...parameters] });
  }

  /** Prepare the statement on the server before executing it */
  prepare(): SqlProps {
    return this.with({ needPrepare: true });
  }

  cancellationToken(signal: AbortSignal): SqlProps {
    return this.with({ signal });
  }

  clientCertificate(clientCertificate: ClientCertificate): SqlProps {
    return this.with({ clientCertificate });
  }

  driver(driver: Driver): SqlProps {
    return this.with({ driver });
  }

  // =========================================================================
  // Execution verbs
  // =========================================================================

  execute<T>(read: (row: RowReader) => T, signal?: AbortSignal): Promise<Result<T[]>> {
    return execute(read, this, signal);
  }

  executeSync<T>(read: (row: RowReader) => T): Result<T[]> {
    return executeSync(read, this);
  }

  executeRow<T>(read: (row: RowReader) => T, signal?: AbortSignal): Promise<Result<T>> {
    return executeRow(read, this, signal);
  }

  executeRowSync<T>(read: (row: RowReader) => T): Result<T> {
    return executeRowSync(read, this);
  }

  iter(perform: (row: RowReader) => void, signal?: AbortSignal): Promise<Result<void>> {
    return iter(perform, this, signal);
  }

  iterSync(perform: (row: RowReader) => void): Result<void> {
    return iterSync(perform, this);
  }

  executeNonQuery(signal?: AbortSignal): Promise<Result<number>> {
    return executeNonQuery(this, signal);
  }

  executeNonQuerySync(): Result<number> {
    return executeNonQuerySync(this);
  }

  executeTransaction(
    queries: readonly TransactionQuery[],
    signal?: AbortSignal,
  ): Promise<Result<number[]>> {
    return executeTransaction(queries, this, signal);
  }

  executeTransactionSync(queries: readonly TransactionQuery[]): Result<number[]> {
    return executeTransactionSync(queries, this);
  }
}
