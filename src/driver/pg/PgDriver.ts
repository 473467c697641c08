/**
 * pg-fluent - pg Driver
 *
 * DriverConnection, DriverTransaction and DriverCommand over node-postgres.
 * Async calls go through pg; blocking calls reopen the connection through
 * pg-native (see native.ts).
 */

import { createHash } from "node:crypto";
import pg from "pg";
import type { PoolClient, QueryConfig, QueryResult, QueryResultRow } from "pg";
import type {
  CommandType,
  CreateConnectionOptions,
  Driver,
  DriverCommand,
  DriverConnection,
  DriverReader,
  DriverTransaction,
} from "../types.js";
import { RowReader } from "../RowReader.js";
import type { DriverParameter, Point, WireType } from "../../values/SqlValue.js";
import type { ClientCertificate } from "../../types/index.js";
import { UnsupportedOperationError } from "../../types/index.js";
import { logger } from "../../utils/logger.js";
import { toClientConfig, toConninfo } from "./connectionOptions.js";
import {
  columnNames,
  loadNativeClient,
  toTextParameter,
  type NativeClient,
  type NativeClientFactory,
} from "./native.js";
import {
  countParameters,
  functionCallText,
  toPositional,
  type BoundParameter,
  type PositionalQuery,
} from "./placeholders.js";

const log = logger.forModule("DRIVER");

type PgClient = pg.Client | PoolClient;

/** Rows of a blocking round trip */
export interface PgResultSet {
  rows: QueryResultRow[];
  columns: string[];
  rowCount: number;
}

/**
 * Settle with `work`, or reject with the signal's reason when it aborts first
 */
async function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal === undefined) {
    return work;
  }
  signal.throwIfAborted();

  const listener = new AbortController();
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener(
      "abort",
      () => {
        reject(signal.reason);
      },
      { once: true, signal: listener.signal },
    );
  });

  try {
    return await Promise.race([work, aborted]);
  } catch (error) {
    if (signal.aborted) {
      // the abandoned round trip still settles once the connection closes
      void work.catch((late: unknown) => {
        log.debug("Abandoned round trip settled with an error", {
          error: late instanceof Error ? late.message : String(late),
        });
      });
    }
    throw error;
  } finally {
    listener.abort();
  }
}

function toPgValue(wireType: WireType | null, value: unknown): unknown {
  switch (wireType) {
    case "bit":
      return value === true ? "1" : value === false ? "0" : value;
    case "point":
      return isPoint(value) ? `(${value.x},${value.y})` : value;
    case "bytea":
      return value instanceof Uint8Array && !Buffer.isBuffer(value)
        ? Buffer.from(value.buffer, value.byteOffset, value.byteLength)
        : value;
    default:
      return value;
  }
}

function isPoint(value: unknown): value is Point {
  return (
    typeof value === "object" &&
    value !== null &&
    "x" in value &&
    "y" in value &&
    typeof value.x === "number" &&
    typeof value.y === "number"
  );
}

function blockingUnsupported(operation: string): UnsupportedOperationError {
  return new UnsupportedOperationError(`${operation} (blocking)`, { driver: "pg" });
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Cursor over a fully received pg result
 */
export class PgReader implements DriverReader {
  private position = -1;
  readonly row: RowReader;

  constructor(private rows: readonly QueryResultRow[], columns: readonly string[]) {
    this.row = new RowReader(columns);
  }

  advance(): boolean {
    const next = this.rows[this.position + 1];
    if (next === undefined) {
      return false;
    }
    this.position++;
    this.row.setCurrent(next);
    return true;
  }

  close(): void {
    this.rows = [];
  }
}

// =============================================================================
// Command
// =============================================================================

export class PgCommand implements DriverCommand {
  commandType: CommandType = "text";
  private parameters = new Map<string, BoundParameter>();
  private prepared = false;

  constructor(
    private readonly connection: PgConnection,
    readonly text: string,
    private readonly transaction?: PgTransaction,
  ) {}

  addTypedParameter(name: string, wireType: WireType | null, value: unknown): void {
    this.parameters.set(name, { wireType, value: toPgValue(wireType, value) });
  }

  addParameter(parameter: DriverParameter): void {
    const wireType = parameter.wireType ?? null;
    this.parameters.set(parameter.name, {
      wireType,
      value: toPgValue(wireType, parameter.value),
    });
  }

  prepare(): void {
    this.prepared = true;
  }

  /**
   * Positional text and values handed to pg
   */
  toQuery(): PositionalQuery {
    const source =
      this.commandType === "storedProcedure"
        ? functionCallText(this.text, [...this.parameters.keys()])
        : this.text;
    return toPositional(source, this.parameters);
  }

  private toQueryConfig(): QueryConfig {
    const { text, values } = this.toQuery();
    if (!this.prepared) {
      return { text, values };
    }
    // same text, same server-side statement
    const name = `pgfluent_${createHash("sha1").update(text).digest("hex").slice(0, 16)}`;
    return { name, text, values };
  }

  private async run(config: QueryConfig, signal?: AbortSignal): Promise<QueryResult> {
    if (this.transaction !== undefined) {
      await this.transaction.ensureStarted(signal);
    }
    return this.connection.query(config, signal);
  }

  private runSync(config: QueryConfig): PgResultSet {
    this.transaction?.ensureStartedSync();
    return this.connection.querySync(config);
  }

  /** Distinct `@name` references; placeholders are rewritten client-side */
  deriveParameters(): number {
    return countParameters(this.text);
  }

  async deriveParametersAsync(signal: AbortSignal): Promise<number> {
    signal.throwIfAborted();
    return countParameters(this.text);
  }

  executeNonQuery(): number {
    return this.runSync(this.toQueryConfig()).rowCount;
  }

  async executeNonQueryAsync(signal: AbortSignal): Promise<number> {
    const result = await this.run(this.toQueryConfig(), signal);
    return result.rowCount ?? 0;
  }

  executeReader(): DriverReader {
    const result = this.runSync(this.toQueryConfig());
    return new PgReader(result.rows, result.columns);
  }

  async executeReaderAsync(signal: AbortSignal): Promise<DriverReader> {
    const result = await this.run(this.toQueryConfig(), signal);
    return new PgReader(
      result.rows,
      result.fields.map((field) => field.name),
    );
  }

  dispose(): void {
    this.parameters.clear();
  }
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * Sends BEGIN (or SAVEPOINT when nested) before its first command
 */
export class PgTransaction implements DriverTransaction {
  private started = false;
  private completed = false;

  constructor(
    readonly connection: PgConnection,
    private readonly parent?: PgTransaction,
    private readonly savepoint?: string,
  ) {}

  private get beginText(): string {
    return this.savepoint !== undefined ? `SAVEPOINT ${this.savepoint}` : "BEGIN";
  }

  private get commitText(): string {
    return this.savepoint !== undefined ? `RELEASE SAVEPOINT ${this.savepoint}` : "COMMIT";
  }

  private get rollbackText(): string {
    return this.savepoint !== undefined ? `ROLLBACK TO SAVEPOINT ${this.savepoint}` : "ROLLBACK";
  }

  async ensureStarted(signal?: AbortSignal): Promise<void> {
    if (this.started) return;
    if (this.parent !== undefined) {
      await this.parent.ensureStarted(signal);
    }
    await this.connection.query({ text: this.beginText }, signal);
    this.started = true;
  }

  ensureStartedSync(): void {
    if (this.started) return;
    this.parent?.ensureStartedSync();
    this.connection.querySync({ text: this.beginText });
    this.started = true;
  }

  commit(): void {
    if (this.completed) return;
    if (this.started) {
      this.connection.querySync({ text: this.commitText });
    }
    this.complete();
  }

  async commitAsync(signal?: AbortSignal): Promise<void> {
    if (this.completed) return;
    if (this.started) {
      await this.connection.query({ text: this.commitText }, signal);
    }
    this.complete();
  }

  /** Nothing is sent when no command ran */
  dispose(): void {
    if (this.completed) return;
    this.complete();
    if (this.started) {
      this.connection.querySync({ text: this.rollbackText });
    }
  }

  async disposeAsync(): Promise<void> {
    if (this.completed) return;
    this.complete();
    if (this.started) {
      await this.connection.query({ text: this.rollbackText });
    }
  }

  private complete(): void {
    this.completed = true;
    this.connection.transactionEnded(this);
  }
}

// =============================================================================
// Connection
// =============================================================================

export interface PgConnectionOptions {
  /** Opened through pg-native when a blocking call opens the connection */
  connectionString?: string | undefined;
  clientCertificate?: ClientCertificate | undefined;
  nativeClient?: NativeClientFactory | undefined;
}

export class PgConnection implements DriverConnection {
  private readonly transactions: PgTransaction[] = [];
  private readonly preparedStatements = new Set<string>();
  private connecting: Promise<void> | undefined;
  private native: NativeClient | undefined;

  /**
   * @param connected pass true for clients that are already connected
   */
  constructor(
    readonly client: PgClient,
    private connected = false,
    private readonly options: PgConnectionOptions = {},
  ) {}

  /**
   * Wrap a caller-owned client (e.g. one checked out of a pg.Pool)
   */
  static wrap(client: PgClient): PgConnection {
    return new PgConnection(client, true);
  }

  get isOpen(): boolean {
    return this.connected;
  }

  open(): void {
    const { connectionString, clientCertificate, nativeClient = loadNativeClient } = this.options;
    if (connectionString === undefined) {
      throw blockingUnsupported("open");
    }
    const conninfo = toConninfo(connectionString, clientCertificate);
    const native = nativeClient();
    try {
      native.connectSync(conninfo);
    } catch (error) {
      native.end();
      throw error;
    }
    this.native = native;
    this.connected = true;
    log.debug("Connection opened", { blocking: true });
  }

  async openAsync(signal: AbortSignal): Promise<void> {
    const connecting = this.client.connect();
    this.connecting = connecting;
    await abortable(connecting, signal);
    this.connected = true;
    log.debug("Connection opened");
  }

  close(): void {
    const native = this.native;
    if (native === undefined) {
      // only a connection that never opened can be closed without pg-native
      if (this.connected || this.connecting !== undefined) {
        throw blockingUnsupported("close");
      }
      return;
    }
    this.native = undefined;
    this.connected = false;
    this.preparedStatements.clear();
    native.end();
    log.debug("Connection closed", { blocking: true });
  }

  async closeAsync(): Promise<void> {
    if (this.native !== undefined) {
      this.close();
      return;
    }

    const connecting = this.connecting;
    this.connecting = undefined;
    if (!this.connected) {
      if (connecting === undefined) return;
      // an abandoned open still completes; end the client once it has
      try {
        await connecting;
      } catch (error) {
        log.debug("Abandoned connection attempt failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        return;
      }
    }

    this.connected = false;
    if ("release" in this.client) {
      this.client.release();
    } else {
      await this.client.end();
    }
    log.debug("Connection closed");
  }

  beginTransaction(): PgTransaction {
    const parent = this.transactions.at(-1);
    const transaction =
      parent === undefined
        ? new PgTransaction(this)
        : new PgTransaction(this, parent, `pgfluent_sp_${this.transactions.length}`);
    this.transactions.push(transaction);
    return transaction;
  }

  /** Called by a transaction once it commits or rolls back */
  transactionEnded(transaction: PgTransaction): void {
    const index = this.transactions.indexOf(transaction);
    if (index >= 0) {
      this.transactions.splice(index, 1);
    }
  }

  createCommand(text: string, transaction?: DriverTransaction): PgCommand {
    if (transaction === undefined) {
      return new PgCommand(this, text);
    }
    if (!(transaction instanceof PgTransaction) || transaction.connection !== this) {
      throw new UnsupportedOperationError("createCommand with a foreign transaction", {
        driver: "pg",
      });
    }
    return new PgCommand(this, text, transaction);
  }

  async query(config: QueryConfig, signal?: AbortSignal): Promise<QueryResult> {
    const startTime = Date.now();
    const result = await abortable(this.client.query(config), signal);
    log.debug("Query executed", {
      sql: config.text.substring(0, 100),
      rowCount: result.rowCount,
      durationMs: Date.now() - startTime,
    });
    return result;
  }

  /**
   * Blocking round trip over pg-native. Named configs are prepared once per
   * connection.
   */
  querySync(config: QueryConfig): PgResultSet {
    const native = this.native;
    if (native === undefined) {
      throw blockingUnsupported("query");
    }
    const startTime = Date.now();
    const values = (config.values ?? []).map(toTextParameter);

    let rows: QueryResultRow[];
    if (config.name !== undefined) {
      if (!this.preparedStatements.has(config.name)) {
        native.prepareSync(config.name, config.text, values.length);
        this.preparedStatements.add(config.name);
      }
      rows = native.executeSync(config.name, values);
    } else {
      rows = values.length > 0 ? native.querySync(config.text, values) : native.querySync(config.text);
    }

    const result: PgResultSet = {
      rows,
      columns: columnNames(native.pq),
      rowCount: Number(native.pq.cmdTuples()),
    };
    log.debug("Query executed", {
      sql: config.text.substring(0, 100),
      rowCount: result.rowCount,
      durationMs: Date.now() - startTime,
      blocking: true,
    });
    return result;
  }
}

export interface PgDriverOptions {
  /** Source of blocking clients; pg-native by default */
  nativeClient?: NativeClientFactory | undefined;
}

export function createPgDriver(driverOptions: PgDriverOptions = {}): Driver {
  return {
    name: "pg",
    createConnection(
      connectionString: string,
      options: CreateConnectionOptions = {},
    ): PgConnection {
      return new PgConnection(
        new pg.Client(toClientConfig(connectionString, options.clientCertificate)),
        false,
        {
          connectionString,
          clientCertificate: options.clientCertificate,
          nativeClient: driverOptions.nativeClient,
        },
      );
    },
  };
}

export const pgDriver: Driver = createPgDriver();
