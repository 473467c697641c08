/**
 * pg-fluent - Driver Boundary
 *
 * The narrow surface the execution engine consumes. Every round trip comes
 * as a blocking method and an AbortSignal-aware async twin; a driver without
 * a synchronous surface throws UnsupportedOperationError from the blocking
 * half.
 */

import type { ClientCertificate } from "../types/index.js";
import type { DriverParameter, WireType } from "../values/SqlValue.js";
import type { RowReader } from "./RowReader.js";

export type CommandType = "text" | "storedProcedure";

/**
 * Forward-only cursor over a result set
 */
export interface DriverReader {
  /** Moves to the next row; false once the set is exhausted */
  advance(): boolean;
  /** Column accessors for the current row */
  readonly row: RowReader;
  close(): void;
}

export interface DriverCommand {
  readonly text: string;
  commandType: CommandType;
  addTypedParameter(name: string, wireType: WireType | null, value: unknown): void;
  addParameter(parameter: DriverParameter): void;
  prepare(): void;

  /** How many parameters the command text expects */
  deriveParameters(): number;
  deriveParametersAsync(signal: AbortSignal): Promise<number>;

  executeNonQuery(): number;
  executeNonQueryAsync(signal: AbortSignal): Promise<number>;

  executeReader(): DriverReader;
  executeReaderAsync(signal: AbortSignal): Promise<DriverReader>;

  dispose(): void;
}

export interface DriverTransaction {
  readonly connection: DriverConnection;
  commit(): void;
  commitAsync(signal: AbortSignal): Promise<void>;
  /** Rolls back when the transaction was never committed */
  dispose(): void;
  disposeAsync(): Promise<void>;
}

export interface DriverConnection {
  readonly isOpen: boolean;
  open(): void;
  openAsync(signal: AbortSignal): Promise<void>;
  close(): void;
  closeAsync(): Promise<void>;
  beginTransaction(): DriverTransaction;
  createCommand(text: string, transaction?: DriverTransaction): DriverCommand;
}

export interface CreateConnectionOptions {
  clientCertificate?: ClientCertificate | undefined;
}

/**
 * Creates unopened connections from connection strings
 */
export interface Driver {
  readonly name: string;
  createConnection(
    connectionString: string,
    options?: CreateConnectionOptions,
  ): DriverConnection;
}
