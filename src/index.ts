/**
 * pg-fluent - Fluent PostgreSQL execution layer
 */

export { Sql } from "./Sql.js";
export { SqlProps } from "./config/SqlProps.js";
export type { ExecutionTarget, SqlSettings } from "./config/SqlProps.js";
export {
  ConnectionStringBuilder,
  DEFAULT_PORT,
  formatConnectionString,
  fromUri,
  isPostgresUri,
  parseUri,
  quoteValue,
} from "./config/ConnectionStringBuilder.js";
export { connectionDescriptorFromEnv } from "./config/environment.js";

export * from "./types/index.js";
export * from "./values/SqlValue.js";

export type * from "./driver/types.js";
export { RowReader } from "./driver/RowReader.js";
export type { RowValues } from "./driver/RowReader.js";
export {
  PgCommand,
  PgConnection,
  PgReader,
  PgTransaction,
  createPgDriver,
  pgDriver,
} from "./driver/pg/PgDriver.js";
export type { PgConnectionOptions, PgDriverOptions, PgResultSet } from "./driver/pg/PgDriver.js";
export { loadNativeClient } from "./driver/pg/native.js";
export type { NativeClient, NativeClientFactory } from "./driver/pg/native.js";

export {
  bindParameters,
  buildCommand,
  normalizeParameterName,
  obtainConnection,
  prepareCommand,
} from "./execution/materialize.js";
export type { AcquiredConnection } from "./execution/materialize.js";
export type { RowDecoder } from "./execution/engine.js";
export type { ParameterSet, TransactionQuery } from "./execution/transaction.js";

export {
  configureLoggerFromEnv,
  logger,
} from "./utils/logger.js";
export type { LogContext, LogLevel, LogModule } from "./utils/logger.js";
