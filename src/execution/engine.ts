/**
 * pg-fluent - Execution Engine
 *
 * Single-statement verbs. Each verb is one routine run either blocking
 * (`*Sync`) or yielding; both share validation, connection ownership and
 * fault wrapping.
 */

import type { SqlProps } from "../config/SqlProps.js";
import type { DriverCommand, DriverReader } from "../driver/types.js";
import type { RowReader } from "../driver/RowReader.js";
import type { Failure, Result } from "../types/index.js";
import {
  ConfigurationError,
  MissingQueryError,
  NoResultsError,
  failure,
  success,
  toError,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import {
  buildCommand,
  obtainConnection,
  prepareCommand,
} from "./materialize.js";
import {
  mergeSignals,
  release,
  roundTrip,
  runBlocking,
  runYielding,
  type Routine,
} from "./suspension.js";

const log = logger.forModule("EXECUTION");

export type RowDecoder<T> = (row: RowReader) => T;

/**
 * Open (when needed), run `use` against a prepared command, then release the
 * command and, when this layer created it, the connection
 */
export function* withPreparedCommand<T>(
  props: SqlProps,
  use: (command: DriverCommand) => Routine<T>,
): Routine<T> {
  if (props.settings.queries.length === 0) {
    throw new MissingQueryError();
  }

  const { connection, owned } = obtainConnection(props);
  log.debug("Connection acquired", { owned });
  try {
    if (!connection.isOpen) {
      yield* roundTrip(
        () => connection.open(),
        (signal) => connection.openAsync(signal),
      );
    }
    const command = buildCommand(props, connection);
    try {
      prepareCommand(props, command);
      return yield* use(command);
    } finally {
      command.dispose();
    }
  } finally {
    if (owned) {
      yield* release(
        () => connection.close(),
        () => connection.closeAsync(),
      );
    }
  }
}

function* openReader(command: DriverCommand): Routine<DriverReader> {
  return yield* roundTrip(
    () => command.executeReader(),
    (signal) => command.executeReaderAsync(signal),
  );
}

function* readAll<T>(props: SqlProps, read: RowDecoder<T>): Routine<T[]> {
  return yield* withPreparedCommand<T[]>(props, function* (command) {
    const reader = yield* openReader(command);
    try {
      const rows: T[] = [];
      while (reader.advance()) {
        rows.push(read(reader.row));
      }
      return rows;
    } finally {
      reader.close();
    }
  });
}

function* readFirst<T>(props: SqlProps, read: RowDecoder<T>): Routine<T> {
  return yield* withPreparedCommand<T>(props, function* (command) {
    const reader = yield* openReader(command);
    try {
      if (!reader.advance()) {
        throw new NoResultsError();
      }
      return read(reader.row);
    } finally {
      reader.close();
    }
  });
}

function* readEach(props: SqlProps, perform: RowDecoder<void>): Routine<void> {
  yield* withPreparedCommand<void>(props, function* (command) {
    const reader = yield* openReader(command);
    try {
      while (reader.advance()) {
        perform(reader.row);
      }
    } finally {
      reader.close();
    }
  });
}

function* countAffected(props: SqlProps): Routine<number> {
  return yield* withPreparedCommand<number>(props, (command) =>
    roundTrip(
      () => command.executeNonQuery(),
      (signal) => command.executeNonQueryAsync(signal),
    ),
  );
}

// =============================================================================
// Fault wrapping
// =============================================================================

/**
 * Wrap a fault as a failure. Configuration errors are programmer mistakes
 * and keep propagating.
 */
export function toFailure(
  operation: string,
  fault: unknown,
  code = "SQL_EXECUTION_FAILED",
): Failure {
  if (fault instanceof ConfigurationError) {
    throw fault;
  }
  const error = toError(fault);
  log.error(`${operation} failed: ${error.message}`, {
    code,
    operation,
    errorName: error.name,
  });
  return failure(error);
}

export function runGuardedSync<T>(
  operation: string,
  routine: Routine<T>,
): Result<T> {
  const startTime = Date.now();
  try {
    const data = runBlocking(routine);
    log.debug(`${operation} completed`, { durationMs: Date.now() - startTime });
    return success(data);
  } catch (error) {
    return toFailure(operation, error);
  }
}

export async function runGuarded<T>(
  operation: string,
  props: SqlProps,
  routine: Routine<T>,
  signal?: AbortSignal,
): Promise<Result<T>> {
  const startTime = Date.now();
  try {
    const data = await runYielding(
      routine,
      mergeSignals(props.settings.signal, signal),
    );
    log.debug(`${operation} completed`, { durationMs: Date.now() - startTime });
    return success(data);
  } catch (error) {
    return toFailure(operation, error);
  }
}

// =============================================================================
// Verbs
// =============================================================================

/**
 * Run the query and decode every row, in server order
 */
export function execute<T>(
  read: RowDecoder<T>,
  props: SqlProps,
  signal?: AbortSignal,
): Promise<Result<T[]>> {
  return runGuarded("execute", props, readAll(props, read), signal);
}

export function executeSync<T>(read: RowDecoder<T>, props: SqlProps): Result<T[]> {
  return runGuardedSync("executeSync", readAll(props, read));
}

/**
 * Decode the first row only; an empty result set is a NoResultsError failure
 */
export function executeRow<T>(
  read: RowDecoder<T>,
  props: SqlProps,
  signal?: AbortSignal,
): Promise<Result<T>> {
  return runGuarded("executeRow", props, readFirst(props, read), signal);
}

export function executeRowSync<T>(read: RowDecoder<T>, props: SqlProps): Result<T> {
  return runGuardedSync("executeRowSync", readFirst(props, read));
}

/**
 * Call `perform` for each row without collecting results. Rows already
 * handled stay handled if a later row fails.
 */
export function iter(
  perform: RowDecoder<void>,
  props: SqlProps,
  signal?: AbortSignal,
): Promise<Result<void>> {
  return runGuarded("iter", props, readEach(props, perform), signal);
}

export function iterSync(perform: RowDecoder<void>, props: SqlProps): Result<void> {
  return runGuardedSync("iterSync", readEach(props, perform));
}

/**
 * Execute the query and return the number of rows affected
 */
export function executeNonQuery(
  props: SqlProps,
  signal?: AbortSignal,
): Promise<Result<number>> {
  return runGuarded("executeNonQuery", props, countAffected(props), signal);
}

export function executeNonQuerySync(props: SqlProps): Result<number> {
  return runGuardedSync("executeNonQuerySync", countAffected(props));
}
