/**
 * pg-fluent - Batch Transactional Execution
 *
 * Runs an ordered list of statements, each repeated over its parameter sets,
 * inside one transaction. Either every statement commits or none does.
 */

import type { SqlProps } from "../config/SqlProps.js";
import type { DriverCommand } from "../driver/types.js";
import type { Result } from "../types/index.js";
import { success } from "../types/index.js";
import type { SqlParameter } from "../values/SqlValue.js";
import { logger } from "../utils/logger.js";
import { bindParameters, obtainConnection } from "./materialize.js";
import {
  mergeSignals,
  release,
  roundTrip,
  runBlocking,
  runYielding,
  type Routine,
} from "./suspension.js";
import { toFailure } from "./engine.js";

const log = logger.forModule("TRANSACTION");

export type ParameterSet = readonly SqlParameter[];

/** Statement text with the parameter sets to run it with */
export type TransactionQuery = readonly [
  query: string,
  parameterSets: readonly ParameterSet[],
];

function* nonQuery(command: DriverCommand): Routine<number> {
  return yield* roundTrip(
    () => command.executeNonQuery(),
    (signal) => command.executeNonQueryAsync(signal),
  );
}

function* runBatch(
  queries: readonly TransactionQuery[],
  props: SqlProps,
): Routine<number[]> {
  if (queries.length === 0) {
    return [];
  }

  const { connection, owned } = obtainConnection(props);
  try {
    if (!connection.isOpen) {
      yield* roundTrip(
        () => connection.open(),
        (signal) => connection.openAsync(signal),
      );
    }

    const transaction = connection.beginTransaction();
    try {
      const affectedRowsByQuery: number[] = [];

      for (const [query, parameterSets] of queries) {
        if (parameterSets.length === 0) {
          const command = connection.createCommand(query, transaction);
          try {
            const expected = yield* roundTrip(
              () => command.deriveParameters(),
              (signal) => command.deriveParametersAsync(signal),
            );
            if (expected === 0) {
              affectedRowsByQuery.push(yield* nonQuery(command));
            } else {
              // a parameterized statement without parameter sets is a no-op
              log.debug("Skipping parameterized statement with no parameter sets", {
                expectedParameters: expected,
              });
              affectedRowsByQuery.push(0);
            }
          } finally {
            command.dispose();
          }
          continue;
        }

        for (const parameterSet of parameterSets) {
          const command = connection.createCommand(query, transaction);
          try {
            bindParameters(command, parameterSet);
            affectedRowsByQuery.push(yield* nonQuery(command));
          } finally {
            command.dispose();
          }
        }
      }

      yield* roundTrip(
        () => transaction.commit(),
        (signal) => transaction.commitAsync(signal),
      );
      log.debug("Transaction committed", {
        statements: affectedRowsByQuery.length,
      });
      return affectedRowsByQuery;
    } finally {
      // rolls back when the commit above was not reached
      yield* release(
        () => transaction.dispose(),
        () => transaction.disposeAsync(),
      );
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

/**
 * Execute every statement in one transaction and return the affected-row
 * count of each execution, in order
 */
export async function executeTransaction(
  queries: readonly TransactionQuery[],
  props: SqlProps,
  signal?: AbortSignal,
): Promise<Result<number[]>> {
  try {
    const counts = await runYielding(
      runBatch(queries, props),
      mergeSignals(props.settings.signal, signal),
    );
    return success(counts);
  } catch (error) {
    return toFailure("executeTransaction", error, "SQL_TRANSACTION_FAILED");
  }
}

export function executeTransactionSync(
  queries: readonly TransactionQuery[],
  props: SqlProps,
): Result<number[]> {
  try {
    return success(runBlocking(runBatch(queries, props)));
  } catch (error) {
    return toFailure("executeTransactionSync", error, "SQL_TRANSACTION_FAILED");
  }
}
