/**
 * pg-fluent - Command Materializer
 *
 * Turns SqlProps into a connection and a fully bound command.
 */

import type { SqlProps } from "../config/SqlProps.js";
import type { DriverCommand, DriverConnection } from "../driver/types.js";
import { ConfigurationError } from "../types/index.js";
import type { SqlParameter } from "../values/SqlValue.js";
import { WIRE_TYPES } from "../values/SqlValue.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("COMMAND");
const connectionLog = logger.forModule("CONNECTION");

export const PARAMETER_SIGIL = "@";

/**
 * Connection plus whether this layer created it. Only owned connections are
 * closed at the end of an operation.
 */
export interface AcquiredConnection {
  connection: DriverConnection;
  owned: boolean;
}

/**
 * Reuse the target's connection or create one from the connection string
 */
export function obtainConnection(props: SqlProps): AcquiredConnection {
  const { target, driver, clientCertificate } = props.settings;
  switch (target.kind) {
    case "connectionString":
      connectionLog.debug("Creating connection", { driver: driver.name });
      return {
        connection: driver.createConnection(target.connectionString, {
          clientCertificate,
        }),
        owned: true,
      };
    case "connection":
      return { connection: target.connection, owned: false };
    case "transaction":
      return { connection: target.transaction.connection, owned: false };
    case "empty":
      throw new ConfigurationError(
        "Could not create a connection from empty parameters.",
      );
  }
}

/**
 * Command over the first configured query, bound to the target transaction
 * when there is one
 */
export function buildCommand(
  props: SqlProps,
  connection: DriverConnection,
): DriverCommand {
  const { target, queries } = props.settings;
  const [text = ""] = queries;
  switch (target.kind) {
    case "connectionString":
    case "connection":
      return connection.createCommand(text);
    case "transaction":
      return connection.createCommand(text, target.transaction);
    case "empty":
      throw new ConfigurationError(
        "Cannot create command from an empty execution target",
      );
  }
}

export function normalizeParameterName(name: string): string {
  const trimmed = name.trim();
  return trimmed.startsWith(PARAMETER_SIGIL) ? trimmed : `${PARAMETER_SIGIL}${trimmed}`;
}

/**
 * Add every binding to the command, in order, typed by its variant
 */
export function bindParameters(
  command: DriverCommand,
  bindings: readonly SqlParameter[],
): void {
  for (const [rawName, value] of bindings) {
    const name = normalizeParameterName(rawName);
    switch (value.kind) {
      case "parameter":
        command.addParameter({ ...value.value, name });
        break;
      case "null":
        command.addTypedParameter(name, WIRE_TYPES.null, null);
        break;
      case "text":
      case "int":
      case "short":
      case "tinyInt":
      case "long":
      case "bit":
      case "bool":
      case "number":
      case "decimal":
      case "money":
      case "date":
      case "timestamp":
      case "timestampTz":
      case "time":
      case "timeTz":
      case "bytea":
      case "jsonb":
      case "stringArray":
      case "intArray":
      case "uuid":
      case "uuidArray":
      case "point":
        command.addTypedParameter(name, WIRE_TYPES[value.kind], value.value);
        break;
      default: {
        const unhandled: never = value;
        throw new ConfigurationError(
          `Unsupported parameter kind: ${JSON.stringify(unhandled)}`,
        );
      }
    }
  }
}

/**
 * Apply stored-procedure mode, bind parameters and prepare when requested
 */
export function prepareCommand(props: SqlProps, command: DriverCommand): void {
  const { isFunction, parameters, needPrepare } = props.settings;
  if (isFunction) {
    command.commandType = "storedProcedure";
  }
  bindParameters(command, parameters);
  if (needPrepare) {
    log.debug("Preparing command", { parameterCount: parameters.length });
    command.prepare();
  }
}
