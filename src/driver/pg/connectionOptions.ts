/**
 * pg-fluent - pg Connection Options
 *
 * Maps a `Key=Value;...` connection string onto a pg ClientConfig.
 */

import type { ClientConfig } from "pg";
import { z } from "zod";
import type { ClientCertificate } from "../../types/index.js";
import { UnsupportedOperationError, ValidationError } from "../../types/index.js";
import { logger } from "../../utils/logger.js";

const log = logger.forModule("DRIVER");

/** Canonical key for each accepted spelling (lowercase, spaces removed) */
const KEY_ALIASES: Readonly<Record<string, string>> = {
  host: "host",
  server: "host",
  port: "port",
  database: "database",
  db: "database",
  username: "user",
  user: "user",
  userid: "user",
  password: "password",
  pwd: "password",
  psw: "password",
  sslmode: "sslMode",
  trustservercertificate: "trustServerCertificate",
  convertinfinitydatetime: "convertInfinityDateTime",
  applicationname: "applicationName",
  timeout: "timeout",
  commandtimeout: "commandTimeout",
  searchpath: "searchPath",
};

/** Keys whose values are matched case-insensitively */
const ENUM_KEYS: ReadonlySet<string> = new Set([
  "sslMode",
  "trustServerCertificate",
  "convertInfinityDateTime",
]);

const booleanText = z
  .enum(["true", "false"], {
    errorMap: () => ({ message: "Expected true or false" }),
  })
  .transform((value) => value === "true");

const seconds = z.coerce.number().int().min(0);

const ConnectionOptionsSchema = z.object({
  host: z.string().min(1).default("localhost"),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  database: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  sslMode: z.enum(["disable", "prefer", "require"]).optional(),
  trustServerCertificate: booleanText.optional(),
  convertInfinityDateTime: booleanText.optional(),
  applicationName: z.string().optional(),
  timeout: seconds.optional(),
  commandTimeout: seconds.optional(),
  searchPath: z.string().optional(),
});

export type ConnectionOptions = z.infer<typeof ConnectionOptionsSchema>;

/**
 * Read one value starting at `start`. A value opening with `"` or `'` runs to
 * the matching quote, with the quote doubled inside; a bare value runs to the
 * next `;` and is trimmed. Returns the value and the index of its `;`.
 */
function readValue(text: string, start: number): { value: string; end: number } {
  let i = start;
  while (i < text.length && /\s/.test(text.charAt(i))) i++;

  const quote = text.charAt(i);
  if (quote !== '"' && quote !== "'") {
    const stop = text.indexOf(";", start);
    const end = stop < 0 ? text.length : stop;
    return { value: text.slice(start, end).trim(), end };
  }

  let value = "";
  let j = i + 1;
  for (;;) {
    if (j >= text.length) {
      throw new ValidationError(`Unterminated quoted connection string value: '${text.slice(i)}'`);
    }
    const ch = text.charAt(j);
    if (ch === quote) {
      if (text.charAt(j + 1) !== quote) break;
      j++;
    }
    value += ch;
    j++;
  }

  let end = j + 1;
  while (end < text.length && /\s/.test(text.charAt(end))) end++;
  if (end < text.length && text.charAt(end) !== ";") {
    throw new ValidationError(`Unexpected text after quoted value: '${text.slice(i).trim()}'`);
  }
  return { value, end };
}

/**
 * Split `Key=Value;...` into canonical keys. Keys are case-insensitive and
 * ignore spaces; quoted values may contain `;`; unknown keys are dropped.
 */
export function parseConnectionString(connectionString: string): Record<string, string> {
  const entries: Record<string, string> = {};
  let i = 0;

  while (i < connectionString.length) {
    const segmentEnd = connectionString.indexOf(";", i);
    const separator = connectionString.indexOf("=", i);
    if (separator < 0 || (segmentEnd >= 0 && segmentEnd < separator)) {
      const segment = connectionString.slice(i, segmentEnd < 0 ? undefined : segmentEnd);
      if (segment.trim() !== "") {
        throw new ValidationError(`Malformed connection string segment: '${segment.trim()}'`);
      }
      if (segmentEnd < 0) break;
      i = segmentEnd + 1;
      continue;
    }

    const rawKey = connectionString.slice(i, separator).replace(/\s+/g, "").toLowerCase();
    const { value, end } = readValue(connectionString, separator + 1);
    i = end + 1;

    const key = KEY_ALIASES[rawKey];
    if (key === undefined) {
      log.debug("Ignoring unknown connection string key", { key: rawKey });
      continue;
    }
    entries[key] = ENUM_KEYS.has(key) ? value.toLowerCase() : value;
  }

  return entries;
}

export function parseConnectionOptions(connectionString: string): ConnectionOptions {
  const parsed = ConnectionOptionsSchema.safeParse(parseConnectionString(connectionString));
  if (!parsed.success) {
    throw new ValidationError("Invalid connection string", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  }
  return parsed.data;
}

// pg has no opportunistic TLS, so Prefer connects with TLS like Require
function tlsRequested(options: ConnectionOptions, clientCertificate?: ClientCertificate): boolean {
  return (
    options.sslMode === "prefer" ||
    options.sslMode === "require" ||
    (options.sslMode === undefined && clientCertificate !== undefined)
  );
}

/**
 * Build the pg client configuration for a connection string
 */
export function toClientConfig(
  connectionString: string,
  clientCertificate?: ClientCertificate,
): ClientConfig {
  const options = parseConnectionOptions(connectionString);

  const config: ClientConfig = {
    host: options.host,
    port: options.port,
  };
  if (options.database !== undefined && options.database !== "") {
    config.database = options.database;
  }
  if (options.user !== undefined) config.user = options.user;
  if (options.password !== undefined) config.password = options.password;
  if (options.applicationName !== undefined) {
    config.application_name = options.applicationName;
  }
  if (options.timeout !== undefined) {
    config.connectionTimeoutMillis = options.timeout * 1000;
  }
  if (options.commandTimeout !== undefined && options.commandTimeout > 0) {
    config.statement_timeout = options.commandTimeout * 1000;
  }
  if (options.searchPath !== undefined) {
    config.options = `-c search_path=${options.searchPath}`;
  }

  if (tlsRequested(options, clientCertificate)) {
    config.ssl = {
      rejectUnauthorized: options.trustServerCertificate !== true,
      ...(clientCertificate !== undefined
        ? {
            cert: clientCertificate.cert,
            key: clientCertificate.key,
            passphrase: clientCertificate.passphrase,
          }
        : {}),
    };
  } else if (options.sslMode === "disable") {
    config.ssl = false;
  }

  return config;
}

function quoteConninfo(value: string): string {
  return `'${value.replace(/[\\']/g, (ch) => `\\${ch}`)}'`;
}

/**
 * libpq conninfo (`host='db' port='5432' ...`) for the blocking client.
 * TLS follows toClientConfig: verify-full unless the server certificate is
 * trusted. libpq reads client certificates from files only.
 */
export function toConninfo(
  connectionString: string,
  clientCertificate?: ClientCertificate,
): string {
  const options = parseConnectionOptions(connectionString);
  const tls = tlsRequested(options, clientCertificate);
  if (tls && clientCertificate !== undefined) {
    throw new UnsupportedOperationError("client certificate (blocking)", { driver: "pg" });
  }

  const serverOptions: string[] = [];
  if (options.commandTimeout !== undefined && options.commandTimeout > 0) {
    serverOptions.push(`-c statement_timeout=${options.commandTimeout * 1000}`);
  }
  if (options.searchPath !== undefined) {
    serverOptions.push(`-c search_path=${options.searchPath}`);
  }

  const pairs: [string, string | number | undefined][] = [
    ["host", options.host],
    ["port", options.port],
    ["dbname", options.database !== "" ? options.database : undefined],
    ["user", options.user],
    ["password", options.password],
    ["application_name", options.applicationName],
    ["connect_timeout", options.timeout],
    ["options", serverOptions.length > 0 ? serverOptions.join(" ") : undefined],
    [
      "sslmode",
      !tls ? "disable" : options.trustServerCertificate === true ? "require" : "verify-full",
    ],
  ];

  const conninfo: string[] = [];
  for (const [key, value] of pairs) {
    if (value !== undefined) {
      conninfo.push(`${key}=${quoteConninfo(String(value))}`);
    }
  }
  return conninfo.join(" ");
}
