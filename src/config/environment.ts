/**
 * pg-fluent - Environment Configuration
 *
 * Connection descriptor from the libpq-style PG* variables (with POSTGRES_*
 * fallbacks), validated with zod.
 */

import { z } from "zod";
import type { ConnectionDescriptor } from "../types/index.js";
import { SslMode, ValidationError } from "../types/index.js";
import { DEFAULT_PORT } from "./ConnectionStringBuilder.js";

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === "" ? undefined : value));

const EnvironmentSchema = z.object({
  host: optionalText.transform((value) => value ?? "localhost"),
  port: optionalText.pipe(
    z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  ),
  username: optionalText,
  password: optionalText,
  database: optionalText.transform((value) => value ?? "postgres"),
  sslMode: optionalText.transform((value): SslMode | undefined => {
    switch (value?.toLowerCase()) {
      case undefined:
        return undefined;
      case "disable":
      case "allow":
        return SslMode.Disable;
      case "prefer":
        return SslMode.Prefer;
      default:
        // require, verify-ca, verify-full
        return SslMode.Require;
    }
  }),
});

/**
 * Build a descriptor from PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE and
 * PGSSLMODE
 */
export function connectionDescriptorFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ConnectionDescriptor {
  const parsed = EnvironmentSchema.safeParse({
    host: env["PGHOST"] ?? env["POSTGRES_HOST"],
    port: env["PGPORT"] ?? env["POSTGRES_PORT"],
    username: env["PGUSER"] ?? env["POSTGRES_USER"],
    password: env["PGPASSWORD"] ?? env["POSTGRES_PASSWORD"],
    database: env["PGDATABASE"] ?? env["POSTGRES_DATABASE"],
    sslMode: env["PGSSLMODE"],
  });

  if (!parsed.success) {
    throw new ValidationError("Invalid PostgreSQL environment configuration", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  }

  const descriptor: ConnectionDescriptor = {
    host: parsed.data.host,
    port: parsed.data.port,
    database: parsed.data.database,
  };
  if (parsed.data.username !== undefined) descriptor.username = parsed.data.username;
  if (parsed.data.password !== undefined) descriptor.password = parsed.data.password;
  if (parsed.data.sslMode !== undefined) descriptor.sslMode = parsed.data.sslMode;
  return descriptor;
}
