/**
 * pg-fluent - Connection Types
 *
 * Structured connection descriptor and client certificate configuration.
 */

/**
 * How to manage SSL
 */
export enum SslMode {
  /** SSL is disabled. If the server requires SSL, the connection will fail. */
  Disable = "Disable",
  /** Prefer SSL connections if the server allows them, but allow connections without SSL. */
  Prefer = "Prefer",
  /** Fail the connection if the server doesn't support SSL. */
  Require = "Require",
}

/**
 * Structured form of a connection string
 */
export interface ConnectionDescriptor {
  host: string;
  database: string;
  username?: string | undefined;
  password?: string | undefined;
  /** Defaults to 5432 when created through the builder */
  port?: number | undefined;
  sslMode?: SslMode | undefined;
  trustServerCertificate?: boolean | undefined;
  convertInfinityDateTime?: boolean | undefined;
  /** Free-form `Key=Value;...` options appended verbatim */
  extra?: string | undefined;
}

/**
 * Client certificate presented during the TLS handshake
 */
export interface ClientCertificate {
  cert: string | Buffer;
  key: string | Buffer;
  passphrase?: string | undefined;
}
