/**
 * pg-fluent - Blocking pg Client
 *
 * The blocking half of the pg driver runs on pg-native, the libpq binding
 * that ships next to pg. It is an optional dependency loaded on first use;
 * without it blocking calls fail with UnsupportedOperationError.
 */

import { createRequire } from "node:module";
import type { QueryResultRow } from "pg";
import { UnsupportedOperationError } from "../../types/index.js";

/** libpq handle of the last result */
export interface NativeResultInfo {
  cmdTuples(): string;
  nfields(): number;
  fname(index: number): string;
}

/**
 * The part of the pg-native client the driver uses
 */
export interface NativeClient {
  readonly pq: NativeResultInfo;
  connectSync(conninfo?: string): void;
  querySync(text: string, values?: (string | null)[]): QueryResultRow[];
  prepareSync(statementName: string, text: string, nParams: number): void;
  executeSync(statementName: string, values: (string | null)[]): QueryResultRow[];
  end(callback?: () => void): void;
}

export type NativeClientFactory = () => NativeClient;

const requireOptional = createRequire(import.meta.url);

function isNativeClientConstructor(value: unknown): value is new () => NativeClient {
  return typeof value === "function";
}

export const loadNativeClient: NativeClientFactory = () => {
  let loaded: unknown;
  try {
    loaded = requireOptional("pg-native");
  } catch (error) {
    throw new UnsupportedOperationError("blocking execution without pg-native", {
      driver: "pg",
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (!isNativeClientConstructor(loaded)) {
    throw new UnsupportedOperationError("blocking execution without pg-native", {
      driver: "pg",
    });
  }
  return new loaded();
};

function arrayElement(value: unknown): string {
  if (value === null || value === undefined) return "NULL";
  const text = toTextParameter(value) ?? "";
  return `"${text.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}

/**
 * Text form of a parameter value, as libpq sends it
 */
export function toTextParameter(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Uint8Array) {
    return `\\x${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")}`;
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `{${value.map(arrayElement).join(",")}}`;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Column names of the last result
 */
export function columnNames(info: NativeResultInfo): string[] {
  return Array.from({ length: info.nfields() }, (_, index) => info.fname(index));
}
