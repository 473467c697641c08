/**
 * pg-fluent - Named Placeholder Rewriting
 *
 * pg only understands positional `$n` parameters. These helpers rewrite
 * `@name` references outside literals, quoted identifiers, dollar-quoted
 * bodies and comments.
 */

import type { WireType } from "../../values/SqlValue.js";

export interface BoundParameter {
  wireType: WireType | null;
  value: unknown;
}

export interface PositionalQuery {
  text: string;
  values: unknown[];
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * Walk the SQL text and let `replace` decide what each `@name` becomes.
 * Returning undefined keeps the original text.
 */
export function rewriteParameters(
  sql: string,
  replace: (name: string) => string | undefined,
): string {
  let output = "";
  let i = 0;

  while (i < sql.length) {
    const ch = sql.charAt(i);
    const next = sql.charAt(i + 1);

    // 'literal', with E'' strings honouring backslash escapes
    if (ch === "'") {
      const escapes = /[eE]/.test(sql.charAt(i - 1)) && !IDENT_PART.test(sql.charAt(i - 2));
      let j = i + 1;
      while (j < sql.length) {
        const c = sql.charAt(j);
        if (escapes && c === "\\") {
          j += 2;
          continue;
        }
        if (c === "'") {
          if (sql.charAt(j + 1) === "'") {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      output += sql.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    // "quoted identifier"
    if (ch === '"') {
      let j = i + 1;
      while (j < sql.length) {
        if (sql.charAt(j) === '"') {
          if (sql.charAt(j + 1) === '"') {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      output += sql.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    // -- line comment
    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i);
      const stop = end < 0 ? sql.length : end;
      output += sql.slice(i, stop);
      i = stop;
      continue;
    }

    // /* block comment */, nestable
    if (ch === "/" && next === "*") {
      let depth = 1;
      let j = i + 2;
      while (j < sql.length && depth > 0) {
        if (sql.startsWith("/*", j)) {
          depth++;
          j += 2;
        } else if (sql.startsWith("*/", j)) {
          depth--;
          j += 2;
        } else {
          j++;
        }
      }
      output += sql.slice(i, j);
      i = j;
      continue;
    }

    // $tag$ ... $tag$
    if (ch === "$" && !IDENT_PART.test(sql.charAt(i - 1))) {
      const delimiter = DOLLAR_TAG.exec(sql.slice(i))?.[0];
      if (delimiter !== undefined) {
        const close = sql.indexOf(delimiter, i + delimiter.length);
        const stop = close < 0 ? sql.length : close + delimiter.length;
        output += sql.slice(i, stop);
        i = stop;
        continue;
      }
    }

    // @name, but not operators such as @> or @@
    if (ch === "@" && IDENT_START.test(next) && !/[A-Za-z0-9_@$]/.test(sql.charAt(i - 1))) {
      let j = i + 1;
      while (j < sql.length && IDENT_PART.test(sql.charAt(j))) j++;
      const name = sql.slice(i, j);
      output += replace(name) ?? name;
      i = j;
      continue;
    }

    output += ch;
    i++;
  }

  return output;
}

/**
 * Replace bound `@name` references with `$n::type`. A name referenced twice
 * reuses its position; names without a binding stay as written.
 */
export function toPositional(
  sql: string,
  parameters: ReadonlyMap<string, BoundParameter>,
): PositionalQuery {
  const positions = new Map<string, number>();
  const values: unknown[] = [];

  const text = rewriteParameters(sql, (name) => {
    const bound = parameters.get(name);
    if (bound === undefined) return undefined;

    let position = positions.get(name);
    if (position === undefined) {
      values.push(bound.value);
      position = values.length;
      positions.set(name, position);
    }
    return bound.wireType === null ? `$${position}` : `$${position}::${bound.wireType}`;
  });

  return { text, values };
}

/**
 * Number of distinct `@name` references, i.e. the parameters the statement
 * expects once rewritten
 */
export function countParameters(sql: string): number {
  const names = new Set<string>();
  rewriteParameters(sql, (name) => {
    names.add(name);
    return undefined;
  });
  return names.size;
}

/**
 * `SELECT * FROM fn(a => @a, ...)` for stored-procedure mode
 */
export function functionCallText(functionName: string, parameterNames: readonly string[]): string {
  const args = parameterNames.map((name) => `${name.slice(1)} => ${name}`);
  return `SELECT * FROM ${functionName}(${args.join(", ")})`;
}
