/* ------------------------------------------------------------------
 * value.ts  •  Parameter tree shared by signing and wire encoding
 * ------------------------------------------------------------------
 *  ▸ scalar / sequence / mapping   – constructors
 *  ▸ toParamValue(input)           – plain JS value → ParamValue
 *  ▸ isEmpty(value)                – emptiness rule used by every stage
 *  ▸ scalarText(value)             – canonical text of a scalar
 * ------------------------------------------------------------------ */

import { ValidationError } from "../errors";

export type ScalarValue = string | number | boolean | null;

export interface Scalar {
  readonly kind: "scalar";
  readonly value: ScalarValue;
}

export interface Sequence {
  readonly kind: "sequence";
  readonly items: readonly ParamValue[];
}

/** Keys keep insertion order; Map is used so integer-like keys do too */
export interface Mapping {
  readonly kind: "mapping";
  readonly entries: ReadonlyMap<string, ParamValue>;
}

export type ParamValue = Scalar | Sequence | Mapping;

/** Values callers write parameters in */
export type ParamInput =
  | ScalarValue
  | undefined
  | ParamValue
  | readonly ParamInput[]
  | { readonly [key: string]: ParamInput };

export type ParamRecord = { readonly [key: string]: ParamInput };

/** Nodes made by the constructors below; anything else is caller data */
const built = new WeakSet<object>();

function register<T extends ParamValue>(node: T): T {
  built.add(node);
  Object.freeze(node);
  return node;
}

export function scalar(value: ScalarValue): Scalar {
  return register({ kind: "scalar", value });
}

export function sequence(items: Iterable<ParamValue>): Sequence {
  return register({ kind: "sequence", items: Object.freeze([...items]) });
}

export function mapping(
  entries: Iterable<readonly [string, ParamValue]>
): Mapping {
  return register({ kind: "mapping", entries: new Map(entries) });
}

/**
 * Returns a new mapping with `extra` layered over `base`. Keys already in
 * `base` keep their position; new keys are appended in order.
 */
export function extend(
  base: Mapping,
  extra: Iterable<readonly [string, ParamValue]>
): Mapping {
  const merged = new Map(base.entries);
  for (const [key, value] of extra) merged.set(key, value);
  return mapping(merged);
}

/** Drops top-level entries whose value is empty */
export function withoutEmpty(value: Mapping): Mapping {
  return mapping([...value.entries].filter(([, v]) => !isEmpty(v)));
}

/**
 * Emptiness rule: null, "", 0, false, [] and {} are empty.
 *
 * Empty values take no part in the signature or the body. Note this also
 * drops legitimate zero amounts; the remote side computes signatures the
 * same way, so it cannot be changed here.
 */
export function isEmpty(value: ParamValue): boolean {
  switch (value.kind) {
    case "scalar":
      return (
        value.value === null ||
        value.value === "" ||
        value.value === 0 ||
        value.value === false
      );
    case "sequence":
      return value.items.length === 0;
    case "mapping":
      return value.entries.size === 0;
  }
}

export function scalarText(value: Scalar): string {
  const v = value.value;
  if (v === null) return "";
  if (typeof v === "boolean") return v ? "True" : "";
  return String(v);
}

/**
 * True only for nodes built by `scalar`, `sequence` or `mapping`. A plain
 * object that merely looks like one is caller data.
 */
export function isParamValue(input: unknown): input is ParamValue {
  return typeof input === "object" && input !== null && built.has(input);
}

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts caller input to a ParamValue tree.
 *
 * Arrays become sequences and plain objects become mappings in
 * `Object.entries` order. Nodes built by the constructors pass through as
 * is; look-alike plain objects are converted like any other mapping.
 *
 * @throws {ValidationError} on non-finite numbers or unsupported types
 */
export function toParamValue(input: ParamInput, path = "params"): ParamValue {
  if (input === undefined || input === null) return scalar(null);

  switch (typeof input) {
    case "string":
    case "boolean":
      return scalar(input);
    case "number":
      if (!Number.isFinite(input)) {
        throw new ValidationError(`${path}: non-finite number ${input}`);
      }
      return scalar(input);
    case "object":
      break;
    default:
      throw new ValidationError(`${path}: unsupported type ${typeof input}`);
  }

  if (isParamValue(input)) return input;

  if (Array.isArray(input)) {
    return sequence(
      input.map((item: ParamInput, i: number) =>
        toParamValue(item, `${path}[${i}]`)
      )
    );
  }

  if (!isPlainObject(input)) {
    throw new ValidationError(
      `${path}: unsupported object ${Object.prototype.toString.call(input)}`
    );
  }

  return mapping(
    Object.entries(input).map(
      ([key, value]): [string, ParamValue] => [
        key,
        toParamValue(value, `${path}[${key}]`),
      ]
    )
  );
}

/** Like toParamValue, but the top level must be a mapping */
export function toParamMapping(input: ParamRecord | Mapping): Mapping {
  const value = toParamValue(input);
  if (value.kind !== "mapping") {
    throw new ValidationError("params: expected a mapping at the top level");
  }
  return value;
}
