import { SnapshotEngineError } from "./errors.ts";

export interface NullValue {
  kind: "null";
}

export interface BoolValue {
  kind: "bool";
  value: boolean;
}

export interface IntegerValue {
  kind: "integer";
  value: bigint;
}

export interface FloatValue {
  kind: "float";
  value: number;
}

export interface TextValue {
  kind: "text";
  value: string;
}

export interface SequenceValue {
  kind: "sequence";
  items: SnapshotValue[];
}

export interface MappingEntry {
  key: SnapshotValue;
  value: SnapshotValue;
}

export interface MappingValue {
  kind: "mapping";
  entries: MappingEntry[];
}

/**
 * The closed intermediate form every snapshotted value is lowered to before
 * redaction and canonicalization. Mapping entries keep their input order;
 * the canonicalizer decides the output order.
 */
export type SnapshotValue =
  | NullValue
  | BoolValue
  | IntegerValue
  | FloatValue
  | TextValue
  | SequenceValue
  | MappingValue;

export type SnapshotValueKind = SnapshotValue["kind"];

export type ValuePathSegment = string | number;

export const snapshotValue = {
  null(): NullValue {
    return { kind: "null" };
  },
  bool(value: boolean): BoolValue {
    return { kind: "bool", value };
  },
  integer(value: number | bigint): IntegerValue {
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new SnapshotEngineError(
        `Integer snapshot values must be safe integers or bigints, got ${String(value)}`,
        "MALFORMED_VALUE"
      );
    }
    return { kind: "integer", value: BigInt(value) };
  },
  float(value: number): FloatValue {
    return { kind: "float", value };
  },
  text(value: string): TextValue {
    return { kind: "text", value };
  },
  sequence(items: SnapshotValue[]): SequenceValue {
    return { kind: "sequence", items };
  },
  mapping(entries: Array<[string, SnapshotValue]>): MappingValue {
    return {
      kind: "mapping",
      entries: entries.map(([key, value]) => ({ key: { kind: "text", value: key }, value }))
    };
  }
};

const PLAIN_PATH_KEY_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function describeValuePath(path: readonly ValuePathSegment[]): string {
  let rendered = "$";
  for (const segment of path) {
    if (typeof segment === "number") {
      rendered += `[${String(segment)}]`;
    } else if (PLAIN_PATH_KEY_PATTERN.test(segment)) {
      rendered += `.${segment}`;
    } else {
      rendered += `[${JSON.stringify(segment)}]`;
    }
  }
  return rendered;
}

function malformed(message: string, path: readonly ValuePathSegment[]): SnapshotEngineError {
  return new SnapshotEngineError(`${message} at ${describeValuePath(path)}`, "MALFORMED_VALUE");
}

function describeMappingKey(key: SnapshotValue): string {
  switch (key.kind) {
    case "text":
      return key.value;
    case "integer":
      return key.value.toString();
    case "float":
      return String(key.value);
    case "bool":
      return String(key.value);
    case "null":
      return "null";
    default:
      return `<${key.kind}>`;
  }
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function hasToJson(value: object): value is { toJSON: () => unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

function lowerNumber(value: number): IntegerValue | FloatValue {
  if (Number.isSafeInteger(value)) {
    return { kind: "integer", value: BigInt(value) };
  }

  return { kind: "float", value };
}

function lowerValue(
  input: unknown,
  path: ValuePathSegment[],
  ancestors: Set<object>
): SnapshotValue {
  if (input === null || input === undefined) {
    return { kind: "null" };
  }

  switch (typeof input) {
    case "boolean":
      return { kind: "bool", value: input };
    case "number":
      return lowerNumber(input);
    case "bigint":
      return { kind: "integer", value: input };
    case "string":
      return { kind: "text", value: input };
    case "function":
      throw malformed("Functions cannot be snapshotted", path);
    case "symbol":
      throw malformed("Symbols cannot be snapshotted", path);
    default:
      break;
  }

  if (typeof input !== "object") {
    throw malformed(`Unsupported value of type ${typeof input}`, path);
  }

  if (ancestors.has(input)) {
    throw malformed("Circular reference cannot be snapshotted", path);
  }

  if (input instanceof Date) {
    if (!Number.isFinite(input.getTime())) {
      throw malformed("Invalid Date cannot be snapshotted", path);
    }
    return { kind: "text", value: input.toISOString() };
  }

  ancestors.add(input);
  try {
    if (Array.isArray(input)) {
      return {
        kind: "sequence",
        items: input.map((item: unknown, index) => lowerValue(item, [...path, index], ancestors))
      };
    }

    if (input instanceof Set) {
      return {
        kind: "sequence",
        items: [...input].map((item: unknown, index) => lowerValue(item, [...path, index], ancestors))
      };
    }

    if (input instanceof Map) {
      const entries: MappingEntry[] = [];
      for (const [rawKey, rawValue] of input) {
        const key = lowerValue(rawKey, path, ancestors);
        const keyLabel = describeMappingKey(key);
        entries.push({ key, value: lowerValue(rawValue, [...path, keyLabel], ancestors) });
      }
      return { kind: "mapping", entries };
    }

    if (!isPlainRecord(input) && hasToJson(input)) {
      return lowerValue(input.toJSON(), path, ancestors);
    }

    const entries: MappingEntry[] = [];
    for (const [key, member] of Object.entries(input)) {
      if (member === undefined) {
        continue;
      }
      entries.push({
        key: { kind: "text", value: key },
        value: lowerValue(member, [...path, key], ancestors)
      });
    }
    return { kind: "mapping", entries };
  } finally {
    ancestors.delete(input);
  }
}

/**
 * Lowers plain JavaScript data into a {@link SnapshotValue}. Safe integers
 * become Integer values and every other number a Float; use
 * `snapshotValue.float` to force a float representation for integral numbers.
 */
export function toSnapshotValue(input: unknown): SnapshotValue {
  return lowerValue(input, [], new Set());
}

