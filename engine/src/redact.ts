import { compileSelector, formatSelector, type SelectorSegment } from "../../selectors/src/index.ts";

import { canonicalize } from "./canonicalize.ts";
import { SnapshotEngineError } from "./errors.ts";
import type { MappingEntry, SnapshotValue } from "./value.ts";

export const MAX_ROUND_PRECISION = 15;

export type RedactionAction =
  | { kind: "replace"; value: SnapshotValue }
  | { kind: "delete" }
  | { kind: "round"; precision: number }
  | { kind: "sort" };

/**
 * Either a textual selector (`.users[].id`) or a list of segments where
 * strings are mapping keys, numbers are sequence indices, and `"*"` / `"**"`
 * are the wildcard and deep wildcard.
 */
export type RedactionSelector = string | ReadonlyArray<string | number | SelectorSegment>;

export interface RedactionRule {
  selector: RedactionSelector;
  action: RedactionAction;
}

export const redaction = {
  replace(value: SnapshotValue | string): RedactionAction {
    return { kind: "replace", value: typeof value === "string" ? { kind: "text", value } : value };
  },
  delete(): RedactionAction {
    return { kind: "delete" };
  },
  round(precision: number): RedactionAction {
    return { kind: "round", precision };
  },
  sort(): RedactionAction {
    return { kind: "sort" };
  }
};

interface CompiledRule {
  segments: SelectorSegment[];
  action: RedactionAction;
}

const REMOVED = Symbol("removed");
type RedactedValue = SnapshotValue | typeof REMOVED;

function compareStableStrings(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

function normalizeSegment(segment: string | number | SelectorSegment, ruleIndex: number): SelectorSegment {
  if (typeof segment === "number") {
    if (!Number.isSafeInteger(segment) || segment < 0) {
      throw new SnapshotEngineError(
        `Redaction rule ${String(ruleIndex)} has an invalid sequence index ${String(segment)}`,
        "INVALID_OPTIONS"
      );
    }
    return { kind: "index", index: segment };
  }

  if (typeof segment === "string") {
    if (segment === "*") {
      return { kind: "wildcard" };
    }
    if (segment === "**") {
      return { kind: "deep" };
    }
    return { kind: "key", key: segment };
  }

  return { ...segment };
}

function compileRule(rule: RedactionRule, ruleIndex: number): CompiledRule {
  const segments =
    typeof rule.selector === "string"
      ? compileSelector(rule.selector)
      : rule.selector.map((segment) => normalizeSegment(segment, ruleIndex));

  const action = rule.action;
  if (
    action.kind === "round" &&
    (!Number.isInteger(action.precision) || action.precision < 0 || action.precision > MAX_ROUND_PRECISION)
  ) {
    throw new SnapshotEngineError(
      `Redaction rule ${String(ruleIndex)} (${formatSelector(segments)}) round precision must be an integer between 0 and ${String(MAX_ROUND_PRECISION)}`,
      "INVALID_OPTIONS"
    );
  }

  return { segments, action };
}

function cloneValue(value: SnapshotValue): SnapshotValue {
  switch (value.kind) {
    case "sequence":
      return { kind: "sequence", items: value.items.map(cloneValue) };
    case "mapping":
      return {
        kind: "mapping",
        entries: value.entries.map((entry) => ({ key: cloneValue(entry.key), value: cloneValue(entry.value) }))
      };
    default:
      return { ...value };
  }
}

function applyAction(value: SnapshotValue, action: RedactionAction): RedactedValue {
  switch (action.kind) {
    case "replace":
      return cloneValue(action.value);
    case "delete":
      return REMOVED;
    case "round":
      if (value.kind !== "float" || !Number.isFinite(value.value)) {
        return value;
      }
      return { kind: "float", value: Number(value.value.toFixed(action.precision)) };
    case "sort":
      if (value.kind !== "sequence") {
        return value;
      }
      return {
        kind: "sequence",
        items: value.items
          .map((item) => ({ item, sortKey: canonicalize(item, "json") }))
          .sort((left, right) => compareStableStrings(left.sortKey, right.sortKey))
          .map(({ item }) => item)
      };
  }
}

function mapSequenceItems(
  items: SnapshotValue[],
  select: (index: number) => boolean,
  transform: (item: SnapshotValue) => RedactedValue
): SnapshotValue[] {
  const result: SnapshotValue[] = [];
  items.forEach((item, index) => {
    const next = select(index) ? transform(item) : item;
    if (next !== REMOVED) {
      result.push(next);
    }
  });
  return result;
}

function mapMappingEntries(
  entries: MappingEntry[],
  select: (entry: MappingEntry) => boolean,
  transform: (item: SnapshotValue) => RedactedValue
): MappingEntry[] {
  const result: MappingEntry[] = [];
  for (const entry of entries) {
    const next = select(entry) ? transform(entry.value) : entry.value;
    if (next !== REMOVED) {
      result.push(next === entry.value ? entry : { key: entry.key, value: next });
    }
  }
  return result;
}

function mapChildren(
  value: SnapshotValue,
  selectIndex: (index: number) => boolean,
  selectEntry: (entry: MappingEntry) => boolean,
  transform: (item: SnapshotValue) => RedactedValue
): SnapshotValue {
  if (value.kind === "sequence") {
    return { kind: "sequence", items: mapSequenceItems(value.items, selectIndex, transform) };
  }

  if (value.kind === "mapping") {
    return { kind: "mapping", entries: mapMappingEntries(value.entries, selectEntry, transform) };
  }

  return value;
}

function applyAt(value: SnapshotValue, rule: CompiledRule, offset: number): RedactedValue {
  const segment = rule.segments[offset];
  if (segment === undefined) {
    return applyAction(value, rule.action);
  }

  const descend = (child: SnapshotValue): RedactedValue => applyAt(child, rule, offset + 1);
  const never = (): boolean => false;
  const always = (): boolean => true;

  switch (segment.kind) {
    case "key":
      return value.kind === "mapping"
        ? mapChildren(
            value,
            never,
            (entry) => entry.key.kind === "text" && entry.key.value === segment.key,
            descend
          )
        : value;
    case "index":
      return value.kind === "sequence"
        ? mapChildren(value, (index) => index === segment.index, never, descend)
        : value;
    case "each":
      return value.kind === "sequence" ? mapChildren(value, always, never, descend) : value;
    case "wildcard":
      return mapChildren(value, always, always, descend);
    case "deep": {
      // Descendants first, then the remaining segments at this location.
      const withDescendants = mapChildren(value, always, always, (child) => applyAt(child, rule, offset));
      return applyAt(withDescendants, rule, offset + 1);
    }
  }
}

/**
 * Applies redaction rules in declaration order; each rule sees the result
 * of the previous one. A selector that matches nothing leaves the value
 * untouched. Deleting the root yields Null.
 */
export function redact(value: SnapshotValue, rules: readonly RedactionRule[]): SnapshotValue {
  const compiled = rules.map((rule, index) => compileRule(rule, index));

  let current = value;
  for (const rule of compiled) {
    const next = applyAt(current, rule, 0);
    current = next === REMOVED ? { kind: "null" } : next;
  }

  return current;
}

export function describeRedactionRule(rule: RedactionRule): string {
  const selector =
    typeof rule.selector === "string"
      ? rule.selector
      : formatSelector(rule.selector.map((segment, index) => normalizeSegment(segment, index)));
  return `${selector} -> ${rule.action.kind}`;
}
