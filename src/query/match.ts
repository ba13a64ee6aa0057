import { isDeepStrictEqual } from "node:util";
import type { TraceEvent } from "../trace/types";

// Anything questions can be asked against; an EventRecorder qualifies.
export type TraceSource = { readonly events: readonly TraceEvent[] };

export function valuesEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(a, b);
}

export function containsValue(record: Record<string, unknown>, value: unknown): boolean {
  return Object.values(record).some((v) => valuesEqual(v, value));
}

export function snapshotHas(event: TraceEvent, name: string, value: unknown): boolean {
  return Object.hasOwn(event.localSnapshot, name) && valuesEqual(event.localSnapshot[name], value);
}

export function earlierInFile(events: readonly TraceEvent[], anchor: TraceEvent, kinds: readonly string[]) {
  return events.filter((e) => e.id < anchor.id && e.sourceFile === anchor.sourceFile && kinds.includes(e.kind));
}
