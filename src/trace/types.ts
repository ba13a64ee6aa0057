import { EventBodySchema, type EventBody } from "./payloads";

export type { BranchDecision, EventBody } from "./payloads";

export type EventId = number;
export type ObjId = number;

export type EventKind = EventBody["kind"];

export const EVENT_KINDS: readonly EventKind[] = EventBodySchema.options.map((o) => o.shape.kind.value);

export function isEventKind(value: unknown): value is EventKind {
  return EVENT_KINDS.some((kind) => kind === value);
}

// Names the rewriter injects (`__why`, `_whyFrame`, `_whyReturn2`, ...). Never
// part of a snapshot.
export const INTERNAL_NAME_RE = /^_+why(?:$|[A-Z0-9_])/;

export function isInternalName(name: string): boolean {
  return INTERNAL_NAME_RE.test(name);
}

export type Snapshot = Record<string, unknown>;

type EventBase = {
  id: EventId;
  // static instrumentation point that fired
  pointId: number;
  sourceFile: string;
  sourceLine: number;
  timestamp: number;
  executingThread: number;
  localSnapshot: Snapshot;
  globalSnapshot: Snapshot;
  runtimeTypes: Record<string, string>;
  objectIds: Record<string, ObjId>;
};

// Narrow on `kind` to reach a payload's fields.
export type TraceEvent = EventBase & EventBody;

export type TraceStats = {
  totalEvents: number;
  filesTraced: number;
  eventKinds: Partial<Record<EventKind, number>>;
  // milliseconds between the first and last event
  timeSpan: number;
};

// Getter table the instrumented program hands to the recorder so it can read
// live bindings without touching them.
export type BindingGetters = Record<string, () => unknown>;
