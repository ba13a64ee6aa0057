import { inspect, isDeepStrictEqual } from "node:util";
import type { EventKind, TraceEvent } from "./types";

// How values are quoted in explanations and listings.
export function formatValue(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { depth: 2, breakLength: Infinity });
}

export function formatTraceEvent(event: TraceEvent): string {
  const lines = [`Event #${event.id} (${event.kind}) at ${event.sourceFile}:${event.sourceLine}`];
  for (const [key, value] of Object.entries(event.payload)) {
    lines.push(`  ${key}: ${formatValue(value)}`);
  }
  return lines.join("\n");
}

export function formatTrace(events: readonly TraceEvent[]): string {
  return events.map(formatTraceEvent).join("\n\n");
}

// What a test or a saved expectation says an event should look like. Payload
// keys left out are not compared.
export type ExpectedEvent = {
  kind: EventKind;
  sourceLine?: number;
  payload?: Record<string, unknown>;
};

export type TraceMismatch = {
  index: number;
  message: string;
};

/**
 * Compares a recorded trace against an expected sequence, position by
 * position. An empty result means the traces agree.
 */
export function compareTraces(expected: readonly ExpectedEvent[], actual: readonly TraceEvent[]): TraceMismatch[] {
  const mismatches: TraceMismatch[] = [];
  const n = Math.max(expected.length, actual.length);
  for (let index = 0; index < n; index++) {
    const want = expected[index];
    const got = actual[index];
    if (!want) {
      mismatches.push({ index, message: `unexpected ${got.kind} event #${got.id}` });
      continue;
    }
    if (!got) {
      mismatches.push({ index, message: `missing ${want.kind} event` });
      continue;
    }
    if (want.kind !== got.kind) {
      mismatches.push({ index, message: `expected ${want.kind}, got ${got.kind}` });
      continue;
    }
    if (want.sourceLine !== undefined && want.sourceLine !== got.sourceLine) {
      mismatches.push({ index, message: `expected line ${want.sourceLine}, got ${got.sourceLine}` });
    }
    const gotPayload: Record<string, unknown> = got.payload;
    for (const [key, value] of Object.entries(want.payload ?? {})) {
      if (!isDeepStrictEqual(gotPayload[key], value)) {
        mismatches.push({
          index,
          message: `${key}: expected ${formatValue(value)}, got ${formatValue(gotPayload[key])}`,
        });
      }
    }
  }
  return mismatches;
}
