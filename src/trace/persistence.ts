import { deserialize, serialize } from "node:v8";
import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { TraceFormatError } from "../runner/errors";
import { EventBodySchema } from "./payloads";
import type { TraceEvent } from "./types";

export const TRACE_FORMAT = "whytrace";
export const TRACE_FORMAT_VERSION = 1;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// z.custom keeps the record itself, so snapshot values come back exactly as V8
// restored them (undefined entries included).
const recordOf = z.custom<Record<string, unknown>>(isRecord, "expected a record");

const EventBaseSchema = z.object({
  id: z.number().int().positive(),
  pointId: z.number().int(),
  sourceFile: z.string(),
  sourceLine: z.number().int(),
  timestamp: z.number(),
  executingThread: z.number().int(),
  localSnapshot: recordOf,
  globalSnapshot: recordOf,
  runtimeTypes: z.record(z.string()),
  objectIds: z.record(z.number().int()),
});

const TraceEventSchema = EventBaseSchema.and(EventBodySchema);

const TraceEnvelopeSchema = z
  .object({
    format: z.literal(TRACE_FORMAT),
    version: z.literal(TRACE_FORMAT_VERSION),
    events: z.array(TraceEventSchema),
  })
  .superRefine((envelope, ctx) => {
    for (let i = 1; i < envelope.events.length; i++) {
      if (envelope.events[i].id <= envelope.events[i - 1].id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["events", i, "id"],
          message: "event ids must be strictly increasing",
        });
        return;
      }
    }
  });

export function serializeTrace(events: readonly TraceEvent[]): Uint8Array {
  return serialize({ format: TRACE_FORMAT, version: TRACE_FORMAT_VERSION, events: [...events] });
}

export function deserializeTrace(blob: Uint8Array): TraceEvent[] {
  let raw: unknown;
  try {
    raw = deserialize(blob);
  } catch (e) {
    throw new TraceFormatError("Trace blob is not a V8 serialization", { cause: e });
  }

  const parsed = TraceEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TraceFormatError(`Invalid trace: ${issue.path.join(".") || "<root>"}: ${issue.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data.events;
}

export async function saveTrace(path: string, events: readonly TraceEvent[]): Promise<void> {
  await writeFile(path, serializeTrace(events));
}

export async function loadTrace(path: string): Promise<TraceEvent[]> {
  return deserializeTrace(await readFile(path));
}
