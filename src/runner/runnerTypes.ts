import { z } from "zod";
import type { TraceStats } from "../trace/types";
import { EventRecorder } from "./eventRecorder";
import { InstrumentOptionsSchema } from "./instrument";

export type LogLevel = "log" | "debug" | "info" | "warn" | "error";
export type LogEntry = { level: LogLevel; args: unknown[]; ts: number };

export type RunOk = {
  ok: true;
  logs: LogEntry[];
  bindings: Record<string, unknown>;
  stats: TraceStats;
  // false when the original program ran because instrumentation failed
  instrumented: boolean;
};
export type RunErr = {
  ok: false;
  logs: LogEntry[];
  error: { name: string; message: string; stack?: string };
  stats: TraceStats;
};
export type RunResult = RunOk | RunErr;

export const RunnerOptionsSchema = z.object({
  filename: z.string().min(1).default("<script>"),
  instrument: InstrumentOptionsSchema.extend({ runAsMain: z.boolean().default(true) }).default({}),
  fallbackToOriginal: z.boolean().default(false),
  recorder: z.instanceof(EventRecorder).optional(),
});

export type RunnerOptions = z.input<typeof RunnerOptionsSchema>;
