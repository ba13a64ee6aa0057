import { createLogger } from "../util/logger";
import { InstrumentationError } from "./errors";
import { EventRecorder } from "./eventRecorder";
import { instrumentSource } from "./instrument";
import { RunnerOptionsSchema, type LogEntry, type LogLevel, type RunnerOptions, type RunResult } from "./runnerTypes";

const log = createLogger({ component: "runner" });

// Recorder used when a caller does not bring its own.
export const defaultRecorder = new EventRecorder();

function safeSerialize(value: unknown, maxDepth = 4): unknown {
  const seen = new WeakSet<object>();

  const walk = (v: unknown, depth: number): unknown => {
    if (depth > maxDepth) return "[MaxDepth]";
    if (v === null) return null;

    if (
      v === undefined ||
      typeof v === "number" ||
      typeof v === "string" ||
      typeof v === "boolean" ||
      typeof v === "bigint"
    ) {
      return v;
    }
    if (typeof v === "function") return `[Function ${v.name || "anonymous"}]`;
    if (v instanceof Error) return { name: v.name, message: v.message, stack: v.stack };

    if (typeof v === "object") {
      if (seen.has(v)) return "[Circular]";
      seen.add(v);
      if (Array.isArray(v)) return v.map((x) => walk(x, depth + 1));

      const out: Record<string, unknown> = {};
      for (const k of Object.keys(v)) out[k] = walk(Reflect.get(v, k), depth + 1);
      return out;
    }

    return String(v);
  };

  try {
    return walk(value, 0);
  } catch {
    return "[Unserializable]";
  }
}

// Runs rewritten code with the recorder and every binding passed as parameters.
function execute(code: string, recorder: EventRecorder, recorderBinding: string, bindings: Record<string, unknown>) {
  const names = Object.keys(bindings);
  const fn = new Function(recorderBinding, ...names, `"use strict";\n${code}\n`);
  Reflect.apply(fn, undefined, [recorder, ...names.map((n) => bindings[n])]);
}

/**
 * Instruments `text`, runs it in strict mode and returns `bindings` merged with
 * the program's top-level bindings as they stand after the run. Errors thrown
 * by the rewriter or the program propagate.
 */
export function instrumentAndRun(
  text: string,
  bindings: Record<string, unknown> = {},
  options: RunnerOptions = {}
): Record<string, unknown> {
  const opts = RunnerOptionsSchema.parse(options);
  const recorder = opts.recorder ?? defaultRecorder;
  const code = instrumentSource(text, opts.filename, opts.instrument);
  execute(code, recorder, opts.instrument.recorderBinding, bindings);
  return { ...bindings, ...recorder.moduleBindings(opts.filename) };
}

function errorInfo(e: unknown): { name: string; message: string; stack?: string } {
  const err = e instanceof Error ? e : new Error(String(e));
  return { name: err.name, message: err.message, stack: err.stack };
}

/**
 * Like {@link instrumentAndRun}, but never throws: console output is captured
 * and failures come back as a `RunErr`.
 */
export function run(text: string, options: RunnerOptions = {}): RunResult {
  const opts = RunnerOptionsSchema.parse(options);
  const recorder = opts.recorder ?? defaultRecorder;
  const logs: LogEntry[] = [];
  const push = (level: LogLevel, args: unknown[]) => {
    logs.push({ level, args: args.map((a) => safeSerialize(a)), ts: Date.now() });
  };

  const consoleProxy = {
    log: (...args: unknown[]) => push("log", args),
    debug: (...args: unknown[]) => push("debug", args),
    info: (...args: unknown[]) => push("info", args),
    warn: (...args: unknown[]) => push("warn", args),
    error: (...args: unknown[]) => push("error", args),
  };

  let code: string;
  let instrumented = true;
  try {
    code = instrumentSource(text, opts.filename, opts.instrument);
  } catch (e) {
    if (!(opts.fallbackToOriginal && e instanceof InstrumentationError)) {
      log.error("instrumentation failed", { filename: opts.filename, error: e });
      return { ok: false, logs, error: errorInfo(e), stats: recorder.stats() };
    }
    log.warn("instrumentation failed, running the original program", { filename: opts.filename, error: e });
    code = text;
    instrumented = false;
  }

  try {
    execute(code, recorder, opts.instrument.recorderBinding, { console: consoleProxy });
    const stats = recorder.stats();
    log.info("program finished", { filename: opts.filename, events: stats.totalEvents, instrumented });
    return {
      ok: true,
      logs,
      bindings: instrumented
        ? Object.fromEntries(
            Object.entries(recorder.moduleBindings(opts.filename)).map(([k, v]) => [k, safeSerialize(v)])
          )
        : {},
      stats,
      instrumented,
    };
  } catch (e) {
    log.warn("program threw", { filename: opts.filename, error: e });
    return { ok: false, logs, error: errorInfo(e), stats: recorder.stats() };
  }
}
