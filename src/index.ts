export * from "./trace/types";
export { EventBodySchema, BranchDecisionSchema } from "./trace/payloads";
export { formatTrace, formatTraceEvent, formatValue, compareTraces } from "./trace/format";
export type { ExpectedEvent, TraceMismatch } from "./trace/format";
export { serializeTrace, deserializeTrace, saveTrace, loadTrace, TRACE_FORMAT, TRACE_FORMAT_VERSION } from "./trace/persistence";

export { instrument, instrumentSource, InstrumentOptionsSchema, RECORDER_LOCAL } from "./runner/instrument";
export type { InstrumentOptions, InstrumentResult, InstrumentationPoint } from "./runner/instrument";
export { EventRecorder, RecorderOptionsSchema } from "./runner/eventRecorder";
export type { BlockScope, Frame, RecorderOptions } from "./runner/eventRecorder";
export { ValueRegistry, runtimeTypeName, snapshotValue } from "./runner/valueRegistry";
export { instrumentAndRun, run, defaultRecorder } from "./runner/runner";
export { RunnerOptionsSchema } from "./runner/runnerTypes";
export type { LogEntry, RunErr, RunOk, RunResult, RunnerOptions } from "./runner/runnerTypes";
export { InstrumentationError, InstrumentParseError, InstrumentFinalizeError, TraceFormatError } from "./runner/errors";

export * from "./query/answers";
export * from "./query/questions";
export { QuestionAsker } from "./query/questionAsker";
export type { TraceSource } from "./query/match";

export { createSessionStore } from "./state/sessionStore";
export type { AskedQuestion, SessionState, SessionStore } from "./state/sessionStore";
export { samplePrograms, defaultSample, findSample } from "./samples/catalog";
export type { SampleProgram } from "./samples/catalog";
