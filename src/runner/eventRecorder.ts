import { threadId } from "node:worker_threads";
import { z } from "zod";
import {
  isEventKind,
  isInternalName,
  type BindingGetters,
  type EventId,
  type EventKind,
  type ObjId,
  type Snapshot,
  type TraceEvent,
  type TraceStats,
} from "../trace/types";
import { EventBodySchema } from "../trace/payloads";
import { deserializeTrace, loadTrace, saveTrace, serializeTrace } from "../trace/persistence";
import { createLogger } from "../util/logger";
import { ValueRegistry, runtimeTypeName, snapshotValue } from "./valueRegistry";

const log = createLogger({ component: "recorder" });

export const RecorderOptionsSchema = z.object({
  enabled: z.boolean().default(true),
  snapshotGlobals: z.boolean().default(true),
});

export type RecorderOptions = z.input<typeof RecorderOptionsSchema>;

export type Frame = {
  name: string;
  getters: BindingGetters;
  // block scopes currently open inside this frame, innermost last
  blocks: BindingGetters[];
};

export type BlockScope = {
  owner: Frame;
  getters: BindingGetters;
};

type LiveBindings = Map<string, unknown>;

function readBindings(getters: BindingGetters): LiveBindings {
  const out: LiveBindings = new Map();
  for (const [name, get] of Object.entries(getters)) {
    if (isInternalName(name)) continue;
    try {
      out.set(name, get());
    } catch (e) {
      // binding is declared but still in its temporal dead zone
      if (e instanceof ReferenceError) continue;
      throw e;
    }
  }
  return out;
}

function visibleGetters(frame: Frame): BindingGetters {
  const out: BindingGetters = { ...frame.getters };
  for (const block of frame.blocks) Object.assign(out, block);
  return out;
}

function pairsToPayload(pairs: readonly unknown[]): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (let i = 0; i + 1 < pairs.length; i += 2) {
    const value = pairs[i + 1];
    payload[String(pairs[i])] = Array.isArray(value) ? value.map(snapshotValue) : snapshotValue(value);
  }
  return payload;
}

function now(): number {
  return performance.timeOrigin + performance.now();
}

export class EventRecorder {
  private eventLog: TraceEvent[] = [];
  private eventIdSeq: EventId = 0;
  private enabled: boolean;
  private readonly snapshotGlobals: boolean;

  private readonly values = new ValueRegistry();
  private frames: Frame[] = [];
  private modules = new Map<string, Frame>();

  constructor(options: RecorderOptions = {}) {
    const opts = RecorderOptionsSchema.parse(options);
    this.enabled = opts.enabled;
    this.snapshotGlobals = opts.snapshotGlobals;
  }

  get events(): readonly TraceEvent[] {
    return this.eventLog;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get frameDepth(): number {
    return this.frames.length;
  }

  // === id / lifecycle ===
  nextEventId(): EventId {
    this.eventIdSeq += 1;
    return this.eventIdSeq;
  }

  enable() {
    this.enabled = true;
  }

  disable() {
    this.enabled = false;
  }

  clear() {
    this.eventLog = [];
    this.eventIdSeq = 0;
    this.frames = [];
    this.modules = new Map();
    this.values.reset();
    log.debug("trace cleared");
  }

  // === frames ===
  attachModule(file: string, getters: BindingGetters) {
    this.moduleFrame(file).getters = { ...getters };
  }

  private moduleFrame(file: string): Frame {
    let frame = this.modules.get(file);
    if (!frame) {
      frame = { name: file, getters: {}, blocks: [] };
      this.modules.set(file, frame);
    }
    return frame;
  }

  enterFrame(name: string, getters: BindingGetters): Frame {
    const frame: Frame = { name, getters: { ...getters }, blocks: [] };
    this.frames.push(frame);
    return frame;
  }

  // Opens a block scope on the innermost frame, or on the file's module frame
  // when no function is running. Its bindings show up in local snapshots
  // until exitBlock.
  enterBlock(file: string, getters: BindingGetters): BlockScope {
    const owner = this.frames.at(-1) ?? this.moduleFrame(file);
    const scope: BlockScope = { owner, getters: { ...getters } };
    owner.blocks.push(scope.getters);
    return scope;
  }

  exitBlock(scope: BlockScope | undefined) {
    if (!scope) return;
    const i = scope.owner.blocks.lastIndexOf(scope.getters);
    if (i >= 0) scope.owner.blocks.splice(i, 1);
  }

  // Removes this particular frame; generators and async functions may close
  // frames out of stack order.
  exitFrame(frame: Frame | undefined) {
    if (!frame) return;
    const i = this.frames.lastIndexOf(frame);
    if (i >= 0) this.frames.splice(i, 1);
  }

  // Live values of a file's program-scope bindings, uninitialized ones left out.
  moduleBindings(file: string): Record<string, unknown> {
    return Object.fromEntries(readBindings(this.modules.get(file)?.getters ?? {}));
  }

  // === recording ===
  recordEvent(pointId: number, file: string, line: number, kind: string, ...pairs: unknown[]): void {
    if (!this.enabled) return;
    if (!isEventKind(kind)) throw new TypeError(`Unknown trace event kind: ${kind}`);
    const body = EventBodySchema.safeParse({ kind, payload: pairsToPayload(pairs) });
    if (!body.success) {
      const issue = body.error.issues[0];
      throw new TypeError(`Malformed ${kind} payload: ${issue.path.slice(1).join(".")}: ${issue.message}`);
    }

    const moduleFrame = this.modules.get(file);
    const localFrame = this.frames.at(-1) ?? moduleFrame;
    const locals = readBindings(localFrame ? visibleGetters(localFrame) : {});

    // id allocation, construction and append run without yielding, so
    // concurrent async callers can never interleave here
    const event: TraceEvent = {
      id: this.nextEventId(),
      pointId,
      sourceFile: file,
      sourceLine: line,
      ...body.data,
      timestamp: now(),
      executingThread: threadId,
      localSnapshot: this.snapshotOf(locals, false),
      globalSnapshot: this.snapshotGlobals ? this.snapshotOf(readBindings(moduleFrame?.getters ?? {}), true) : {},
      runtimeTypes: {},
      objectIds: {},
    };
    for (const [name, value] of locals) {
      event.runtimeTypes[name] = runtimeTypeName(value);
      const objId = this.values.idOf(value);
      if (objId !== undefined) event.objectIds[name] = objId;
    }
    this.eventLog.push(event);
  }

  private snapshotOf(bindings: LiveBindings, skipFunctions: boolean): Snapshot {
    const snapshot: Snapshot = {};
    for (const [name, value] of bindings) {
      if (skipFunctions && typeof value === "function") continue;
      snapshot[name] = snapshotValue(value);
    }
    return snapshot;
  }

  objectIdOf(value: object): ObjId {
    return this.values.ensureObjId(value);
  }

  // Call tracing: record a `call` event, then apply the callee unchanged.
  invoke(pointId: number, file: string, line: number, functionName: string, fn: unknown, args: unknown[]): unknown {
    if (typeof fn !== "function") throw new TypeError(`${functionName} is not a function`);
    this.recordEvent(pointId, file, line, "call", "functionName", functionName, "args", args);
    return Reflect.apply(fn, undefined, args);
  }

  invokeMethod(
    pointId: number,
    file: string,
    line: number,
    functionName: string,
    receiver: unknown,
    key: PropertyKey,
    args: unknown[]
  ): unknown {
    if (receiver === null || receiver === undefined) {
      throw new TypeError(`Cannot read properties of ${String(receiver)} (reading '${String(key)}')`);
    }
    const fn: unknown = Reflect.get(Object(receiver), key, receiver);
    if (typeof fn !== "function") throw new TypeError(`${functionName} is not a function`);
    this.recordEvent(pointId, file, line, "call", "functionName", functionName, "args", args);
    return Reflect.apply(fn, receiver, args);
  }

  // === read-only queries ===
  eventsAtLine(file: string, line: number): TraceEvent[] {
    return this.eventLog.filter((e) => e.sourceFile === file && e.sourceLine === line);
  }

  eventsOfKind(...kinds: EventKind[]): TraceEvent[] {
    return this.eventLog.filter((e) => kinds.includes(e.kind));
  }

  assignmentsTo(name: string, file?: string): TraceEvent[] {
    return this.eventLog.filter(
      (e) =>
        (e.kind === "assign" || e.kind === "augmented-assign") &&
        e.payload.targetName === name &&
        (file === undefined || e.sourceFile === file)
    );
  }

  functionCalls(name?: string): TraceEvent[] {
    return this.eventLog.filter(
      (e) =>
        (e.kind === "function-entry" || e.kind === "call") &&
        (name === undefined || e.payload.functionName === name)
    );
  }

  eventsInRange(startLine: number, endLine: number, file?: string): TraceEvent[] {
    return this.eventLog.filter(
      (e) => e.sourceLine >= startLine && e.sourceLine <= endLine && (file === undefined || e.sourceFile === file)
    );
  }

  stats(): TraceStats {
    const eventKinds: Partial<Record<EventKind, number>> = {};
    const files = new Set<string>();
    for (const e of this.eventLog) {
      eventKinds[e.kind] = (eventKinds[e.kind] ?? 0) + 1;
      files.add(e.sourceFile);
    }
    const first = this.eventLog[0];
    const last = this.eventLog.at(-1);
    return {
      totalEvents: this.eventLog.length,
      filesTraced: files.size,
      eventKinds,
      timeSpan: first && last ? last.timestamp - first.timestamp : 0,
    };
  }

  // === persistence ===
  serialize(): Uint8Array {
    return serializeTrace(this.eventLog);
  }

  // Replaces the log with a persisted one; new ids continue after the last
  // loaded id.
  load(blob: Uint8Array) {
    this.replaceEvents(deserializeTrace(blob));
  }

  async saveTrace(path: string): Promise<void> {
    await saveTrace(path, this.eventLog);
    log.info("trace saved", { path, events: this.eventLog.length });
  }

  async loadTrace(path: string): Promise<void> {
    this.replaceEvents(await loadTrace(path));
    log.info("trace loaded", { path, events: this.eventLog.length });
  }

  private replaceEvents(events: TraceEvent[]) {
    this.eventLog = events;
    this.eventIdSeq = events.at(-1)?.id ?? 0;
  }
}
