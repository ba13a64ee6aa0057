import { EventRecorder } from "../src/runner/eventRecorder";
import { instrumentAndRun } from "../src/runner/runner";
import type { InstrumentOptions } from "../src/runner/instrument";
import type { EventBody, EventKind, Snapshot, TraceEvent } from "../src/trace/types";

export const FILE = "test.js";

// Console stand-in so traced programs do not print during the run.
export const quietConsole = { log: () => undefined, info: () => undefined, warn: () => undefined };

export function traceProgram(code: string, instrument: InstrumentOptions = {}, filename = FILE) {
  const recorder = new EventRecorder();
  const bindings = instrumentAndRun(code, { console: quietConsole }, { filename, recorder, instrument });
  return { recorder, events: recorder.events, bindings };
}

export function kindsOf(events: readonly TraceEvent[]): EventKind[] {
  return events.map((e) => e.kind);
}

// Payload of an event of any kind, for assertions that do not narrow first.
export function payloadOf(event: TraceEvent | undefined): Record<string, unknown> {
  return event?.payload ?? {};
}

type EventExtras = { locals?: Snapshot; runtimeTypes?: Record<string, string>; objectIds?: Record<string, number> };

// Builds hand-made traces for query tests. Ids start at 1 and each event's
// timestamp equals its id.
export class TraceEventBuilder {
  private events: TraceEvent[] = [];
  private file = FILE;

  setFile(file: string): this {
    this.file = file;
    return this;
  }

  event(body: EventBody, line: number, extras: EventExtras = {}): this {
    const id = this.events.length + 1;
    this.events.push({
      id,
      pointId: id,
      sourceFile: this.file,
      sourceLine: line,
      ...body,
      timestamp: id,
      executingThread: 0,
      localSnapshot: extras.locals ?? {},
      globalSnapshot: {},
      runtimeTypes: extras.runtimeTypes ?? {},
      objectIds: extras.objectIds ?? {},
    });
    return this;
  }

  assign(name: string, value: unknown, line: number, dependsOn: string[] = [], extras?: EventExtras): this {
    return this.event({ kind: "assign", payload: { targetName: name, value, dependsOn } }, line, extras);
  }

  attributeAssign(object: string, attribute: string, value: unknown, line: number): this {
    return this.event(
      {
        kind: "attribute-assign",
        payload: { targetName: `${object}.${attribute}`, object: {}, attribute, value, dependsOn: [object] },
      },
      line
    );
  }

  branch(condition: string, result: boolean, line: number): this {
    return this.event(
      { kind: "branch", payload: { condition, result, decision: result ? "then" : "implicit-skip", dependsOn: [] } },
      line
    );
  }

  whileCondition(condition: string, line: number): this {
    return this.event({ kind: "while-condition", payload: { condition, result: true, dependsOn: [] } }, line);
  }

  functionEntry(name: string, args: unknown[], line: number): this {
    return this.event({ kind: "function-entry", payload: { functionName: name, parameters: [], args } }, line);
  }

  returnEvent(name: string, value: unknown, line: number, extras?: EventExtras): this {
    return this.event({ kind: "return", payload: { functionName: name, value } }, line, extras);
  }

  build(): TraceEvent[] {
    return [...this.events];
  }
}

export function trace(): TraceEventBuilder {
  return new TraceEventBuilder();
}
