import type { ObjId, TraceEvent } from "../trace/types";
import { ExecutionAnswer, ValueSourceAnswer, type Answer } from "./answers";
import { formatValue } from "../trace/format";
import { containsValue, earlierInFile, snapshotHas, valuesEqual, type TraceSource } from "./match";

export type QuestionKind =
  | "value-had-value"
  | "line-executed"
  | "line-not-executed"
  | "function-returned"
  | "function-called"
  | "field-did-not-change"
  | "object-created"
  | "property-assigned";

const CONTROL_FLOW = ["branch"] as const;
const BLOCKING = ["branch", "while-condition"] as const;

/**
 * A "why" or "why not" question about one recorded run. The answer is
 * computed on the first {@link getAnswer} call and the same object is
 * returned afterwards.
 */
export abstract class Question<A extends Answer = Answer> {
  abstract readonly kind: QuestionKind;
  private answer: A | undefined;

  constructor(
    protected readonly trace: TraceSource,
    readonly subject: string,
    readonly description: string
  ) {}

  protected abstract analyze(): A;

  getAnswer(): A {
    this.answer ??= this.analyze();
    return this.answer;
  }

  toString(): string {
    if (this.description.includes(this.subject)) return `${this.description}?`;
    return `${this.description} ${this.subject}?`;
  }
}

export class WhyDidVariableHaveValue extends Question<ValueSourceAnswer> {
  readonly kind = "value-had-value";

  constructor(
    trace: TraceSource,
    readonly variable: string,
    readonly value: unknown,
    readonly file?: string,
    readonly line?: number
  ) {
    super(trace, variable, `Why did variable '${variable}' have value '${formatValue(value)}'`);
  }

  protected analyze(): ValueSourceAnswer {
    const assignments = this.trace.events.filter((e) => {
      if (e.kind !== "assign" && e.kind !== "augmented-assign") return false;
      if (e.payload.targetName !== this.variable) return false;
      if (this.file !== undefined && e.sourceFile !== this.file) return false;
      if (this.line !== undefined && e.sourceLine > this.line) return false;
      // payload value first, then the snapshot copy
      if ("value" in e.payload && valuesEqual(e.payload.value, this.value)) return true;
      return snapshotHas(e, this.variable, this.value);
    });

    const shown = formatValue(this.value);
    const last = assignments.at(-1);
    const explanation = last
      ? `Variable '${this.variable}' got value '${shown}' from assignment at line ${last.sourceLine}`
      : `No assignment found for variable '${this.variable}' with value '${shown}'`;
    return new ValueSourceAnswer(this, explanation, assignments, assignments);
  }
}

function executionsAt(trace: TraceSource, file: string, line: number): TraceEvent[] {
  return trace.events.filter((e) => e.sourceFile === file && e.sourceLine === line);
}

function withCause(explanation: string, causes: TraceEvent[], noun = "control flow decisions"): string {
  return causes.length > 0 ? `${explanation} due to ${causes.length} ${noun}` : explanation;
}

export class WhyDidLineExecute extends Question<ExecutionAnswer> {
  readonly kind = "line-executed";

  constructor(
    trace: TraceSource,
    readonly file: string,
    readonly line: number
  ) {
    super(trace, `line ${line}`, `Why did line ${line} in ${file} execute`);
  }

  protected analyze(): ExecutionAnswer {
    const executions = executionsAt(this.trace, this.file, this.line);
    const latest = executions.at(-1);
    if (!latest) return new ExecutionAnswer(this, `Line ${this.line} never executed`, [], [], []);

    const dependencies = earlierInFile(this.trace.events, latest, CONTROL_FLOW);
    const explanation = withCause(`Line ${this.line} executed ${executions.length} times`, dependencies);
    return new ExecutionAnswer(this, explanation, [...executions, ...dependencies], executions, dependencies);
  }
}

export class WhyDidntLineExecute extends Question<ExecutionAnswer> {
  readonly kind = "line-not-executed";

  constructor(
    trace: TraceSource,
    readonly file: string,
    readonly line: number
  ) {
    super(trace, `line ${line}`, `Why didn't line ${line} in ${file} execute`);
  }

  protected analyze(): ExecutionAnswer {
    const executions = executionsAt(this.trace, this.file, this.line);
    const latest = executions.at(-1);
    if (latest) {
      const dependencies = earlierInFile(this.trace.events, latest, CONTROL_FLOW);
      const explanation = withCause(`Line ${this.line} actually executed ${executions.length} times`, dependencies);
      return new ExecutionAnswer(this, explanation, [...executions, ...dependencies], executions, dependencies);
    }

    // decisions taken above the line are the candidates for having skipped it
    const blocking = this.trace.events.filter(
      (e) => e.kind === "branch" && e.sourceFile === this.file && e.sourceLine < this.line
    );
    const explanation = withCause(`Line ${this.line} never executed`, blocking);
    return new ExecutionAnswer(this, explanation, blocking, [], blocking);
  }
}

export class WhyDidFunctionReturn extends Question<ValueSourceAnswer> {
  readonly kind = "function-returned";

  constructor(
    trace: TraceSource,
    readonly functionName: string,
    readonly value: unknown
  ) {
    super(trace, functionName, `Why did function '${functionName}' return '${formatValue(value)}'`);
  }

  protected analyze(): ValueSourceAnswer {
    const shown = formatValue(this.value);
    // matched on the value alone; the name only labels the question
    const returns = this.trace.events.filter((e) => e.kind === "return" && valuesEqual(e.payload.value, this.value));
    const target = returns.at(-1);
    if (!target) {
      return new ValueSourceAnswer(
        this,
        `No return found for function '${this.functionName}' with value '${shown}'`,
        [],
        []
      );
    }

    const dependencies = earlierInFile(this.trace.events, target, ["assign", "augmented-assign"]).filter((e) =>
      containsValue(e.localSnapshot, this.value)
    );
    const explanation = withCause(
      `Function '${this.functionName}' returned '${shown}' at line ${target.sourceLine}`,
      dependencies,
      "data dependencies"
    );
    const sources = [target, ...dependencies];
    return new ValueSourceAnswer(this, explanation, sources, sources);
  }
}

export class WhyWasFunctionCalled extends Question<ExecutionAnswer> {
  readonly kind = "function-called";

  constructor(
    trace: TraceSource,
    readonly functionName: string
  ) {
    super(trace, functionName, `Why was function '${functionName}' called`);
  }

  protected analyze(): ExecutionAnswer {
    const calls = this.trace.events.filter(
      (e) => e.kind === "function-entry" && e.payload.functionName === this.functionName
    );
    const target = calls.at(-1);
    if (!target) {
      return new ExecutionAnswer(this, `Function '${this.functionName}' was never called`, [], [], []);
    }

    const dependencies = earlierInFile(this.trace.events, target, CONTROL_FLOW);
    const explanation = withCause(`Function '${this.functionName}' was called ${calls.length} times`, dependencies);
    return new ExecutionAnswer(this, explanation, [...calls, ...dependencies], calls, dependencies);
  }
}

export class WhyDidntFieldChange extends Question<ExecutionAnswer> {
  readonly kind = "field-did-not-change";

  constructor(
    trace: TraceSource,
    readonly field: string,
    readonly afterTimestamp: number
  ) {
    super(trace, field, `Why didn't field '${field}' change after time ${afterTimestamp}`);
  }

  private reassigns(e: TraceEvent): boolean {
    if (e.kind === "assign" || e.kind === "augmented-assign") return e.payload.targetName === this.field;
    if (e.kind === "attribute-assign") return e.payload.attribute === this.field;
    return false;
  }

  protected analyze(): ExecutionAnswer {
    const later = this.trace.events.filter((e) => e.timestamp > this.afterTimestamp);
    const assignments: TraceEvent[] = [];
    const potential: TraceEvent[] = [];
    for (const e of later) {
      if (this.reassigns(e)) assignments.push(e);
      else if (Object.hasOwn(e.localSnapshot, this.field)) potential.push(e);
    }

    if (assignments.length > 0) {
      return new ExecutionAnswer(
        this,
        `Field '${this.field}' actually did change ${assignments.length} times after the specified time`,
        assignments,
        assignments,
        []
      );
    }

    const blocking = later.filter((e) => BLOCKING.some((k) => k === e.kind));
    let explanation = `Field '${this.field}' didn't change after the specified time`;
    if (blocking.length > 0) explanation += ` due to ${blocking.length} control flow decisions`;
    else if (potential.length > 0) explanation += `, though ${potential.length} potential assignment sites were reached`;
    return new ExecutionAnswer(this, explanation, [...blocking, ...potential], [], blocking);
  }
}

export class WhyDidObjectGetCreated extends Question<ExecutionAnswer> {
  readonly kind = "object-created";

  constructor(
    trace: TraceSource,
    readonly typeName: string,
    readonly objectId?: ObjId
  ) {
    super(trace, typeName, `Why did object of type '${typeName}' get created`);
  }

  private holdsInstance(e: TraceEvent): boolean {
    return Object.entries(e.runtimeTypes).some(
      ([name, type]) => type === this.typeName && (this.objectId === undefined || e.objectIds[name] === this.objectId)
    );
  }

  protected analyze(): ExecutionAnswer {
    const creations = this.trace.events.filter((e) => e.kind === "assign" && this.holdsInstance(e));
    const target = creations.at(-1);
    if (!target) {
      return new ExecutionAnswer(this, `No creation found for objects of type '${this.typeName}'`, [], [], []);
    }

    const dependencies = earlierInFile(this.trace.events, target, CONTROL_FLOW);
    const explanation = withCause(
      `Object of type '${this.typeName}' was created ${creations.length} times`,
      dependencies
    );
    return new ExecutionAnswer(this, explanation, [...creations, ...dependencies], creations, dependencies);
  }
}

export class WhyDidPropertyGetAssigned extends Question<ValueSourceAnswer> {
  readonly kind = "property-assigned";

  constructor(
    trace: TraceSource,
    readonly property: string,
    readonly value: unknown
  ) {
    super(trace, property, `Why did property '${property}' get assigned '${formatValue(value)}'`);
  }

  private assigns(e: TraceEvent): boolean {
    if (e.kind === "attribute-assign") {
      return e.payload.attribute === this.property && valuesEqual(e.payload.value, this.value);
    }
    if (e.kind !== "assign") return false;
    if (e.payload.targetName === this.property && valuesEqual(e.payload.value, this.value)) return true;
    return snapshotHas(e, this.property, this.value);
  }

  protected analyze(): ValueSourceAnswer {
    const shown = formatValue(this.value);
    const assignments = this.trace.events.filter((e) => this.assigns(e));
    const target = assignments.at(-1);
    if (!target) {
      return new ValueSourceAnswer(
        this,
        `No assignment found for property '${this.property}' with value '${shown}'`,
        [],
        []
      );
    }

    const dependencies = this.trace.events.filter(
      (e) =>
        e.id < target.id &&
        (e.kind === "assign" || e.kind === "call" || e.kind === "return") &&
        (containsValue(e.payload, this.value) || containsValue(e.localSnapshot, this.value))
    );
    let explanation = `Property '${this.property}' got value '${shown}' from assignment at line ${target.sourceLine}`;
    if (dependencies.length > 0) explanation += ` via ${dependencies.length} data dependencies`;
    const sources = [...assignments, ...dependencies];
    return new ValueSourceAnswer(this, explanation, sources, sources);
  }
}
