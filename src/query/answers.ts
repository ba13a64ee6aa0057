import type { TraceEvent } from "../trace/types";
import type { Question } from "./questions";

export class Answer {
  constructor(
    readonly question: Question,
    readonly explanation: string,
    readonly evidence: TraceEvent[]
  ) {}

  summary(): string {
    return this.explanation;
  }

  toString(): string {
    return this.explanation;
  }
}

// Where a value came from.
export class ValueSourceAnswer extends Answer {
  constructor(
    question: Question,
    explanation: string,
    evidence: TraceEvent[],
    readonly sourceEvents: TraceEvent[]
  ) {
    super(question, explanation, evidence);
  }

  override summary(): string {
    const first = this.sourceEvents[0];
    if (!first) return "No source found for this value";
    return `Value came from line ${first.sourceLine} in ${first.sourceFile}`;
  }
}

// Why code ran, or did not.
export class ExecutionAnswer extends Answer {
  constructor(
    question: Question,
    explanation: string,
    evidence: TraceEvent[],
    readonly executionEvents: TraceEvent[],
    readonly dependencies: TraceEvent[]
  ) {
    super(question, explanation, evidence);
  }

  override summary(): string {
    if (this.executionEvents.length > 0) return `Code executed ${this.executionEvents.length} times`;
    return "Code never executed";
  }
}
