import { beforeAll, describe, expect, it } from "vitest";
import { QuestionAsker } from "../src/query/questionAsker";
import { WhyDidVariableHaveValue } from "../src/query/questions";
import type { EventRecorder } from "../src/runner/eventRecorder";
import { findSample } from "../src/samples/catalog";
import { payloadOf, trace, traceProgram } from "./helpers";

function sampleCode(id: string): string {
  const sample = findSample(id);
  if (!sample) throw new Error(`missing sample ${id}`);
  return sample.code;
}

describe("questions about a recorded run", () => {
  let recorder: EventRecorder;
  let asker: QuestionAsker;

  beforeAll(() => {
    recorder = traceProgram(sampleCode("factorial"), {}, "factorial.js").recorder;
    asker = new QuestionAsker(recorder);
  });

  it("finds where a variable got its value", () => {
    const answer = asker.whyDidVariableHaveValue("result", 120).getAnswer();

    expect(answer.explanation).toBe("Variable 'result' got value '120' from assignment at line 5");
    expect(answer.sourceEvents).toHaveLength(1);
    expect(answer.summary()).toBe("Value came from line 5 in factorial.js");
  });

  it("explains a return through the assignments holding the value", () => {
    const answer = asker.whyDidFunctionReturn("factorial", 120).getAnswer();

    expect(answer.explanation).toBe("Function 'factorial' returned '120' at line 6 due to 1 data dependencies");
    expect(answer.sourceEvents.map((e) => [e.kind, e.sourceLine])).toEqual([
      ["return", 6],
      ["assign", 5],
    ]);
  });

  it("counts calls and the decisions made before the last one", () => {
    const answer = asker.whyWasFunctionCalled("factorial").getAnswer();

    expect(answer.explanation).toBe("Function 'factorial' was called 5 times due to 4 control flow decisions");
    expect(answer.executionEvents.map((e) => payloadOf(e).args)).toEqual([[5], [4], [3], [2], [1]]);
  });

  it("explains a line that ran", () => {
    const answer = asker.whyDidLineExecute("factorial.js", 5).getAnswer();

    expect(answer.explanation).toBe("Line 5 executed 4 times due to 5 control flow decisions");
    expect(answer.summary()).toBe("Code executed 4 times");
  });

  it("explains a line that never ran", () => {
    const answer = asker.whyDidntLineExecute("factorial.js", 999).getAnswer();

    expect(answer.explanation).toBe("Line 999 never executed due to 5 control flow decisions");
    expect(answer.executionEvents).toEqual([]);
    expect(answer.evidence.every((e) => e.kind === "branch")).toBe(true);
    expect(answer.summary()).toBe("Code never executed");
  });

  it("says so when a line asked about did run", () => {
    const answer = asker.whyDidntLineExecute("factorial.js", 3).getAnswer();
    expect(answer.explanation).toBe("Line 3 actually executed 1 times due to 5 control flow decisions");
  });

  it("computes each answer once", () => {
    const question = asker.whyDidVariableHaveValue("result", 120);
    expect(question.getAnswer()).toBe(question.getAnswer());
  });

  it("renders the question itself", () => {
    expect(asker.whyDidVariableHaveValue("result", 120).toString()).toBe("Why did variable 'result' have value '120'?");
    expect(asker.whyDidLineExecute("factorial.js", 5).toString()).toBe("Why did line 5 in factorial.js execute?");
    expect(asker.whyWasFunctionCalled("factorial").kind).toBe("function-called");
  });

  it("reports unmatched questions", () => {
    expect(asker.whyDidVariableHaveValue("result", 7).getAnswer().explanation).toBe(
      "No assignment found for variable 'result' with value '7'"
    );
    expect(asker.whyDidFunctionReturn("factorial", 7).getAnswer().explanation).toBe(
      "No return found for function 'factorial' with value '7'"
    );
    expect(asker.whyWasFunctionCalled("missing").getAnswer().explanation).toBe("Function 'missing' was never called");
    expect(asker.whyDidLineExecute("factorial.js", 999).getAnswer().explanation).toBe("Line 999 never executed");
  });
});

describe("questions about objects", () => {
  let run: ReturnType<typeof traceProgram>;
  let asker: QuestionAsker;

  beforeAll(() => {
    run = traceProgram(sampleCode("objects"), {}, "objects.js");
    asker = new QuestionAsker(run.recorder);
  });

  it("finds the assignments that held an instance", () => {
    const answer = asker.whyDidObjectGetCreated("Point").getAnswer();
    expect(answer.explanation).toBe("Object of type 'Point' was created 3 times");
    expect(answer.executionEvents.map((e) => e.sourceLine)).toEqual([13, 15, 17]);
  });

  it("narrows creations to one object id", () => {
    const point = run.bindings.p;
    if (typeof point !== "object" || point === null) throw new Error("p is not an object");
    const id = run.recorder.objectIdOf(point);

    expect(asker.whyDidObjectGetCreated("Point", id).getAnswer().executionEvents).toHaveLength(3);
    expect(asker.whyDidObjectGetCreated("Point", id + 100).getAnswer().explanation).toBe(
      "No creation found for objects of type 'Point'"
    );
  });

  it("finds a property write", () => {
    const answer = asker.whyDidPropertyGetAssigned("x", 1).getAnswer();
    expect(answer.explanation).toBe("Property 'x' got value '1' from assignment at line 3");
  });

  it("sees that a field changed", () => {
    const answer = asker.whyDidntFieldChange("x", 0).getAnswer();
    expect(answer.explanation).toBe("Field 'x' actually did change 1 times after the specified time");
  });
});

describe("questions about hand-built traces", () => {
  it("prefers the latest matching assignment", () => {
    const events = trace().assign("x", 5, 2).assign("x", 7, 4).assign("x", 5, 6).build();
    const asker = new QuestionAsker({ events });

    expect(asker.whyDidVariableHaveValue("x", 5).getAnswer().explanation).toBe(
      "Variable 'x' got value '5' from assignment at line 6"
    );
    expect(asker.whyDidVariableHaveValue("x", 5, undefined, 5).getAnswer().explanation).toBe(
      "Variable 'x' got value '5' from assignment at line 2"
    );
  });

  it("filters by file", () => {
    const events = trace().assign("x", 5, 2).build();
    const answer = new QuestionAsker({ events }).whyDidVariableHaveValue("x", 5, "other.js").getAnswer();

    expect(answer.explanation).toBe("No assignment found for variable 'x' with value '5'");
    expect(answer.summary()).toBe("No source found for this value");
  });

  it("falls back to the snapshot value", () => {
    const events = trace()
      .assign("x", 9, 3, [], { locals: { x: 5 } })
      .build();
    const question = new WhyDidVariableHaveValue({ events }, "x", 5);
    expect(question.getAnswer().explanation).toBe("Variable 'x' got value '5' from assignment at line 3");
  });

  it("compares values structurally", () => {
    const events = trace().assign("pair", [1, 2], 1).build();
    expect(new QuestionAsker({ events }).whyDidVariableHaveValue("pair", [1, 2]).getAnswer().sourceEvents).toHaveLength(1);
  });

  it("blames control flow for a field that stayed put", () => {
    const events = trace()
      .assign("count", 1, 1)
      .branch("ready", false, 2)
      .whileCondition("waiting", 3)
      .assign("other", 2, 4, [], { locals: { count: 1 } })
      .build();
    const answer = new QuestionAsker({ events }).whyDidntFieldChange("count", 1).getAnswer();

    expect(answer.explanation).toBe("Field 'count' didn't change after the specified time due to 2 control flow decisions");
    expect(answer.dependencies.map((e) => e.kind)).toEqual(["branch", "while-condition"]);
    expect(answer.evidence.map((e) => e.id)).toEqual([2, 3, 4]);
  });

  it("mentions reached assignment sites when nothing blocked the field", () => {
    const events = trace()
      .assign("count", 1, 1)
      .assign("other", 2, 2, [], { locals: { count: 1 } })
      .build();
    expect(new QuestionAsker({ events }).whyDidntFieldChange("count", 1).getAnswer().explanation).toBe(
      "Field 'count' didn't change after the specified time, though 1 potential assignment sites were reached"
    );
    expect(new QuestionAsker({ events }).whyDidntFieldChange("count", 2).getAnswer().explanation).toBe(
      "Field 'count' didn't change after the specified time"
    );
  });

  it("traces a property value through earlier events", () => {
    const events = trace().assign("a", 5, 1).returnEvent("f", 5, 2).assign("total", 5, 3).build();
    const answer = new QuestionAsker({ events }).whyDidPropertyGetAssigned("total", 5).getAnswer();

    expect(answer.explanation).toBe("Property 'total' got value '5' from assignment at line 3 via 2 data dependencies");
    expect(answer.sourceEvents.map((e) => e.id)).toEqual([3, 1, 2]);
  });

  it("matches attribute writes by attribute name", () => {
    const events = trace().attributeAssign("cfg", "mode", "fast", 4).build();
    const asker = new QuestionAsker({ events });

    expect(asker.whyDidPropertyGetAssigned("mode", "fast").getAnswer().explanation).toBe(
      "Property 'mode' got value 'fast' from assignment at line 4"
    );
    expect(asker.whyDidPropertyGetAssigned("mode", "slow").getAnswer().explanation).toBe(
      "No assignment found for property 'mode' with value 'slow'"
    );
  });

  it("counts only branches before the line as blockers", () => {
    const events = trace().branch("a", true, 2).branch("b", false, 8).functionEntry("f", [], 1).build();
    const answer = new QuestionAsker({ events }).whyDidntLineExecute("test.js", 5).getAnswer();
    expect(answer.explanation).toBe("Line 5 never executed due to 1 control flow decisions");
  });
});
