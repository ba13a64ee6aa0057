import type { ObjId } from "../trace/types";
import type { TraceSource } from "./match";
import {
  WhyDidFunctionReturn,
  WhyDidLineExecute,
  WhyDidntFieldChange,
  WhyDidntLineExecute,
  WhyDidObjectGetCreated,
  WhyDidPropertyGetAssigned,
  WhyDidVariableHaveValue,
  WhyWasFunctionCalled,
} from "./questions";

export class QuestionAsker {
  constructor(private readonly trace: TraceSource) {}

  whyDidVariableHaveValue(variable: string, value: unknown, file?: string, line?: number) {
    return new WhyDidVariableHaveValue(this.trace, variable, value, file, line);
  }

  whyDidLineExecute(file: string, line: number) {
    return new WhyDidLineExecute(this.trace, file, line);
  }

  whyDidntLineExecute(file: string, line: number) {
    return new WhyDidntLineExecute(this.trace, file, line);
  }

  whyDidFunctionReturn(functionName: string, value: unknown) {
    return new WhyDidFunctionReturn(this.trace, functionName, value);
  }

  whyWasFunctionCalled(functionName: string) {
    return new WhyWasFunctionCalled(this.trace, functionName);
  }

  whyDidntFieldChange(field: string, afterTimestamp: number) {
    return new WhyDidntFieldChange(this.trace, field, afterTimestamp);
  }

  whyDidObjectGetCreated(typeName: string, objectId?: ObjId) {
    return new WhyDidObjectGetCreated(this.trace, typeName, objectId);
  }

  whyDidPropertyGetAssigned(property: string, value: unknown) {
    return new WhyDidPropertyGetAssigned(this.trace, property, value);
  }
}
