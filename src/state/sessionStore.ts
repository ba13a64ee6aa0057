import { createStore } from "zustand/vanilla";
import { EventRecorder } from "../runner/eventRecorder";
import { run } from "../runner/runner";
import type { RunnerOptions, RunResult } from "../runner/runnerTypes";
import type { Answer } from "../query/answers";
import { QuestionAsker } from "../query/questionAsker";
import type { Question } from "../query/questions";

export type AskedQuestion = {
  question: Question;
  answer: Answer;
};

export type SessionState = {
  recorder: EventRecorder;
  running: boolean;
  lastResult: RunResult | null;
  lastError: string | null;
  questions: AskedQuestion[];

  runProgram: (code: string, options?: Omit<RunnerOptions, "recorder">) => RunResult;
  ask: (build: (asker: QuestionAsker) => Question) => Answer;
  clear: () => void;
};

// One debugging session: a private recorder, the last run, and the questions
// asked about it.
export function createSessionStore(recorder = new EventRecorder()) {
  return createStore<SessionState>((set, get) => ({
    recorder,
    running: false,
    lastResult: null,
    lastError: null,
    questions: [],

    runProgram: (code, options = {}) => {
      get().recorder.clear();
      set({ running: true, lastError: null, questions: [] });
      const result = run(code, { ...options, recorder: get().recorder });
      set({ running: false, lastResult: result, lastError: result.ok ? null : result.error.message });
      return result;
    },

    ask: (build) => {
      const question = build(new QuestionAsker(get().recorder));
      const answer = question.getAnswer();
      set((s) => ({ questions: [...s.questions, { question, answer }] }));
      return answer;
    },

    clear: () => {
      get().recorder.clear();
      set({ lastResult: null, lastError: null, questions: [] });
    },
  }));
}

export type SessionStore = ReturnType<typeof createSessionStore>;
