import { readFileSync } from "node:fs";

export type SampleProgram = {
  id: string;
  name: string;
  level: "simple" | "complex";
  description: string;
  filename: string;
  code: string;
};

function sampleSource(filename: string): string {
  return readFileSync(new URL(`./${filename}`, import.meta.url), "utf8");
}

export const samplePrograms: SampleProgram[] = [
  {
    id: "factorial",
    name: "Recursive Factorial",
    level: "simple",
    description: "Recursion with one assignment per call.",
    filename: "factorial.js",
    code: sampleSource("factorial.js"),
  },
  {
    id: "branches",
    name: "Branches and Loops",
    level: "simple",
    description: "An if / else-if / else chain, a for-of loop and a while loop.",
    filename: "branches.js",
    code: sampleSource("branches.js"),
  },
  {
    id: "objects",
    name: "Objects and Arrays",
    level: "complex",
    description: "Class instances, property and index writes, and an in-place splice.",
    filename: "objects.js",
    code: sampleSource("objects.js"),
  },
];

export const defaultSample = samplePrograms[0];

export function findSample(id: string): SampleProgram | undefined {
  return samplePrograms.find((s) => s.id === id);
}
