import { z } from "zod";

const names = z.array(z.string());

export const BranchDecisionSchema = z.enum(["then", "elif", "else", "implicit-skip"]);
export type BranchDecision = z.infer<typeof BranchDecisionSchema>;

const assignPayload = z.object({
  targetName: z.string(),
  value: z.unknown(),
  dependsOn: names,
});

// Payload of each event kind, keyed by `kind`. Values the program produced are
// left as they are; only the recorder's own fields are checked.
export const EventBodySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("assign"), payload: assignPayload }),
  z.object({
    kind: z.literal("attribute-assign"),
    payload: assignPayload.extend({ object: z.unknown(), attribute: z.string() }),
  }),
  z.object({
    kind: z.literal("index-assign"),
    payload: assignPayload.extend({ container: z.unknown(), index: z.unknown() }),
  }),
  z.object({
    kind: z.literal("slice-assign"),
    // `value` holds the inserted items
    payload: assignPayload.extend({ container: z.unknown(), start: z.unknown(), deleteCount: z.unknown() }),
  }),
  z.object({
    kind: z.literal("augmented-assign"),
    payload: assignPayload.extend({
      operator: z.string(),
      object: z.unknown(),
      attribute: z.string().optional(),
      container: z.unknown(),
      index: z.unknown(),
    }),
  }),
  z.object({
    kind: z.literal("function-entry"),
    payload: z.object({ functionName: z.string(), parameters: names, args: z.array(z.unknown()) }),
  }),
  z.object({ kind: z.literal("return"), payload: z.object({ functionName: z.string(), value: z.unknown() }) }),
  z.object({
    kind: z.literal("branch"),
    payload: z.object({
      condition: z.string(),
      result: z.boolean(),
      decision: BranchDecisionSchema,
      dependsOn: names,
    }),
  }),
  z.object({
    kind: z.literal("loop-iteration"),
    payload: z.object({ target: z.string().nullable(), value: z.unknown() }),
  }),
  z.object({
    kind: z.literal("while-condition"),
    payload: z.object({ condition: z.string(), result: z.boolean(), dependsOn: names }),
  }),
  z.object({ kind: z.literal("call"), payload: z.object({ functionName: z.string(), args: z.array(z.unknown()) }) }),
]);

export type EventBody = z.infer<typeof EventBodySchema>;
