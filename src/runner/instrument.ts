import * as Babel from "@babel/standalone";
import type { BabelFileResult, NodePath, ParserOptions, PluginObj, types as BabelTypes } from "@babel/core";
import { z } from "zod";
import { isInternalName, type BranchDecision, type EventKind } from "../trace/types";
import { createLogger } from "../util/logger";
import { collectReads, mergeNames } from "./dependencies";
import { InstrumentFinalizeError, InstrumentParseError } from "./errors";
import { toReadContext } from "./readContext";

type Types = typeof BabelTypes;
type Node = BabelTypes.Node;
type Expression = BabelTypes.Expression;
type Statement = BabelTypes.Statement;

const log = createLogger({ component: "instrument" });

// Name the recorder handle is bound to inside instrumented code.
export const RECORDER_LOCAL = "__why";

export const InstrumentOptionsSchema = z.object({
  sourceType: z.enum(["script", "module"]).default("script"),
  recorderBinding: z
    .string()
    .regex(/^[A-Za-z_$][\w$]*$/, "must be a plain identifier")
    .default("__whyRecorder"),
  traceCalls: z.boolean().default(false),
  runAsMain: z.boolean().default(false),
});

export type InstrumentOptions = z.input<typeof InstrumentOptionsSchema>;
type ResolvedOptions = z.output<typeof InstrumentOptionsSchema>;

// One static recorder call site in the rewritten code.
export type InstrumentationPoint = {
  pointId: number;
  kind: EventKind;
  line: number;
  column: number;
};

export type InstrumentResult = {
  code: string;
  points: InstrumentationPoint[];
};

const PARSER_OPTS: ParserOptions = {
  plugins: [
    "classProperties",
    "classPrivateProperties",
    "classPrivateMethods",
    "optionalChaining",
    "nullishCoalescingOperator",
  ],
};

type Pair = [string, Expression];

type MemberTarget = {
  kind: "attribute-assign" | "index-assign";
  targetName: string;
  pairs: Pair[];
  read: Expression;
  deps: string[];
};

function createInstrumentPlugin(
  source: string,
  filename: string,
  opts: ResolvedOptions,
  points: InstrumentationPoint[]
) {
  return (api: { types: Types }): PluginObj => {
    const t = api.types;

    // recorder calls: neither they nor anything inside them is instrumented
    const opaque = new WeakSet<Node>();
    // scaffolding statements: skipped themselves, children still visited
    const generated = new WeakSet<Node>();
    const handled = new WeakSet<Node>();
    // try blocks wrapping a function body; bindings there belong to the frame
    const frameBodies = new WeakSet<Node>();
    const functionNames = new WeakMap<Node, string>();
    let programNames: string[] = [];

    const markOpaque = <N extends Node>(node: N): N => {
      opaque.add(node);
      return node;
    };
    const markGen = <N extends Node>(node: N): N => {
      generated.add(node);
      return node;
    };
    const isOpaque = <N extends Node>(path: NodePath<N>): boolean =>
      opaque.has(path.node) || path.findParent((p) => opaque.has(p.node)) !== null;
    const shouldSkip = <N extends Node>(path: NodePath<N>): boolean =>
      generated.has(path.node) || isOpaque(path);

    const sourceOf = (node: Node): string =>
      node.start != null && node.end != null ? source.slice(node.start, node.end) : "";
    const str = (s: string) => t.stringLiteral(s);
    const nameList = (names: string[]) => t.arrayExpression(names.map(str));
    const voidZero = () => t.unaryExpression("void", t.numericLiteral(0));
    const bindingNames = (node: Node): string[] =>
      Object.keys(t.getBindingIdentifiers(node)).filter((n) => !isInternalName(n));
    const scopeNames = (bindings: Record<string, unknown>): string[] =>
      Object.keys(bindings).filter((n) => n !== "arguments" && !isInternalName(n));
    const blockOf = (stmt: Statement): BabelTypes.BlockStatement =>
      t.isBlockStatement(stmt) ? stmt : t.blockStatement([stmt]);

    const recorderCall = (method: string, args: Array<Expression | BabelTypes.SpreadElement>) =>
      t.callExpression(t.memberExpression(t.identifier(RECORDER_LOCAL), t.identifier(method)), args);

    const point = (kind: EventKind, at: Node): Expression[] => {
      const pointId = points.length + 1;
      const line = at.loc?.start.line ?? 0;
      points.push({ pointId, kind, line, column: at.loc?.start.column ?? 0 });
      return [t.numericLiteral(pointId), str(filename), t.numericLiteral(line)];
    };

    const record = (kind: EventKind, at: Node, pairs: Pair[]): BabelTypes.ExpressionStatement =>
      markOpaque(
        t.expressionStatement(
          recorderCall("recordEvent", [...point(kind, at), str(kind), ...pairs.flatMap(([k, v]) => [str(k), v])])
        )
      );

    const getters = (names: string[]) =>
      t.objectExpression(
        names.map((n) => t.objectProperty(str(n), t.arrowFunctionExpression([], t.identifier(n))))
      );

    const keyName = (key: Node): string | undefined => {
      if (t.isIdentifier(key)) return key.name;
      if (t.isStringLiteral(key)) return key.value;
      if (t.isNumericLiteral(key)) return String(key.value);
      if (t.isPrivateName(key)) return `#${key.id.name}`;
      return undefined;
    };

    const inferFunctionName = (path: NodePath<BabelTypes.Function>): string => {
      const n = path.node;
      if ((t.isFunctionDeclaration(n) || t.isFunctionExpression(n)) && n.id) return n.id.name;
      if (t.isClassMethod(n) || t.isObjectMethod(n) || t.isClassPrivateMethod(n)) {
        return keyName(n.key) ?? "anonymous";
      }
      const parent = path.parent;
      if (t.isVariableDeclarator(parent) && t.isIdentifier(parent.id)) return parent.id.name;
      if (t.isAssignmentExpression(parent)) {
        if (t.isIdentifier(parent.left)) return parent.left.name;
        if (t.isMemberExpression(parent.left) && !parent.left.computed) {
          return keyName(parent.left.property) ?? "anonymous";
        }
      }
      if ((t.isObjectProperty(parent) || t.isClassProperty(parent)) && !parent.computed) {
        return keyName(parent.key) ?? "anonymous";
      }
      return "anonymous";
    };

    const isLiteralKey = (n: Node): boolean =>
      t.isStringLiteral(n) || t.isNumericLiteral(n) || t.isBooleanLiteral(n) || t.isNullLiteral(n) || t.isBigIntLiteral(n);

    // Binds an expression to a fresh const placed before the statement and
    // returns a reference to it. Target objects and keys always go through one:
    // the right-hand side may rebind a plain identifier before the write.
    const hoist = (path: NodePath<BabelTypes.ExpressionStatement>, expr: Expression, hint: string) => {
      const tmp = path.scope.generateUidIdentifier(hint);
      path.insertBefore(markGen(t.variableDeclaration("const", [t.variableDeclarator(tmp, expr)])));
      return t.cloneNode(tmp);
    };

    const describeMember = (
      path: NodePath<BabelTypes.ExpressionStatement>,
      member: BabelTypes.MemberExpression
    ): MemberTarget => {
      const targetName = sourceOf(member);
      const deps = collectReads(t, member);

      const object = member.object;
      if (!t.isSuper(object) && !t.isThisExpression(object)) member.object = hoist(path, object, "whyObj");
      const property = member.property;
      if (member.computed && t.isExpression(property) && !isLiteralKey(property)) {
        member.property = hoist(path, property, "whyKey");
      }

      const hoisted = member.object;
      const objectRead = t.isSuper(hoisted) ? t.thisExpression() : t.cloneNode(hoisted);
      const read = t.cloneNode(member, true);
      const key = member.property;
      if (!member.computed || t.isStringLiteral(key)) {
        return {
          kind: "attribute-assign",
          targetName,
          pairs: [
            ["object", objectRead],
            ["attribute", str(keyName(key) ?? sourceOf(key))],
          ],
          read,
          deps,
        };
      }
      return {
        kind: "index-assign",
        targetName,
        pairs: [
          ["container", objectRead],
          ["index", t.isExpression(key) ? t.cloneNode(key) : str(sourceOf(key))],
        ],
        read,
        deps,
      };
    };

    const assignRecord = (at: Node, name: string, deps: string[]) =>
      record("assign", at, [
        ["targetName", str(name)],
        ["value", t.identifier(name)],
        ["dependsOn", nameList(deps)],
      ]);

    const targetRecords = (
      path: NodePath<BabelTypes.ExpressionStatement>,
      target: BabelTypes.AssignmentExpression["left"],
      deps: string[],
      at: Node
    ): Statement[] => {
      if (t.isIdentifier(target)) {
        return isInternalName(target.name) ? [] : [assignRecord(at, target.name, deps)];
      }
      if (t.isMemberExpression(target)) {
        const m = describeMember(path, target);
        return [
          record(m.kind, at, [
            ["targetName", str(m.targetName)],
            ...m.pairs,
            ["value", m.read],
            ["dependsOn", nameList(mergeNames(deps, m.deps))],
          ]),
        ];
      }
      return bindingNames(target).map((name) => assignRecord(at, name, deps));
    };

    const augmentedRecord = (
      path: NodePath<BabelTypes.ExpressionStatement>,
      target: Node,
      operator: string,
      valueDeps: string[],
      at: Node
    ): Statement | undefined => {
      if (t.isIdentifier(target)) {
        if (isInternalName(target.name)) return undefined;
        return record("augmented-assign", at, [
          ["targetName", str(target.name)],
          ["operator", str(operator)],
          ["value", t.identifier(target.name)],
          ["dependsOn", nameList(mergeNames(valueDeps, [target.name]))],
        ]);
      }
      if (t.isMemberExpression(target)) {
        const m = describeMember(path, target);
        return record("augmented-assign", at, [
          ["targetName", str(m.targetName)],
          ["operator", str(operator)],
          ...m.pairs,
          ["value", m.read],
          ["dependsOn", nameList(mergeNames(valueDeps, m.deps))],
        ]);
      }
      return undefined;
    };

    const instrumentAssignment = (
      path: NodePath<BabelTypes.ExpressionStatement>,
      expr: BabelTypes.AssignmentExpression
    ) => {
      if (expr.operator !== "=") {
        const stmt = augmentedRecord(path, expr.left, expr.operator, collectReads(t, expr.right), expr);
        if (stmt) path.insertAfter(stmt);
        return;
      }
      const targets: Array<BabelTypes.AssignmentExpression["left"]> = [];
      let value: Expression = expr;
      while (t.isAssignmentExpression(value) && value.operator === "=") {
        targets.push(value.left);
        value = value.right;
      }
      const deps = collectReads(t, value);
      const records = targets.flatMap((target) => targetRecords(path, target, deps, expr));
      if (records.length > 0) path.insertAfter(records);
    };

    const spliceCallee = (expr: Expression): BabelTypes.MemberExpression | undefined => {
      if (!t.isCallExpression(expr) || !t.isMemberExpression(expr.callee)) return undefined;
      const callee = expr.callee;
      return !callee.computed && t.isIdentifier(callee.property, { name: "splice" }) ? callee : undefined;
    };

    const instrumentSplice = (
      path: NodePath<BabelTypes.ExpressionStatement>,
      call: BabelTypes.CallExpression,
      callee: BabelTypes.MemberExpression
    ) => {
      const object = callee.object;
      if (t.isSuper(object)) return;
      const args: Array<Expression | BabelTypes.SpreadElement> = [];
      for (const a of call.arguments) {
        if (!t.isExpression(a) && !t.isSpreadElement(a)) return;
        args.push(a);
      }

      const targetName = sourceOf(object);
      const deps = mergeNames(...args.map((a) => collectReads(t, a)), collectReads(t, object));
      const container = t.isThisExpression(object) ? object : hoist(path, object, "whyObj");
      callee.object = container;
      const spliced = hoist(path, t.arrayExpression(args), "whyArgs");
      call.arguments = [t.spreadElement(spliced)];

      const arg = (i: number) => t.memberExpression(t.cloneNode(spliced), t.numericLiteral(i), true);
      path.insertAfter(
        record("slice-assign", call, [
          ["targetName", str(targetName)],
          ["container", t.cloneNode(container)],
          ["start", arg(0)],
          ["deleteCount", arg(1)],
          ["value", t.callExpression(t.memberExpression(t.cloneNode(spliced), t.identifier("slice")), [t.numericLiteral(2)])],
          ["dependsOn", nameList(deps)],
        ])
      );
    };

    const isRequireMain = (n: Node) =>
      t.isMemberExpression(n) &&
      !n.computed &&
      t.isIdentifier(n.object, { name: "require" }) &&
      t.isIdentifier(n.property, { name: "main" });

    const isMainGuard = (n: Node) =>
      t.isBinaryExpression(n) &&
      (n.operator === "===" || n.operator === "==") &&
      ((isRequireMain(n.left) && t.isIdentifier(n.right, { name: "module" })) ||
        (t.isIdentifier(n.left, { name: "module" }) && isRequireMain(n.right)));

    const assignedNames = (expr: Expression): string[] => {
      if (t.isSequenceExpression(expr)) return expr.expressions.flatMap(assignedNames);
      if (t.isAssignmentExpression(expr)) return bindingNames(expr.left);
      return [];
    };

    return {
      visitor: {
        Program: {
          enter(path) {
            programNames = scopeNames(path.scope.bindings);
          },
          exit(path) {
            path.unshiftContainer("body", [
              markOpaque(
                t.variableDeclaration("const", [
                  t.variableDeclarator(t.identifier(RECORDER_LOCAL), t.identifier(opts.recorderBinding)),
                ])
              ),
              markOpaque(t.expressionStatement(recorderCall("attachModule", [str(filename), getters(programNames)]))),
            ]);
          },
        },

        Function(path) {
          const fn = path.node;
          if (handled.has(fn) || isOpaque(path)) return;
          handled.add(fn);

          if (!t.isBlockStatement(fn.body)) fn.body = t.blockStatement([t.returnStatement(fn.body)]);
          const body = fn.body;

          const name = inferFunctionName(path);
          functionNames.set(fn, name);
          const frame = path.scope.generateUidIdentifier("whyFrame");

          const open = markOpaque(
            t.expressionStatement(
              t.assignmentExpression(
                "=",
                t.cloneNode(frame),
                recorderCall("enterFrame", [str(name), getters(scopeNames(path.scope.bindings))])
              )
            )
          );
          const params: Node[] = fn.params;
          const entry = record("function-entry", fn, [
            ["functionName", str(name)],
            ["parameters", nameList(params.map((p) => (t.isIdentifier(p) ? p.name : sourceOf(p))))],
            ["args", t.arrayExpression(params.map((p) => toReadContext(t, p)))],
          ]);
          const close = markOpaque(t.expressionStatement(recorderCall("exitFrame", [t.cloneNode(frame)])));

          const tryBlock = t.blockStatement([open, entry, ...body.body]);
          frameBodies.add(tryBlock);
          body.body = [
            markGen(t.variableDeclaration("let", [t.variableDeclarator(frame)])),
            markGen(t.tryStatement(tryBlock, null, t.blockStatement([close]))),
          ];
        },

        ReturnStatement(path) {
          if (shouldSkip(path)) return;
          const fnPath = path.getFunctionParent();
          const fnName = fnPath ? functionNames.get(fnPath.node) ?? inferFunctionName(fnPath) : "<module>";
          const argument = path.node.argument;
          if (!argument) {
            path.insertBefore(
              record("return", path.node, [
                ["functionName", str(fnName)],
                ["value", voidZero()],
              ])
            );
            return;
          }
          const tmp = path.scope.generateUidIdentifier("whyReturn");
          // returns synthesized from arrow expression bodies carry no location
          const at = path.node.loc ? path.node : argument;
          path.replaceWith(
            t.blockStatement([
              markGen(t.variableDeclaration("const", [t.variableDeclarator(tmp, argument)])),
              record("return", at, [
                ["functionName", str(fnName)],
                ["value", t.cloneNode(tmp)],
              ]),
              markGen(t.returnStatement(t.cloneNode(tmp))),
            ])
          );
        },

        ExpressionStatement(path) {
          if (handled.has(path.node) || shouldSkip(path)) return;
          handled.add(path.node);
          const expr = path.node.expression;
          if (t.isAssignmentExpression(expr)) {
            instrumentAssignment(path, expr);
          } else if (t.isUpdateExpression(expr)) {
            const stmt = augmentedRecord(path, expr.argument, expr.operator, [], expr);
            if (stmt) path.insertAfter(stmt);
          } else if (t.isCallExpression(expr)) {
            const callee = spliceCallee(expr);
            if (callee) instrumentSplice(path, expr, callee);
          }
        },

        VariableDeclaration(path) {
          if (handled.has(path.node) || shouldSkip(path)) return;
          const parent = path.parent;
          if (t.isForStatement(parent) || t.isForXStatement(parent)) return;
          handled.add(path.node);

          const records: Statement[] = [];
          for (const d of path.node.declarations) {
            if (!d.init) continue;
            const deps = collectReads(t, d.init);
            for (const name of bindingNames(d.id)) records.push(assignRecord(d, name, deps));
          }
          if (records.length > 0) path.insertAfter(records);
        },

        IfStatement(path) {
          const node = path.node;
          if (handled.has(node) || shouldSkip(path)) return;
          handled.add(node);

          const condition = sourceOf(node.test);
          let deps = collectReads(t, node.test);
          if (opts.runAsMain && t.isProgram(path.parent) && isMainGuard(node.test)) {
            node.test = t.booleanLiteral(true);
            deps = [];
          }
          const branch = (decision: BranchDecision, result: boolean) =>
            record("branch", node, [
              ["condition", str(condition)],
              ["result", t.booleanLiteral(result)],
              ["decision", str(decision)],
              ["dependsOn", nameList(deps)],
            ]);

          const isElif = t.isIfStatement(path.parent) && path.key === "alternate";
          const consequent = blockOf(node.consequent);
          consequent.body.unshift(branch(isElif ? "elif" : "then", true));
          node.consequent = consequent;

          const alternate = node.alternate;
          if (!alternate) {
            node.alternate = markGen(t.blockStatement([branch("implicit-skip", false)]));
          } else if (!t.isIfStatement(alternate)) {
            const block = blockOf(alternate);
            block.body.unshift(branch("else", false));
            node.alternate = block;
          }
        },

        ForXStatement(path) {
          const node = path.node;
          if (handled.has(node) || shouldSkip(path)) return;
          handled.add(node);

          const left = node.left;
          const pattern = t.isVariableDeclaration(left) ? left.declarations[0].id : left;
          const body = blockOf(node.body);
          body.body.unshift(
            record("loop-iteration", node, [
              ["target", str(t.isIdentifier(pattern) ? pattern.name : sourceOf(pattern))],
              ["value", toReadContext(t, pattern)],
            ])
          );
          node.body = body;
        },

        ForStatement(path) {
          const node = path.node;
          if (handled.has(node) || shouldSkip(path)) return;
          handled.add(node);

          const init = node.init;
          let names: string[] = [];
          if (t.isVariableDeclaration(init)) names = init.declarations.flatMap((d) => bindingNames(d.id));
          else if (init) names = assignedNames(init);

          let value: Expression = voidZero();
          if (names.length === 1) value = t.identifier(names[0]);
          else if (names.length > 1) value = t.arrayExpression(names.map((n) => t.identifier(n)));

          const body = blockOf(node.body);
          body.body.unshift(
            record("loop-iteration", node, [
              ["target", names.length > 0 ? str(names.join(", ")) : t.nullLiteral()],
              ["value", value],
            ])
          );
          node.body = body;
        },

        WhileStatement(path) {
          const node = path.node;
          if (handled.has(node) || shouldSkip(path)) return;
          handled.add(node);

          const body = blockOf(node.body);
          body.body.unshift(
            record("while-condition", node, [
              ["condition", str(sourceOf(node.test))],
              ["result", t.booleanLiteral(true)],
              ["dependsOn", nameList(collectReads(t, node.test))],
            ])
          );
          node.body = body;
        },

        DoWhileStatement(path) {
          const node = path.node;
          if (handled.has(node) || shouldSkip(path)) return;
          handled.add(node);

          const body = blockOf(node.body);
          body.body.unshift(
            record("loop-iteration", node, [
              ["target", t.nullLiteral()],
              ["value", voidZero()],
            ])
          );
          node.body = body;
        },

        // Block-scoped bindings are visible to snapshots only while their block
        // runs. A loop's head bindings join its body; a catch body already
        // shares the clause's scope.
        BlockStatement(path) {
          const node = path.node;
          if (handled.has(node) || frameBodies.has(node) || shouldSkip(path)) return;
          handled.add(node);
          if (t.isFunction(path.parent)) return;

          const parentPath = path.parentPath;
          const headNames =
            parentPath && (parentPath.isForStatement() || parentPath.isForXStatement())
              ? scopeNames(parentPath.scope.bindings)
              : [];
          const names = mergeNames(headNames, scopeNames(path.scope.bindings));
          if (names.length === 0) return;

          const scope = path.scope.generateUidIdentifier("whyScope");
          const enter = recorderCall("enterBlock", [str(filename), getters(names)]);
          const open = markOpaque(t.expressionStatement(t.assignmentExpression("=", t.cloneNode(scope), enter)));
          const close = markOpaque(t.expressionStatement(recorderCall("exitBlock", [t.cloneNode(scope)])));
          const inner = t.blockStatement([open, ...node.body]);
          handled.add(inner);
          node.body = [
            markGen(t.variableDeclaration("let", [t.variableDeclarator(scope)])),
            markGen(t.tryStatement(inner, null, t.blockStatement([close]))),
          ];
        },

        CallExpression(path) {
          if (!opts.traceCalls || shouldSkip(path)) return;
          const node = path.node;
          const callee = node.callee;
          if (node.optional || t.isSuper(callee) || t.isV8IntrinsicIdentifier(callee) || t.isImport(callee)) return;
          // direct eval must stay direct
          if (t.isIdentifier(callee, { name: "eval" })) return;
          if (t.isMemberExpression(callee) && t.isIdentifier(callee.object, { name: RECORDER_LOCAL })) return;

          const args: Array<Expression | BabelTypes.SpreadElement> = [];
          for (const a of node.arguments) {
            if (!t.isExpression(a) && !t.isSpreadElement(a)) return;
            args.push(a);
          }

          const functionName = str(sourceOf(callee));
          if (t.isMemberExpression(callee)) {
            const receiver = callee.object;
            const property = callee.property;
            if (t.isSuper(receiver) || t.isPrivateName(property)) return;
            const key = callee.computed ? property : str(keyName(property) ?? sourceOf(property));
            path.replaceWith(
              markGen(
                recorderCall("invokeMethod", [
                  ...point("call", node),
                  functionName,
                  receiver,
                  key,
                  t.arrayExpression(args),
                ])
              )
            );
            return;
          }
          path.replaceWith(
            markGen(recorderCall("invoke", [...point("call", node), functionName, callee, t.arrayExpression(args)]))
          );
        },
      },
    };
  };
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function parseLocation(e: unknown): { line: number; column: number } | undefined {
  if (!(e instanceof Error) || !("loc" in e)) return undefined;
  const loc = e.loc;
  if (typeof loc !== "object" || loc === null || !("line" in loc) || !("column" in loc)) return undefined;
  const { line, column } = loc;
  return typeof line === "number" && typeof column === "number" ? { line, column } : undefined;
}

// Compiles without running, under the same strict prologue the runner uses.
function compileScript(recorderBinding: string, code: string) {
  new Function(recorderBinding, `"use strict";\n${code}\n`);
}

/**
 * Rewrites `code` so that running it reports to an injected recorder.
 *
 * The source is parsed first; a syntax error there becomes an
 * {@link InstrumentParseError}. Script source must also compile in strict
 * mode as written (the parser does not check regular expression bodies or
 * strict-only rules such as `with`). Anything that goes wrong while rewriting,
 * generating or compiling the result becomes an {@link InstrumentFinalizeError}.
 */
export function instrument(code: string, filename = "<script>", options: InstrumentOptions = {}): InstrumentResult {
  const opts = InstrumentOptionsSchema.parse(options);

  let parsed: BabelFileResult | null;
  try {
    parsed = Babel.transform(code, {
      ast: true,
      code: false,
      filename,
      sourceType: opts.sourceType,
      parserOpts: PARSER_OPTS,
    });
  } catch (e) {
    throw new InstrumentParseError(messageOf(e), filename, parseLocation(e), { cause: e });
  }
  if (!parsed?.ast) throw new InstrumentParseError("Parser produced no syntax tree", filename);
  if (opts.sourceType === "script") {
    try {
      compileScript(opts.recorderBinding, code);
    } catch (e) {
      throw new InstrumentParseError(`${filename} does not compile: ${messageOf(e)}`, filename, undefined, { cause: e });
    }
  }

  const points: InstrumentationPoint[] = [];
  let output: string | null | undefined;
  try {
    output = Babel.transformFromAst(parsed.ast, code, {
      filename,
      sourceType: opts.sourceType,
      plugins: [createInstrumentPlugin(code, filename, opts, points)],
      generatorOpts: { retainLines: true, compact: false, comments: true },
    })?.code;
  } catch (e) {
    throw new InstrumentFinalizeError(`Could not rewrite ${filename}: ${messageOf(e)}`, filename, { cause: e });
  }
  if (!output) throw new InstrumentFinalizeError(`Rewriting ${filename} produced no code`, filename);

  // module code cannot be checked this way
  if (opts.sourceType === "script") {
    try {
      compileScript(opts.recorderBinding, output);
    } catch (e) {
      throw new InstrumentFinalizeError(`Instrumented ${filename} does not compile: ${messageOf(e)}`, filename, {
        cause: e,
      });
    }
  }

  log.debug("instrumented", { filename, points: points.length });
  return { code: output, points };
}

export function instrumentSource(code: string, filename = "<script>", options: InstrumentOptions = {}): string {
  return instrument(code, filename, options).code;
}
