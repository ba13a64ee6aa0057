import type { types as BabelTypes } from "@babel/core";
import { isInternalName } from "../trace/types";

type Types = typeof BabelTypes;

// Names an expression reads, in first-seen order. Nested functions are not
// entered: their bodies do not run when the expression is evaluated.
export function collectReads(t: Types, root: BabelTypes.Node | null | undefined): string[] {
  const names = new Set<string>();

  const walk = (node: BabelTypes.Node, parent?: BabelTypes.Node, grandparent?: BabelTypes.Node) => {
    if (t.isIdentifier(node)) {
      const referenced = parent === undefined || t.isReferenced(node, parent, grandparent);
      if (referenced && node.name !== "undefined" && !isInternalName(node.name)) names.add(node.name);
      return;
    }
    if (t.isFunction(node)) return;

    for (const key of t.VISITOR_KEYS[node.type] ?? []) {
      const child: unknown = Reflect.get(node, key);
      if (Array.isArray(child)) {
        for (const c of child) if (t.isNode(c)) walk(c, node, parent);
      } else if (t.isNode(child)) {
        walk(child, node, parent);
      }
    }
  };

  if (root) walk(root);
  return [...names];
}

export function mergeNames(...lists: string[][]): string[] {
  return [...new Set(lists.flat())];
}
