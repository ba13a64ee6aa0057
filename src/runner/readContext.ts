import type { types as BabelTypes } from "@babel/core";

type Types = typeof BabelTypes;

// Turns an assignment target (identifier, member, destructuring pattern) into
// an expression that reads back what was just written. Defaults are dropped
// and rest elements are spread back in.
export function toReadContext(t: Types, node: BabelTypes.Node): BabelTypes.Expression {
  if (t.isArrayPattern(node)) {
    return t.arrayExpression(
      node.elements.map((el) => {
        if (el === null) return null;
        if (t.isRestElement(el)) return t.spreadElement(toReadContext(t, el.argument));
        return toReadContext(t, el);
      })
    );
  }
  if (t.isObjectPattern(node)) {
    return t.objectExpression(
      node.properties.map((p) => {
        if (t.isRestElement(p)) return t.spreadElement(toReadContext(t, p.argument));
        return t.objectProperty(t.cloneNode(p.key), toReadContext(t, p.value), p.computed);
      })
    );
  }
  if (t.isAssignmentPattern(node)) return toReadContext(t, node.left);
  if (t.isRestElement(node)) return toReadContext(t, node.argument);
  if (t.isTSParameterProperty(node)) return toReadContext(t, node.parameter);
  if (t.isExpression(node)) return t.cloneNode(node, true);
  throw new TypeError(`Cannot read back a ${node.type} target`);
}
