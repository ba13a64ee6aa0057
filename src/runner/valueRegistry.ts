import type { ObjId } from "../trace/types";

function isObjectLike(v: unknown): v is object {
  return (typeof v === "object" && v !== null) || typeof v === "function";
}

function isClassConstructor(fn: Function): boolean {
  return /^class\b/.test(Function.prototype.toString.call(fn));
}

// Name of the value's runtime type: the constructor name for objects, the
// `typeof` tag for primitives.
export function runtimeTypeName(v: unknown): string {
  if (v === null) return "null";
  if (typeof v === "function") return isClassConstructor(v) ? "Class" : "Function";
  if (typeof v !== "object") return typeof v;
  try {
    const ctor: unknown = Reflect.getPrototypeOf(v)?.constructor;
    if (typeof ctor === "function" && ctor.name) return ctor.name;
  } catch {
    // revoked proxies throw on prototype access
    return "Proxy";
  }
  return "Object";
}

export function placeholderFor(v: unknown): string {
  return `<unserializable: ${runtimeTypeName(v)}>`;
}

// Structured copy of a value for a snapshot or payload. Anything the structured
// clone algorithm rejects (functions, symbols, promises, objects holding them)
// becomes a placeholder naming its type.
export function snapshotValue(v: unknown): unknown {
  if (typeof v === "function" || typeof v === "symbol") return placeholderFor(v);
  if (!isObjectLike(v)) return v;
  try {
    return structuredClone(v);
  } catch {
    return placeholderFor(v);
  }
}

export class ValueRegistry {
  private objIdMap = new WeakMap<object, ObjId>();
  private objIdSeq = 1;

  ensureObjId(o: object): ObjId {
    let id = this.objIdMap.get(o);
    if (id === undefined) {
      id = this.objIdSeq++;
      this.objIdMap.set(o, id);
    }
    return id;
  }

  idOf(v: unknown): ObjId | undefined {
    return isObjectLike(v) ? this.ensureObjId(v) : undefined;
  }

  // number of ids handed out so far
  get allocated(): number {
    return this.objIdSeq - 1;
  }

  reset() {
    this.objIdMap = new WeakMap();
    this.objIdSeq = 1;
  }
}
