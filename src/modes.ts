/// # mode lines
///
/// a predicate comment opens with one or more mode lines:
///
/// ```
/// %% append(+List1, +List2, -List3) is det.
/// %% append(?Prefix, ?Suffix, +List) is nondet.
/// ```
///
/// each becomes a `Signature`. how the head is laid out (plain term,
/// grammar rule, or operator) is decided here, once, so that the html
/// and latex backends never have to look at the operator table.

import { findTopLevel, parseCompound, splitTopLevel } from "./terms.js";

export type ModeIndicator = "+" | "-" | "?" | "@" | ":";

export const determinisms = ["det", "semidet", "nondet", "multi", "failure", "unknown"] as const;

export type Determinism = (typeof determinisms)[number];

export type HeadLayout = "plain" | "dcg" | "infix" | "prefix" | "postfix";

export interface ArgSlot {
  mode?: ModeIndicator;
  /// undefined for an anonymous `_` slot that no binding named.
  name?: string;
  type?: string;
  /// written as `Arg...`: the argument may repeat.
  repeated: boolean;
}

export interface Signature {
  functor: string;
  arity: number;
  args: ArgSlot[];
  determinism: Determinism;
  layout: HeadLayout;
}

/// ## operators
///
/// heads such as `+Term1 == +Term2` or `\+ :Goal` are operator terms.
/// the table below holds the standard operators; callers documenting
/// code that defines its own can pass an extended table.

export type Fixity = "infix" | "prefix" | "postfix";

export class OperatorTable {
  private readonly ops = new Map<string, Set<Fixity>>();

  constructor(entries: Partial<Record<Fixity, readonly string[]>> = {}) {
    for (const fixity of ["infix", "prefix", "postfix"] as const) {
      for (const name of entries[fixity] ?? []) {
        this.add(name, fixity);
      }
    }
  }

  add(name: string, fixity: Fixity): this {
    const fixities = this.ops.get(name) ?? new Set<Fixity>();
    fixities.add(fixity);
    this.ops.set(name, fixities);
    return this;
  }

  has(name: string, fixity: Fixity): boolean {
    return this.ops.get(name)?.has(fixity) ?? false;
  }

  /// longest names first, so `=..` is tried before `=`.
  names(fixity: Fixity): string[] {
    return [...this.ops]
      .filter(([, fixities]) => fixities.has(fixity))
      .map(([name]) => name)
      .sort((a, b) => b.length - a.length);
  }
}

export const defaultOperators = new OperatorTable({
  infix: [
    ":-", "-->", "->", "*->", ";", "|", "=", "\\=", "==", "\\==", "=@=", "\\=@=",
    "@<", "@>", "@=<", "@>=", "=..", "is", "=:=", "=\\=", "<", ">", "=<", ">=",
    ">:<", ":<", "as", ":", "+", "-", "/\\", "\\/", "xor", "*", "/", "//",
    "rem", "mod", "div", "<<", ">>", "**", "^"
  ],
  prefix: [
    ":-", "?-", "\\+", "-", "+", "\\", "dynamic", "discontiguous", "initialization",
    "meta_predicate", "module_transparent", "multifile", "public", "thread_local", "table"
  ]
});

/// ## parsing

const modeChars = new Set(["+", "-", "?", "@", ":"]);
const argName = /^(?:[A-Z_][A-Za-z0-9_]*|[a-z][A-Za-z0-9_]*|\[\]|\d+)$/;
const variableName = /^[A-Z_][A-Za-z0-9_]*$/;

function isModeIndicator(c: string): c is ModeIndicator {
  return modeChars.has(c);
}

function isDeterminism(word: string): word is Determinism {
  return determinisms.some(d => d === word);
}

export function parseArg(text: string): ArgSlot | undefined {
  let rest = text.trim();
  let mode: ModeIndicator | undefined;

  const first = rest.charAt(0);
  if (isModeIndicator(first)) {
    mode = first;
    rest = rest.slice(1);
  }

  let repeated = false;
  if (rest.endsWith("...")) {
    repeated = true;
    rest = rest.slice(0, -3);
  }

  let type: string | undefined;
  const colon = findTopLevel(rest, ":");
  if (colon >= 0) {
    type = rest.slice(colon + 1).trim();
    rest = rest.slice(0, colon);
    if (type === "") return undefined;
  }

  const name = rest.trim();
  if (!argName.test(name)) return undefined;

  return { mode, name: name === "_" ? undefined : name, type, repeated };
}

/// operator operands must look like arguments (`+X`, `-Y:int`), not
/// words; otherwise prose such as "this is fine" would read as `is/2`.
function parseOperand(text: string): ArgSlot | undefined {
  const arg = parseArg(text);
  if (!arg) return undefined;
  if (arg.name !== undefined && !variableName.test(arg.name)) return undefined;
  return arg;
}

function parseArgs(texts: readonly string[]): ArgSlot[] | undefined {
  const args: ArgSlot[] = [];
  for (const text of texts) {
    const arg = parseArg(text);
    if (!arg) return undefined;
    args.push(arg);
  }
  return args;
}

interface Head {
  functor: string;
  args: ArgSlot[];
  layout: HeadLayout;
}

function parseOperatorHead(head: string, operators: OperatorTable): Head | undefined {
  for (const op of operators.names("infix")) {
    const at = findTopLevel(head, ` ${op} `);
    if (at < 0) continue;
    const left = parseOperand(head.slice(0, at));
    const right = parseOperand(head.slice(at + op.length + 2));
    if (left && right) {
      return { functor: op, args: [left, right], layout: "infix" };
    }
  }

  for (const op of operators.names("prefix")) {
    if (!head.startsWith(`${op} `)) continue;
    const arg = parseOperand(head.slice(op.length + 1));
    if (arg) {
      return { functor: op, args: [arg], layout: "prefix" };
    }
  }

  for (const op of operators.names("postfix")) {
    if (!head.endsWith(` ${op}`)) continue;
    const arg = parseOperand(head.slice(0, -(op.length + 1)));
    if (arg) {
      return { functor: op, args: [arg], layout: "postfix" };
    }
  }

  return undefined;
}

/// the anonymous slots of a `mode(Head, [Names])` declaration take their
/// names from the binding list, left to right.
function bindNames(args: ArgSlot[], names: readonly string[]): ArgSlot[] {
  let next = 0;
  return args.map(arg => {
    if (arg.name !== undefined || next >= names.length) return arg;
    return { ...arg, name: names[next++] };
  });
}

function splitBindings(text: string): string[] | undefined {
  const list = text.trim();
  if (!list.startsWith("[") || !list.endsWith("]")) return undefined;
  const inner = list.slice(1, -1).trim();
  if (inner === "") return [];
  const names = splitTopLevel(inner, ",")?.map(name => name.trim());
  if (!names || names.some(name => !variableName.test(name))) return undefined;
  return names;
}

/// parse one mode line. returns undefined for anything that is not one,
/// which is how the markup parser tells mode lines from prose.
export function parseModeLine(text: string, operators: OperatorTable = defaultOperators): Signature | undefined {
  let line = text.trim();
  if (line.endsWith(".") && !line.endsWith("..")) {
    line = line.slice(0, -1).trimEnd();
  }
  if (line === "") return undefined;

  let determinism: Determinism = "unknown";
  let explicitDet = false;
  const isAt = findTopLevel(line, " is ", true);
  if (isAt >= 0) {
    const word = line.slice(isAt + 4).trim();
    if (isDeterminism(word)) {
      determinism = word;
      explicitDet = true;
      line = line.slice(0, isAt).trimEnd();
    }
  }

  let names: string[] = [];
  const wrapper = parseCompound(line);
  if (wrapper && wrapper.name === "mode" && wrapper.args.length === 2) {
    const bindings = splitBindings(wrapper.args[1]);
    if (bindings) {
      names = bindings;
      line = wrapper.args[0];
    }
  }

  let dcg = false;
  if (line.endsWith("//")) {
    dcg = true;
    line = line.slice(0, -2).trimEnd();
  }

  let head: Head | undefined;
  const compound = parseCompound(line);
  if (compound) {
    const args = parseArgs(compound.args);
    if (!args) return undefined;
    if (args.length === 0 && !dcg && !explicitDet) return undefined;
    head = { functor: compound.name, args, layout: dcg ? "dcg" : "plain" };
  } else if (!dcg) {
    head = parseOperatorHead(line, operators);
  }

  if (!head) return undefined;

  const args = bindNames(head.args, names);
  return {
    functor: head.functor,
    arity: args.length,
    args,
    determinism,
    layout: head.layout
  };
}

/// identity used for anchors and deduplication: `foo/2`, or `foo//1`
/// for a grammar rule.
export function signatureKey(sig: Signature): string {
  return `${sig.functor}${sig.layout === "dcg" ? "//" : "/"}${sig.arity}`;
}

/// `+In:atom`, with unnamed slots shown as `Arg1`, `Arg2`, ... the
/// repetition marker is left to the backend.
export function argText(arg: ArgSlot, position: number): string {
  const name = arg.name ?? `Arg${position}`;
  return `${arg.mode ?? ""}${name}${arg.type !== undefined ? `:${arg.type}` : ""}`;
}
