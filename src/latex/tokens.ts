/// # latex tokens
///
/// the latex renderer does not write text. it produces a flat stream of
/// these tokens and `printLatex` turns them into a file. keeping layout
/// as tokens means the spacing around a command is stated once, in
/// `commandLayout`, and neighbouring blank-line requests can be merged
/// before anything is printed.

export type LatexToken =
  /// `\name`; its arguments follow as `open`/`close` groups.
  | { kind: "cmd"; name: string }
  | { kind: "open" }
  | { kind: "close" }
  /// inline verbatim, printed with a delimiter absent from `text`.
  | { kind: "verb"; text: string }
  /// a `\begin{code}` block on lines of its own.
  | { kind: "code"; text: string }
  /// end the line and leave `count - 1` blank lines. `exact` pins the
  /// count instead of only bounding it from below.
  | { kind: "nl"; count: number; exact: boolean }
  /// pad with spaces up to `column`.
  | { kind: "indent"; column: number }
  /// escaped on output.
  | { kind: "text"; text: string }
  /// printed as written.
  | { kind: "raw"; text: string };

export type NewlineToken = Extract<LatexToken, { kind: "nl" }>;

export function nl(count: number): NewlineToken {
  return { kind: "nl", count, exact: false };
}

export function nlExact(count: number): NewlineToken {
  return { kind: "nl", count, exact: true };
}

export function text(value: string): LatexToken {
  return { kind: "text", text: value };
}

export function raw(value: string): LatexToken {
  return { kind: "raw", text: value };
}

export function indent(column: number): LatexToken {
  return { kind: "indent", column };
}

/// ## layout
///
/// what goes before a command and after its last argument. commands not
/// listed run inline.

export interface CommandLayout {
  before: readonly LatexToken[];
  after: readonly LatexToken[];
}

const sectioning: CommandLayout = { before: [nl(2)], after: [nl(2)] };
const entry: CommandLayout = { before: [nl(1), indent(4)], after: [nl(1)] };

export const commandLayout: Readonly<Partial<Record<string, CommandLayout>>> = {
  begin: { before: [nl(1)], after: [nlExact(1)] },
  end: { before: [nlExact(1)], after: [nl(1)] },
  chapter: sectioning,
  section: sectioning,
  subsection: sectioning,
  subsubsection: sectioning,
  paragraph: sectioning,
  item: { before: [nl(1), indent(4)], after: [text(" ")] },
  tag: entry,
  termitem: entry,
  predicate: entry,
  dcg: entry,
  infixop: entry,
  prefixop: entry,
  postfixop: entry
};
