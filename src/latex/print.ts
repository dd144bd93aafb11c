/// # printing latex tokens
///
/// the last step: tokens in, text out. three things happen here and
/// nowhere else:
///
/// 1. runs of `nl` tokens are merged into one line break
/// 2. text is escaped for latex
/// 3. `\verb` spans get a delimiter that does not occur in them

import { VerbatimDelimiterError } from "../errors.js";
import { resolveOptions, type DocOptionsInput } from "../options.js";
import type { DocTree } from "../wiki/types.js";
import { renderLatex, type LatexContext } from "./render.js";
import type { LatexToken, NewlineToken } from "./tokens.js";

/// ## blank lines
///
/// a run takes the largest count in it. if any member is exact the
/// whole run is: an exact run prints its count as is, an at-least run
/// only tops up the line breaks already at the end of the output.
export function collapseNewlines(run: readonly NewlineToken[]): { count: number; exact: boolean } {
  let count = 0;
  let exact = false;
  for (const token of run) {
    count = Math.max(count, token.count);
    exact ||= token.exact;
  }
  return { count, exact };
}

function trailingNewlines(s: string): number {
  let n = 0;
  while (n < s.length && s[s.length - 1 - n] === "\n") n++;
  return n;
}

/// ## escaping

const replacements: Record<string, string> = {
  "<": "$<$",
  ">": "$>$",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "#": "\\#",
  "\\": "\\bsl{}"
};

export function escapeLatex(s: string): string {
  return s.replace(/[<>{}$#\\]/g, c => replacements[c] ?? c);
}

export const verbDelimiters = ["$", "|", "@", "=", '"', "^", "!"] as const;

export function chooseVerbDelimiter(s: string): string {
  const delimiter = verbDelimiters.find(c => !s.includes(c));
  if (delimiter === undefined) throw new VerbatimDelimiterError(s);
  return delimiter;
}

/// ## the print loop

const startsWithLetter = /^[A-Za-z]/;

export function printTokens(tokens: readonly LatexToken[]): string {
  let out = "";
  let column = 0;
  /// a command name just written; a letter right after it would run
  /// into the name.
  let afterCommand = false;

  const write = (s: string) => {
    if (s === "") return;
    if (afterCommand && startsWithLetter.test(s)) {
      out += " ";
      column++;
    }
    afterCommand = false;
    out += s;
    const lastBreak = s.lastIndexOf("\n");
    column = lastBreak >= 0 ? s.length - lastBreak - 1 : column + s.length;
  };

  const freshLine = () => {
    if (column > 0) write("\n");
  };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    if (token.kind === "nl") {
      const run: NewlineToken[] = [];
      while (i < tokens.length) {
        const next = tokens[i];
        if (next.kind !== "nl") break;
        run.push(next);
        i++;
      }
      /// nothing is written before the first line of output.
      if (out === "") continue;
      const { count, exact } = collapseNewlines(run);
      write("\n".repeat(exact ? count : Math.max(0, count - trailingNewlines(out))));
      continue;
    }

    switch (token.kind) {
      case "cmd":
        write(`\\${token.name}`);
        afterCommand = true;
        break;
      case "open":
        write("{");
        break;
      case "close":
        write("}");
        break;
      case "verb": {
        const delimiter = chooseVerbDelimiter(token.text);
        write(`\\verb${delimiter}${token.text}${delimiter}`);
        break;
      }
      case "code":
        freshLine();
        write("\\begin{code}\n");
        write(token.text);
        freshLine();
        write("\\end{code}");
        break;
      case "indent":
        if (column < token.column) write(" ".repeat(token.column - column));
        break;
      case "text":
        write(escapeLatex(token.text));
        break;
      case "raw":
        write(token.text);
        break;
    }
    i++;
  }

  return out;
}

/// ## documents

const header = [
  "\\documentclass[11pt]{article}",
  "\\usepackage{times}",
  "\\usepackage{pl}",
  "\\sloppy",
  "\\makeindex",
  "",
  "\\begin{document}"
];

const footer = ["", "\\printindex", "\\end{document}"];

/// the printed tokens, wrapped in a complete document unless
/// `standAlone` is off. the result always ends in a newline.
export function printLatex(tokens: readonly LatexToken[], options: DocOptionsInput = {}): string {
  const { standAlone } = resolveOptions(options);
  const body = printTokens(tokens).replace(/\n+$/, "");

  if (!standAlone) return body === "" ? "" : `${body}\n`;
  return [...header, body, ...footer].join("\n") + "\n";
}

export function latexForTrees(trees: readonly DocTree[], ctx: LatexContext = {}): string {
  return printLatex(renderLatex(trees, ctx), ctx.options);
}
