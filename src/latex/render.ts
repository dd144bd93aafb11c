/// # latex rendering
///
/// walks the same document trees as the html renderer and produces a
/// token stream for `pl.sty`. predicates become `\predicate`, `\dcg` or
/// `\infixop` entries inside a `description` environment; the mode stack
/// opens that environment for a run of predicates and closes it before
/// the next heading or paragraph.
///
/// command arguments are "fragile": inside `{...}` a `\verb` is not
/// allowed, so inline code and file names fall back to `\texttt`. the
/// renderer counts how deep it is inside arguments rather than keeping a
/// flag, since arguments nest.

import { SectionLevelError } from "../errors.js";
import { ModeStack } from "../mode-stack.js";
import { argText, type ArgSlot, type Signature } from "../modes.js";
import { resolveOptions, sectionIndex, sectionLevels, type DocOptions, type DocOptionsInput } from "../options.js";
import { tagTitle } from "../wiki/tags.js";
import {
  plainText,
  unknownKind,
  warnDiagnostic,
  type DiagnosticHandler,
  type DocNode,
  type DocTree,
  type HeadingNode,
  type LinkNode,
  type ParamListNode,
  type PredicateNode,
  type TagNode,
  type TagSectionNode
} from "../wiki/types.js";
import { commandLayout, nl, nlExact, raw, text, type LatexToken } from "./tokens.js";

export interface LatexContext {
  options?: DocOptionsInput;
  onDiagnostic?: DiagnosticHandler;
}

/// an argument is text, or a callback that emits tokens. optional
/// arguments are written `[...]` and left out when they come out empty.
type ArgBody = string | (() => void);
type CommandArg = ArgBody | { optional: ArgBody };

type PageMode = "body" | "description";

const identifier = /^[a-z][A-Za-z0-9]*$/;
const urlScheme = /^[A-Za-z][A-Za-z0-9+.-]*:/;

export class LatexRenderer {
  private readonly options: DocOptions;
  private readonly onDiagnostic: DiagnosticHandler;
  private out: LatexToken[] = [];
  private fragile = 0;

  constructor(ctx: LatexContext = {}) {
    this.options = resolveOptions(ctx.options);
    this.onDiagnostic = ctx.onDiagnostic ?? warnDiagnostic;
  }

  /// a full page: headings and prose at the top, runs of predicates
  /// inside `\begin{description}`.
  renderDocument(trees: readonly DocTree[]): LatexToken[] {
    this.out = [];
    const modes = new ModeStack<PageMode>(
      {
        open: mode => this.command("begin", mode),
        close: mode => this.command("end", mode)
      },
      ["body"]
    );

    for (const tree of trees) {
      for (const node of tree.content) {
        if (node.kind === "predicate") {
          if (!this.isShown(node)) continue;
          modes.need("description");
          this.predicate(node);
        } else {
          modes.popTo("body");
          this.node(node);
        }
      }
    }

    modes.closeAll();
    return this.out;
  }

  /// only the predicate entries, for inclusion in a description list
  /// the caller opens itself.
  renderPredicates(trees: readonly DocTree[]): LatexToken[] {
    this.out = [];
    for (const tree of trees) {
      for (const node of tree.content) {
        if (node.kind === "predicate" && this.isShown(node)) {
          this.predicate(node);
        }
      }
    }
    return this.out;
  }

  private isShown(node: PredicateNode): boolean {
    return !this.options.publicOnly || node.visibility === "public";
  }

  /// ## commands

  private emit(...tokens: LatexToken[]): void {
    this.out.push(...tokens);
  }

  private command(name: string, ...args: CommandArg[]): void {
    const layout = commandLayout[name];
    this.emit(...(layout?.before ?? []));
    this.emit({ kind: "cmd", name });

    this.fragile++;
    try {
      for (const arg of args) {
        if (typeof arg === "object") {
          this.optional(arg.optional);
        } else {
          this.emit({ kind: "open" });
          this.argument(arg);
          this.emit({ kind: "close" });
        }
      }
    } finally {
      this.fragile--;
    }

    this.emit(...(layout?.after ?? []));
  }

  private argument(body: ArgBody): void {
    if (typeof body === "string") {
      if (body !== "") this.emit(text(body));
    } else {
      body();
    }
  }

  private optional(body: ArgBody): void {
    const mark = this.out.length;
    this.emit(raw("["));
    this.argument(body);
    if (this.out.length === mark + 1) {
      this.out.length = mark;
    } else {
      this.emit(raw("]"));
    }
  }

  private inline(nodes: readonly DocNode[]): () => void {
    return () => this.blocks(nodes);
  }

  /// ## nodes

  private blocks(nodes: readonly DocNode[]): void {
    for (const node of nodes) {
      this.node(node);
    }
  }

  node(node: DocNode): void {
    switch (node.kind) {
      case "heading":
        this.heading(node);
        break;
      case "paragraph":
        this.emit(nlExact(2));
        this.blocks(node.content);
        break;
      case "list":
        this.command("begin", node.ordered ? "enumerate" : "itemize");
        for (const item of node.items) {
          this.command("item");
          this.blocks(item);
        }
        this.command("end", node.ordered ? "enumerate" : "itemize");
        break;
      case "descriptionList":
        this.command("begin", "description");
        for (const item of node.items) {
          this.command("termitem", item.term.name, item.term.args.join(", "));
          this.blocks(item.body);
        }
        this.command("end", "description");
        break;
      case "codeBlock":
        this.emit(nl(2), { kind: "code", text: node.text }, nl(2));
        break;
      case "inlineCode":
        this.inlineCode(node.text);
        break;
      case "emphasis":
        this.command(node.style === "bold" ? "textbf" : "textit", this.inline(node.content));
        break;
      case "link":
        this.link(node);
        break;
      case "text":
        this.emit(text(node.text));
        break;
      case "predicateRef":
        this.command(node.ref === "dcg" ? "dcgref" : "predref", node.name, String(node.arity));
        break;
      case "tag":
        this.tags([node]);
        break;
      case "paramList":
        this.params(node);
        break;
      case "tagSection":
        this.tagSection(node);
        break;
      case "predicate":
        if (this.isShown(node)) {
          this.command("begin", "description");
          this.predicate(node);
          this.command("end", "description");
        }
        break;
      default: {
        const unreachable: never = node;
        this.placeholder(unreachable);
      }
    }
  }

  private placeholder(node: unknown): void {
    const kind = unknownKind(node);
    this.onDiagnostic({ backend: "latex", nodeKind: kind, message: `cannot render node of kind "${kind}"` });
    this.emit(text(`[${kind}]`));
  }

  /// heading level 1 uses the configured section command, each deeper
  /// level the next one down the ladder.
  private heading(node: HeadingNode): void {
    const level = sectionIndex(this.options.sectionLevel) + node.level - 1;
    const name = sectionLevels[level];
    if (name === undefined) throw new SectionLevelError(level);
    this.command(name, this.inline(node.content));
  }

  private inlineCode(code: string): void {
    if (identifier.test(code)) {
      this.command("const", code);
    } else if (this.fragile > 0) {
      this.command("texttt", code);
    } else {
      this.emit({ kind: "verb", text: code });
    }
  }

  /// `[[file.pl]]` names a file; anything with a scheme is a url.
  private link(node: LinkNode): void {
    const label = plainText(node.content);
    if (!urlScheme.test(node.target) && label === node.target) {
      this.command(this.fragile > 0 ? "texttt" : "file", node.target);
    } else if (label === node.target) {
      this.command("url", node.target);
    } else {
      this.command("url", { optional: this.inline(node.content) }, node.target);
    }
  }

  /// ## tags

  private params(node: ParamListNode): void {
    this.command("begin", "parameters");
    for (const entry of node.entries) {
      this.emit(nl(1));
      this.command("arg", entry.name);
      this.emit(raw(" & "));
      this.blocks(entry.description);
      this.emit(raw(" \\\\"));
    }
    this.command("end", "parameters");
  }

  private tags(tags: readonly TagNode[]): void {
    if (tags.length === 0) return;
    this.emit(nl(2));
    this.command("begin", "tags");
    for (const tag of tags) {
      this.command("tag", tagTitle(tag.keyword));
      this.blocks(tag.value);
    }
    this.command("end", "tags");
    this.emit(nl(2));
  }

  private tagSection(node: TagSectionNode): void {
    if (node.params) this.params(node.params);
    this.tags(node.tags);
  }

  /// ## predicates

  predicate(node: PredicateNode): void {
    this.emit(nl(2));
    node.signatures.forEach((signature, i) => {
      if (i > 0) this.command("nodescription");
      this.head(signature, node.visibility === "private");
    });

    /// the first paragraph runs on from the header, without a break.
    const [first, ...rest] = node.body;
    if (first?.kind === "paragraph") {
      this.blocks(first.content);
      this.blocks(rest);
    } else {
      this.blocks(node.body);
    }
  }

  private head(signature: Signature, isPrivate: boolean): void {
    const [left, right] = signature.args;

    switch (signature.layout) {
      case "infix":
        this.command("infixop", signature.functor, () => this.arg(left, 1), () => this.arg(right, 2));
        return;
      case "prefix":
        this.command("prefixop", signature.functor, () => this.arg(left, 1));
        return;
      case "postfix":
        this.command("postfixop", signature.functor, () => this.arg(left, 1));
        return;
      case "plain":
      case "dcg":
        this.command(
          signature.layout === "dcg" ? "dcg" : "predicate",
          { optional: () => this.attributes(signature, isPrivate) },
          signature.functor,
          String(signature.arity),
          () => this.args(signature.args)
        );
        return;
    }
  }

  /// `is det` and `[private]`, in the optional argument.
  private attributes(signature: Signature, isPrivate: boolean): void {
    if (signature.determinism !== "unknown") {
      this.emit(text(`is ${signature.determinism}`));
    }
    if (isPrivate) {
      this.emit(text(" "));
      this.command("textit", "[private]");
    }
  }

  private args(args: readonly ArgSlot[]): void {
    args.forEach((arg, i) => {
      if (i > 0) this.emit(text(", "));
      this.arg(arg, i + 1);
    });
  }

  private arg(arg: ArgSlot | undefined, position: number): void {
    if (!arg) return;
    this.emit(text(argText(arg, position)));
    if (arg.repeated) this.command("ldots");
  }
}

export function renderLatex(trees: readonly DocTree[], ctx: LatexContext = {}): LatexToken[] {
  return new LatexRenderer(ctx).renderDocument(trees);
}

export function latexForPredicates(trees: readonly DocTree[], ctx: LatexContext = {}): LatexToken[] {
  return new LatexRenderer(ctx).renderPredicates(trees);
}
