/// # html rendering
///
/// walks document trees and builds the element tree for one page. each
/// node kind maps to one piece of markup:
///
/// - headings, paragraphs and lists map to their html counterparts
/// - description items become `<dt>`/`<dd>` pairs in a `dl.termlist`
/// - tags become a `dl.tags`, with `@param` entries as a table
/// - predicates become `<dt class="pubdef">` headers over a
///   `<dd class="defbody">`
///
/// consecutive predicates share one `<dl class="predicates">`. whether
/// that list is open is the mode stack's business: a predicate asks for
/// the "description" mode, anything else drops back to "body".

import { posix } from "path";
import { argText, signatureKey, type Signature } from "../modes.js";
import { ModeStack } from "../mode-stack.js";
import { resolveOptions, type DocOptions, type DocOptionsInput } from "../options.js";
import { anchorName, entryHref, type RegistryEntry, type SignatureRegistry } from "../registry.js";
import { tagTitle } from "../wiki/tags.js";
import {
  indicator,
  unknownKind,
  warnDiagnostic,
  type DescriptionItem,
  type DiagnosticHandler,
  type DocNode,
  type DocTree,
  type ParamListNode,
  type PredicateNode,
  type PredicateRefNode,
  type TagNode,
  type TagSectionNode
} from "../wiki/types.js";
import { h, type HtmlContent, type HtmlElement } from "./elements.js";
import { highlightCode } from "./highlight.js";

export interface HtmlContext {
  /// resolves `[[name/arity]]` references. without one every reference
  /// renders as undefined.
  registry?: SignatureRegistry;
  /// the page being rendered, as registered in the registry. references
  /// to predicates on this page link to the bare fragment.
  page?: string;
  /// module used to qualify reference lookups.
  module?: string;
  options?: DocOptionsInput;
  onDiagnostic?: DiagnosticHandler;
}

type PageMode = "body" | "description";

export class HtmlRenderer {
  private readonly options: DocOptions;
  private readonly onDiagnostic: DiagnosticHandler;
  /// signature keys that already have an anchor on this page.
  private readonly anchors = new Set<string>();
  /// where rendered blocks go: the page, or the open predicate list.
  private readonly sinks: HtmlContent[][] = [];

  constructor(private readonly ctx: HtmlContext = {}) {
    this.options = resolveOptions(ctx.options);
    this.onDiagnostic = ctx.onDiagnostic ?? warnDiagnostic;
  }

  renderPage(trees: readonly DocTree[]): HtmlContent[] {
    const page: HtmlContent[] = [];
    this.sinks.push(page);

    const modes = new ModeStack<PageMode>(
      {
        open: () => {
          const list = h("dl", { class: "predicates" });
          this.emit(list);
          this.sinks.push(list.children);
        },
        close: () => {
          this.sinks.pop();
        }
      },
      ["body"]
    );

    for (const tree of trees) {
      for (const node of tree.content) {
        if (node.kind === "predicate") {
          if (!this.isShown(node)) continue;
          modes.need("description");
          this.emit(...this.predicate(node));
        } else {
          modes.popTo("body");
          this.emit(...this.node(node));
        }
      }
    }

    modes.closeAll();
    this.sinks.pop();
    return page;
  }

  private emit(...content: HtmlContent[]): void {
    this.sinks[this.sinks.length - 1]?.push(...content);
  }

  private isShown(node: PredicateNode): boolean {
    return !this.options.publicOnly || node.visibility === "public";
  }

  private blocks(nodes: readonly DocNode[]): HtmlContent[] {
    return nodes.flatMap(node => this.node(node));
  }

  node(node: DocNode): HtmlContent[] {
    switch (node.kind) {
      case "heading":
        return [h(`h${node.level}`, {}, this.blocks(node.content))];
      case "paragraph":
        return [h("p", {}, this.blocks(node.content))];
      case "list":
        return [
          h(
            node.ordered ? "ol" : "ul",
            {},
            node.items.map(item => h("li", {}, this.blocks(item)))
          )
        ];
      case "descriptionList":
        return [h("dl", { class: "termlist" }, node.items.flatMap(item => this.descriptionItem(item)))];
      case "codeBlock":
        return [h("pre", { class: "code" }, highlightCode(node.text))];
      case "inlineCode":
        return [h("code", {}, [node.text])];
      case "emphasis":
        return [h(node.style === "bold" ? "b" : "i", {}, this.blocks(node.content))];
      case "link":
        return [h("a", { href: node.target }, this.blocks(node.content))];
      case "text":
        return [node.text];
      case "predicateRef":
        return [this.reference(node)];
      case "tag":
        return [h("dl", { class: "tags" }, this.tag(node))];
      case "paramList":
        return [this.paramTable(node)];
      case "tagSection":
        return [this.tagSection(node)];
      case "predicate":
        return this.isShown(node) ? [h("dl", { class: "predicates" }, this.predicate(node))] : [];
      default: {
        const unreachable: never = node;
        return [this.placeholder(unreachable)];
      }
    }
  }

  /// trees read from json can carry kinds this renderer does not know.
  private placeholder(node: unknown): HtmlElement {
    const kind = unknownKind(node);
    this.onDiagnostic({ backend: "html", nodeKind: kind, message: `cannot render node of kind "${kind}"` });
    return h("span", { class: "diagnostic" }, [`[${kind}]`]);
  }

  /// ### predicates

  predicate(node: PredicateNode): HtmlContent[] {
    const headers = node.signatures.map(signature => {
      const key = signatureKey(signature);
      const head = this.head(signature);
      const children: HtmlContent[] = [];

      if (this.anchors.has(key)) {
        children.push(...head);
      } else {
        this.anchors.add(key);
        children.push(h("a", { id: key }, head));
      }

      if (signature.determinism !== "unknown") {
        children.push(" is ", h("b", { class: "det" }, [signature.determinism]));
      }
      if (node.visibility === "private") {
        children.push(" ", h("span", { class: "private" }, ["[private]"]));
      }

      return h("dt", { class: node.visibility === "public" ? "pubdef" : "privdef" }, children);
    });

    return [...headers, h("dd", { class: "defbody" }, this.blocks(node.body))];
  }

  private head(signature: Signature): HtmlContent[] {
    const functor = h("b", { class: "pred" }, [signature.functor]);
    const args = signature.args.map((arg, i) => `${argText(arg, i + 1)}${arg.repeated ? "..." : ""}`);
    const operand = (text: string | undefined) => h("var", { class: "arg" }, [text ?? ""]);

    switch (signature.layout) {
      case "infix":
        return [operand(args[0]), " ", functor, " ", operand(args[1])];
      case "prefix":
        return [functor, " ", operand(args[0])];
      case "postfix":
        return [operand(args[0]), " ", functor];
      case "plain":
      case "dcg": {
        const suffix = signature.layout === "dcg" ? ["//"] : [];
        if (args.length === 0) return [functor, ...suffix];
        return [functor, "(", h("var", { class: "arglist" }, [args.join(", ")]), ")", ...suffix];
      }
    }
  }

  /// ### terms, tags and references

  private descriptionItem(item: DescriptionItem): HtmlElement[] {
    const term: HtmlContent[] = [h("b", { class: "pred" }, [item.term.name])];
    if (item.term.args.length > 0) {
      term.push("(", h("var", { class: "arglist" }, [item.term.args.join(", ")]), ")");
    }
    return [h("dt", { class: "term" }, term), h("dd", {}, this.blocks(item.body))];
  }

  private tag(node: TagNode): HtmlElement[] {
    return [h("dt", { class: "tag" }, [tagTitle(node.keyword)]), h("dd", {}, this.blocks(node.value))];
  }

  private paramTable(node: ParamListNode): HtmlElement {
    return h(
      "table",
      { class: "arglist" },
      node.entries.map(entry =>
        h("tr", {}, [h("td", { class: "param" }, [h("var", {}, [entry.name])]), h("td", {}, this.blocks(entry.description))])
      )
    );
  }

  private tagSection(node: TagSectionNode): HtmlElement {
    const entries: HtmlElement[] = [];
    if (node.params) {
      entries.push(h("dt", { class: "tag" }, [tagTitle("param")]), h("dd", {}, [this.paramTable(node.params)]));
    }
    for (const tag of node.tags) {
      entries.push(...this.tag(tag));
    }
    return h("dl", { class: "tags" }, entries);
  }

  private reference(node: PredicateRefNode): HtmlElement {
    const text = indicator(node.name, node.arity, node.ref);
    const entry = this.ctx.registry?.lookup(this.ctx.module, node.name, node.arity, node.ref);
    if (!entry) {
      return h("em", { class: "undef" }, [text]);
    }

    const attrs: Record<string, string> = { href: this.href(entry) };
    if (entry.summary !== undefined) {
      attrs.title = entry.summary;
    }
    return h("a", attrs, [text]);
  }

  /// registry pages are relative to the output root; links are relative
  /// to the page being rendered.
  private href(entry: RegistryEntry): string {
    const page = this.ctx.page ?? "";
    if (entry.page === page) return `#${anchorName(entry.name, entry.arity, entry.ref)}`;
    if (page === "") return entryHref(entry);
    return entryHref({ ...entry, page: posix.relative(posix.dirname(page), entry.page) });
  }
}

/// render a page's trees. the anchor set lives in the renderer, so one
/// call is one page.
export function renderHtml(trees: readonly DocTree[], ctx: HtmlContext = {}): HtmlContent[] {
  return new HtmlRenderer(ctx).renderPage(trees);
}
