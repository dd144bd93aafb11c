/// # predoc
///
/// documentation for prolog sources. structured comments (`%%`, `%!` and
/// `/** ... */`) are parsed into a document tree, and the tree is
/// rendered as html or as latex for `pl.sty`.
///
/// the library has four parts:
///
/// 1. **extraction**: finding structured comments and the module's export
///    list in a source file.
/// 2. **parsing**: the wiki markup and mode lines of one comment, giving a
///    `DocTree`.
/// 3. **cross-references**: a registry filled from every tree before any
///    page is rendered.
/// 4. **rendering**: html element trees and latex token streams, both
///    walking the same trees.

export { extractComments, moduleDeclaration, documentSource, type StructuredComment, type ModuleDeclaration } from "./extract.js";
export { parse, parseBlocks, stripComment, type ParseContext, type CommentStyle, type StrippedComment } from "./wiki/parser.js";
export { parseInline, parseIndicator, type InlineContext } from "./wiki/inline.js";
export { summary, summaryOf } from "./wiki/summary.js";
export { tagTitle } from "./wiki/tags.js";
export * from "./wiki/types.js";
export {
  parseModeLine,
  parseArg,
  signatureKey,
  argText,
  OperatorTable,
  defaultOperators,
  determinisms,
  type ArgSlot,
  type Determinism,
  type Fixity,
  type HeadLayout,
  type ModeIndicator,
  type Signature
} from "./modes.js";
export { ModeStack, type ModeStackEvents } from "./mode-stack.js";
export { SignatureRegistry, indexTrees, entryHref, anchorName, type RegistryEntry } from "./registry.js";
export { resolveOptions, parseOptions, sectionLevels, type DocOptions, type DocOptionsInput, type SectionLevel } from "./options.js";
export { PredocError, ConfigError, SectionLevelError, VerbatimDelimiterError, RegistryFrozenError } from "./errors.js";
export * from "./html.js";
export { LatexRenderer, renderLatex, latexForPredicates, type LatexContext } from "./latex/render.js";
export { printLatex, printTokens, latexForTrees, collapseNewlines, chooseVerbDelimiter, escapeLatex } from "./latex/print.js";
export type { LatexToken, NewlineToken } from "./latex/tokens.js";
