/// # html generation (re-export)
///
/// this barrel file re-exports the html backend. the implementation lives
/// in `./html/` and consumers import from here without knowing about the
/// internal folder structure.

export {
  generateHtml,
  generateIndex,
  generateListing,
  initHighlighter,
  type HtmlOptions,
  type IndexPage
} from "./html/index.js";
export { HtmlRenderer, renderHtml, type HtmlContext } from "./html/render.js";
export { h, escapeHtml, serializeHtml, textContent, type HtmlContent, type HtmlElement } from "./html/elements.js";
export { highlightCode, classifySource, isHighlighterReady } from "./html/highlight.js";
export {
  cssClass,
  defaultListingStyles,
  listingCss,
  renderListing,
  type Classification,
  type Fragment,
  type ListingStyle
} from "./html/listing.js";
