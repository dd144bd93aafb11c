/// # shared types
///
/// configuration for `generateHtml` and `generateListing`. most callers
/// want the defaults: inline styles, the file name as page title, no
/// registry (every reference renders as undefined).

import type { DocOptionsInput } from "../options.js";
import type { SignatureRegistry } from "../registry.js";
import type { DiagnosticHandler } from "../wiki/types.js";

export interface HtmlOptions {
  /// title for the html page. defaults to "predoc".
  title?: string;
  /// path to an external CSS file. if omitted, styles are inlined
  /// directly into the `<style>` tag of each generated page.
  cssFile?: string;
  /// name of this page in the registry, e.g. `lists.html`.
  page?: string;
  /// filled by `indexTrees` and frozen before rendering.
  registry?: SignatureRegistry;
  /// module whose predicates are documented on this page.
  module?: string;
  docOptions?: DocOptionsInput;
  onDiagnostic?: DiagnosticHandler;
  /// target of the "index" link in the navigation header. defaults to
  /// `index.html`.
  indexHref?: string;
}
