/// # stylesheet
///
/// inlined into every generated page unless a `cssFile` is given. the
/// class names are the ones the renderer emits: `pubdef`/`privdef` for
/// predicate headers, `defbody` for their descriptions, `termlist` for
/// `$ term:` lists, `tags` and `arglist` for the trailing tag section.
///
/// colours follow github-light, the same theme shiki uses for the code
/// blocks, so highlighted code and the page chrome agree.

import { listingCss } from "./listing.js";

export const defaultCss = `
body {
  font-family: system-ui, sans-serif;
  margin: 0;
  padding: 2rem 1rem;
  line-height: 1.6;
  color: #24292e;
}

/* navigation header: index link on the left, generator on the right */
.navhdr {
  position: absolute;
  top: 0;
  left: 0;
  right: 0;
  display: flex;
  justify-content: space-between;
  padding: 0.5rem 1rem;
  font-size: 12px;
  color: #ccc;
  z-index: 100;
}

.navhdr a {
  color: #ccc;
  text-decoration: none;
}

.navhdr a:hover {
  color: #999;
}

.navhdr-right {
  font-style: italic;
}

.doc {
  font-size: 15px;
  max-width: 80ch;
  margin: 0 auto;
}

.doc h1 {
  font-size: 1.8rem;
  margin: 2rem 0 1rem;
  border-bottom: 1px solid #eee;
  padding-bottom: 0.3rem;
}

.doc h2 {
  font-size: 1.4rem;
  margin: 1.5rem 0 0.75rem;
}

.doc h3 {
  font-size: 1.1rem;
  margin: 1rem 0 0.5rem;
}

.doc h4 {
  font-size: 1rem;
  margin: 0.75rem 0 0.5rem;
  font-weight: 600;
}

.doc p {
  margin: 0.75rem 0;
}

.doc ul, .doc ol {
  margin: 0.75rem 0;
  padding-left: 1.5rem;
}

.doc li {
  margin: 0.25rem 0;
}

.doc code {
  font-family: 'SF Mono', 'Fira Code', monospace;
  font-size: 0.9em;
  background: #f6f8fa;
  padding: 0.1em 0.3em;
  border-radius: 3px;
}

.doc a {
  color: #0366d6;
  text-decoration: none;
}

.doc a:hover {
  text-decoration: underline;
}

pre.code, pre.listing {
  font-family: 'SF Mono', 'Fira Code', monospace;
  font-size: 13px;
  line-height: 1.45;
  background: #f6f8fa;
  padding: 1rem;
  overflow-x: auto;
  border-radius: 6px;
}

/* predicate descriptions */
dl.predicates {
  margin: 1rem 0;
}

dt.pubdef, dt.privdef {
  margin-top: 1.5rem;
  padding: 0.2rem 0.5rem;
  border-top: 1px solid #e1e4e8;
  font-family: 'SF Mono', 'Fira Code', monospace;
  font-size: 14px;
}

dt.pubdef {
  background: #f1f8ff;
}

dt.privdef {
  background: #fafbfc;
}

dt.pubdef + dt.pubdef, dt.privdef + dt.privdef {
  margin-top: 0;
  border-top: none;
}

dd.defbody {
  margin: 0.5rem 0 0 2rem;
}

b.pred {
  color: #6f42c1;
}

var.arglist, var.arg {
  font-style: italic;
  color: #e36209;
}

b.det {
  color: #005cc5;
  font-weight: normal;
}

span.private {
  color: #6a737d;
  font-size: 12px;
}

em.undef {
  color: #b31d28;
}

span.diagnostic {
  color: #b31d28;
  font-family: monospace;
}

/* $ term: lists and the tag section */
dl.termlist dt.term {
  font-family: 'SF Mono', 'Fira Code', monospace;
  margin-top: 0.5rem;
}

dl.termlist dd {
  margin-left: 2rem;
}

dl.tags {
  margin: 1rem 0;
  font-size: 14px;
}

dl.tags dt.tag {
  font-weight: 600;
}

dl.tags dd {
  margin-left: 2rem;
}

table.arglist {
  border-collapse: collapse;
}

table.arglist td {
  padding: 0.1rem 1rem 0.1rem 0;
  vertical-align: top;
}

table.arglist td.param {
  font-style: italic;
}
`;

/// listing pages get the colour rules for the classified fragments too.
export const listingPageCss = `${defaultCss}\n${listingCss()}`;
