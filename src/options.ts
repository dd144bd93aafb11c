/// # options
///
/// the three knobs the renderers understand. callers hand in whatever
/// they parsed from the command line or a config object; `resolveOptions`
/// fills in defaults and rejects anything else.

import { z } from "zod";
import { ConfigError } from "./errors.js";

/// the latex sectioning ladder, outermost first. `sectionLevel` names the
/// rung used for level-1 headings; deeper headings walk down from there.
export const sectionLevels = ["chapter", "section", "subsection", "subsubsection", "paragraph"] as const;

export type SectionLevel = (typeof sectionLevels)[number];

export const DocOptionsSchema = z.object({
  /// drop predicates that are not exported from their module.
  publicOnly: z.boolean().default(true),
  sectionLevel: z.enum(sectionLevels).default("section"),
  /// latex only: wrap the output in `\documentclass` ... `\end{document}`.
  standAlone: z.boolean().default(true)
});

export type DocOptions = z.infer<typeof DocOptionsSchema>;
export type DocOptionsInput = z.input<typeof DocOptionsSchema>;

export function resolveOptions(input: DocOptionsInput = {}): DocOptions {
  return parseOptions(input);
}

/// for input nobody has type-checked, such as command-line flags.
export function parseOptions(input: unknown): DocOptions {
  const result = DocOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join(".") || "options"}: ${issue.message}`);
    throw new ConfigError(`invalid options: ${issues.join("; ")}`);
  }
  return result.data;
}

export function sectionIndex(level: SectionLevel): number {
  return sectionLevels.indexOf(level);
}
