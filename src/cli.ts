#!/usr/bin/env node

/// # CLI
///
/// the command-line interface for predoc. three commands:
///
/// - **`predoc html`**: documentation pages. works on single files
///   (output to stdout) or directories (output to a folder, plus an
///   index page).
/// - **`predoc latex`**: the same documentation as latex for `pl.sty`.
/// - **`predoc source`**: a coloured listing of the source itself.
///
/// ## usage
///
/// ```bash
/// predoc html lists.pl > lists.html           # single file → stdout
/// predoc html src/ docs/                      # directory → docs/
/// predoc latex lists.pl --fragment            # no \documentclass wrapper
/// predoc latex lists.pl --section-level=subsection
/// predoc source lists.pl > lists.src.html
/// ```

import { readFileSync, writeFileSync, readdirSync, statSync, mkdirSync } from "fs";
import { basename, dirname, join, relative } from "path";
import { documentSource, moduleDeclaration } from "./extract.js";
import { generateHtml, generateIndex, generateListing, type IndexPage } from "./html.js";
import { latexForTrees } from "./latex/print.js";
import { parseOptions, type DocOptions } from "./options.js";
import { indexTrees, SignatureRegistry } from "./registry.js";
import type { DocTree } from "./wiki/types.js";

const args = process.argv.slice(2);

if (args.length < 2) {
  console.log(`predoc - documentation for prolog sources

%% and /** comments become documentation.

usage:
  predoc html <file.pl> [--all]                  generate HTML for a single file
  predoc html <dir/> [outdir] [--all]            generate HTML for all .pl files
  predoc latex <file.pl> [--fragment] [--section-level=<level>] [--all]
  predoc source <file.pl>                        coloured source listing

examples:
  predoc html lists.pl > lists.html
  predoc html src/ docs/
  predoc latex lists.pl --section-level=subsection > lists.tex
`);
  process.exit(1);
}

const [command, target, ...rest] = args;
const flags = rest.filter(a => a.startsWith("--"));
const outDir = rest.find(a => !a.startsWith("--"));

/// ## command dispatch

try {
  const options = parseOptions({
    publicOnly: !flags.includes("--all"),
    standAlone: !flags.includes("--fragment"),
    ...sectionLevelFlag(flags)
  });

  switch (command) {
    case "html": {
      const stat = statSync(target);

      if (stat.isFile()) {
        const source = readFileSync(target, "utf-8");
        const registry = new SignatureRegistry();
        indexTrees(registry, documentSource(source, target), "", options);
        registry.freeze();

        const html = await generateHtml(document(source, target, registry), {
          title: basename(target),
          registry,
          module: moduleDeclaration(source)?.name,
          docOptions: options
        });
        console.log(html);
      } else if (stat.isDirectory()) {
        await writeDirectory(target, outDir ?? join(target, "html"), options);
      }
      break;
    }

    case "latex": {
      const source = readFileSync(target, "utf-8");
      const registry = new SignatureRegistry();
      indexTrees(registry, documentSource(source, target), "", options);
      registry.freeze();
      process.stdout.write(latexForTrees(document(source, target, registry), { options }));
      break;
    }

    case "source": {
      const source = readFileSync(target, "utf-8");
      console.log(await generateListing(source, { title: basename(target) }));
      break;
    }

    default:
      console.error(`unknown command: ${command}`);
      process.exit(1);
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

/// ## helper functions

/// `--section-level=subsection`. the value is checked by `parseOptions`.
function sectionLevelFlag(flags: readonly string[]): { sectionLevel?: string } {
  const flag = flags.find(f => f.startsWith("--section-level="));
  return flag ? { sectionLevel: flag.slice("--section-level=".length) } : {};
}

/// the second parse: with the registry filled, bare `name/arity` in
/// running text can be recognised as references.
function document(source: string, file: string, registry: SignatureRegistry): DocTree[] {
  return documentSource(source, file, {
    isKnown: (name, arity, ref) => registry.isKnown(name, arity, ref)
  });
}

function toHtmlPath(p: string): string {
  return p.replace(/\.pl$/, ".html");
}

/// prolog files under `dir`, skipping hidden directories.
function findPlFiles(dir: string): string[] {
  const results: string[] = [];

  for (const entry of readdirSync(dir)) {
    const path = join(dir, entry);
    const stat = statSync(path);

    if (stat.isDirectory()) {
      if (!entry.startsWith(".")) {
        results.push(...findPlFiles(path));
      }
    } else if (entry.endsWith(".pl")) {
      results.push(path);
    }
  }

  return results;
}

/// directory mode. every file is indexed into one registry before any
/// page is rendered, so references between files resolve.
async function writeDirectory(srcDir: string, outputDir: string, options: DocOptions): Promise<void> {
  const files = findPlFiles(srcDir).map(file => {
    const source = readFileSync(file, "utf-8");
    return { file, source, page: toHtmlPath(relative(srcDir, file)) };
  });

  const registry = new SignatureRegistry();
  for (const { file, source, page } of files) {
    indexTrees(registry, documentSource(source, file), page, options);
  }
  registry.freeze();

  const pages: IndexPage[] = [];
  for (const { file, source, page } of files) {
    const trees = document(source, file, registry);
    const html = await generateHtml(trees, {
      title: basename(file),
      page,
      registry,
      module: moduleDeclaration(source)?.name,
      docOptions: options,
      indexHref: relative(dirname(page), "index.html") || "index.html"
    });

    const outPath = join(outputDir, page);
    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, html);
    console.log(`wrote ${outPath}`);
    pages.push({ page, title: relative(srcDir, file), trees });
  }

  const indexPath = join(outputDir, "index.html");
  writeFileSync(indexPath, generateIndex(pages));
  console.log(`wrote ${indexPath}`);
}
