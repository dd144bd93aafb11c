/// # cross-reference registry
///
/// maps predicate indicators to the page and anchor that document them.
/// it is filled by one indexing pass over every tree that will be
/// rendered, then frozen; rendering only ever reads it.

import { RegistryFrozenError } from "./errors.js";
import { signatureKey, type Signature } from "./modes.js";
import { resolveOptions, type DocOptionsInput } from "./options.js";
import { summaryOf } from "./wiki/summary.js";
import { indicator, type DocTree, type RefKind } from "./wiki/types.js";

export interface RegistryEntry {
  module?: string;
  name: string;
  arity: number;
  ref: RefKind;
  /// the page documenting the predicate, e.g. `lists.html`. empty for
  /// the page currently being rendered.
  page: string;
  summary?: string;
  signature?: Signature;
}

export function anchorName(name: string, arity: number, ref: RefKind): string {
  return indicator(name, arity, ref);
}

/// `page#name/arity`, or just the fragment for a same-page target.
export function entryHref(entry: RegistryEntry): string {
  return `${entry.page}#${anchorName(entry.name, entry.arity, entry.ref)}`;
}

export class SignatureRegistry {
  private readonly qualified = new Map<string, RegistryEntry>();
  private readonly bare = new Map<string, RegistryEntry>();
  private frozen = false;

  get size(): number {
    return this.bare.size;
  }

  /// the first entry for an indicator wins; later ones are ignored.
  register(entry: RegistryEntry): void {
    const key = indicator(entry.name, entry.arity, entry.ref);
    if (this.frozen) throw new RegistryFrozenError(key);

    if (entry.module !== undefined) {
      const qualifiedKey = `${entry.module}:${key}`;
      if (!this.qualified.has(qualifiedKey)) {
        this.qualified.set(qualifiedKey, entry);
      }
    }
    if (!this.bare.has(key)) {
      this.bare.set(key, entry);
    }
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /// a module-qualified lookup falls back to the bare indicator.
  lookup(module: string | undefined, name: string, arity: number, ref: RefKind = "predicate"): RegistryEntry | undefined {
    const key = indicator(name, arity, ref);
    if (module !== undefined) {
      const entry = this.qualified.get(`${module}:${key}`);
      if (entry) return entry;
    }
    return this.bare.get(key);
  }

  isKnown(name: string, arity: number, ref: RefKind = "predicate"): boolean {
    return this.bare.has(indicator(name, arity, ref));
  }
}

/// register the predicates documented in `trees` as living on `page`.
/// only the first mode line of each indicator becomes an entry, so
/// overloaded mode lines share one anchor. under `publicOnly`, private
/// predicates get no page anchor and are not registered either.
export function indexTrees(registry: SignatureRegistry, trees: readonly DocTree[], page: string, options: DocOptionsInput = {}): void {
  const { publicOnly } = resolveOptions(options);
  for (const tree of trees) {
    for (const node of tree.content) {
      if (node.kind !== "predicate") continue;
      if (publicOnly && node.visibility === "private") continue;
      const seen = new Set<string>();
      for (const signature of node.signatures) {
        const key = signatureKey(signature);
        if (seen.has(key)) continue;
        seen.add(key);
        registry.register({
          module: node.module,
          name: signature.functor,
          arity: signature.arity,
          ref: signature.layout === "dcg" ? "dcg" : "predicate",
          page,
          summary: summaryOf(node.body),
          signature
        });
      }
    }
  }
}
