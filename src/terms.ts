/// # term scanning
///
/// mode lines and description terms are prolog terms written as text.
/// we never build a real term; we only need to find separators that sit
/// outside brackets and quotes.

const opening: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const closing = new Set([")", "]", "}"]);
const quotes = new Set(["'", '"', "`"]);

/// calls `visit` with every index that is at bracket depth zero and not
/// inside a quoted atom or string. returns false if the brackets do not
/// balance or a quote is left open.
function scanTopLevel(s: string, visit: (index: number) => boolean | void): boolean {
  const stack: string[] = [];
  let quote: string | null = null;

  for (let i = 0; i < s.length; i++) {
    const c = s[i];

    if (quote !== null) {
      if (c === "\\") {
        i++;
      } else if (c === quote) {
        quote = null;
      }
      continue;
    }

    if (quotes.has(c)) {
      quote = c;
      continue;
    }

    const close = opening[c];
    if (close !== undefined) {
      stack.push(close);
      continue;
    }

    if (closing.has(c)) {
      if (stack.pop() !== c) return false;
      continue;
    }

    if (stack.length === 0 && visit(i) === true) {
      return true;
    }
  }

  return quote === null && stack.length === 0;
}

export function isBalanced(s: string): boolean {
  return scanTopLevel(s, () => undefined);
}

/// split on a separator at depth zero. `"a(b, c), d"` on `","` gives
/// `["a(b, c)", " d"]`. unbalanced input yields undefined.
export function splitTopLevel(s: string, separator: string): string[] | undefined {
  const parts: string[] = [];
  let start = 0;

  const ok = scanTopLevel(s, i => {
    if (s.startsWith(separator, i)) {
      parts.push(s.slice(start, i));
      start = i + separator.length;
    }
  });

  if (!ok) return undefined;
  parts.push(s.slice(start));
  return parts;
}

/// index of the first (or last) depth-zero occurrence of `needle`, or -1.
export function findTopLevel(s: string, needle: string, last = false): number {
  let found = -1;
  scanTopLevel(s, i => {
    if (s.startsWith(needle, i)) {
      found = i;
      return !last;
    }
  });
  return found;
}

/// index of the bracket closing the one at `open`, or -1.
export function matchingClose(s: string, open: number): number {
  const close = opening[s[open]];
  if (close === undefined) return -1;

  const inner = s.slice(open);
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < inner.length; i++) {
    const c = inner[i];
    if (quote !== null) {
      if (c === "\\") i++;
      else if (c === quote) quote = null;
      continue;
    }
    if (quotes.has(c)) {
      quote = c;
    } else if (opening[c] !== undefined) {
      depth++;
    } else if (closing.has(c)) {
      depth--;
      if (depth === 0) return open + i;
    }
  }

  return -1;
}

const atomName = /^(?:[a-z][A-Za-z0-9_]*|'(?:[^'\\]|\\.)*')/;

/// `foo(a, B)` → `{ name: "foo", args: ["a", "B"] }`; `foo` → no args.
/// quoted functors lose their quotes. anything else is undefined.
export function parseCompound(s: string): { name: string; args: string[] } | undefined {
  const text = s.trim();
  const match = atomName.exec(text);
  if (!match) return undefined;

  const raw = match[0];
  const name = raw.startsWith("'") ? raw.slice(1, -1) : raw;
  const rest = text.slice(raw.length);

  if (rest === "") return { name, args: [] };
  if (!rest.startsWith("(") || matchingClose(rest, 0) !== rest.length - 1) return undefined;

  const args = splitTopLevel(rest.slice(1, -1), ",");
  if (!args || args.some(arg => arg.trim() === "")) return undefined;

  return { name, args: args.map(arg => arg.trim()) };
}
