export type MathRun =
  | { kind: "plain"; text: string }
  | { kind: "subscripted"; base: string; sub: string };

export type InlineSegment =
  | { kind: "text"; text: string }
  | { kind: "link"; text: string; target: string }
  | { kind: "image"; alt: string; target: string }
  | { kind: "math"; runs: MathRun[] };

// [label](target), ![alt](target) or $math$.
// Label and target stop at the next bracket so no match attempt scans past it.
const INLINE_RE = /(!?)\[([^\][]*)\]\(\s*([^)\s[\]]*)\s*\)|\$([^$]+)\$/g;

// Δword, word_sub, arg max_sub. The word boundary keeps the subscript
// alternative from restarting inside a run of letters.
const MATH_TOKEN_RE = /Δ([A-Za-z]+)|\b([A-Za-z]+)_([A-Za-z]+)|arg max_([A-Za-z]+)/g;

export function parseInlineSegments(text: string, baseUrl?: string | URL): InlineSegment[] {
  const segments: InlineSegment[] = [];
  let cursor = 0;
  for (const m of text.matchAll(INLINE_RE)) {
    const start = m.index ?? 0;
    if (start > cursor) {
      pushText(segments, text.slice(cursor, start));
    }
    const [, bang, label, target, math] = m;
    if (math !== undefined) {
      segments.push({ kind: "math", runs: tokenizeMath(math) });
    } else if (bang) {
      segments.push({ kind: "image", alt: label ?? "", target: resolveReference(target ?? "", baseUrl) });
    } else {
      segments.push({ kind: "link", text: label ?? "", target: resolveReference(target ?? "", baseUrl) });
    }
    cursor = start + m[0].length;
  }
  if (cursor < text.length) {
    pushText(segments, text.slice(cursor));
  }
  return segments;
}

function pushText(segments: InlineSegment[], text: string) {
  const last = segments[segments.length - 1];
  if (last?.kind === "text") {
    last.text += text;
  } else {
    segments.push({ kind: "text", text });
  }
}

export function tokenizeMath(text: string): MathRun[] {
  const runs: MathRun[] = [];
  let cursor = 0;
  for (const m of text.matchAll(MATH_TOKEN_RE)) {
    const start = m.index ?? 0;
    if (start > cursor) {
      runs.push({ kind: "plain", text: text.slice(cursor, start) });
    }
    const [, deltaSub, base, sub, argMaxSub] = m;
    if (deltaSub !== undefined) {
      runs.push({ kind: "subscripted", base: "Δ", sub: deltaSub });
    } else if (base !== undefined && sub !== undefined) {
      runs.push({ kind: "subscripted", base, sub });
    } else if (argMaxSub !== undefined) {
      runs.push({ kind: "subscripted", base: "arg max", sub: argMaxSub });
    }
    cursor = start + m[0].length;
  }
  if (cursor < text.length) {
    runs.push({ kind: "plain", text: text.slice(cursor) });
  }
  return runs;
}

export function isAbsoluteReference(target: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(target) || target.startsWith("//");
}

/**
 * Resolves a relative link or image target against `baseUrl`.
 * Absolute targets, empty targets and targets the URL parser rejects are returned as written.
 */
export function resolveReference(target: string, baseUrl?: string | URL): string {
  if (!target || !baseUrl || isAbsoluteReference(target)) return target;
  const base = toUrl(baseUrl);
  if (!base) return target;
  const resolved = toUrl(target, base);
  return resolved ? resolved.href : target;
}

function toUrl(input: string | URL, base?: URL): URL | null {
  try {
    return new URL(input, base);
  } catch {
    return null;
  }
}
