import type { BlockNode, CodeBlockNode } from "./ast";
import { type DebugTrace, captureSnapshot, logDebug } from "./debug";
import {
  type BulletMarker,
  type FenceInfo,
  type OrderedDelimiter,
  isBlankLine,
  parseAtxHeading,
  parseFenceLine,
  parseListLine,
  splitLines,
} from "./parser-helpers";

export interface ParserOptions {
  /** Bullets accepted besides `-`, which is always on. */
  bulletMarkers?: readonly BulletMarker[];
  /** Ordered-list delimiters accepted besides `.`, which is always on. */
  orderedDelimiters?: readonly OrderedDelimiter[];
  trace?: DebugTrace;
}

export const defaultParserOptions = {
  bulletMarkers: ["-", "*", "+"],
  orderedDelimiters: [".", ")"],
} as const satisfies ParserOptions;

/** The block currently being built. At most one is open at a time. */
export type Accumulator =
  | { kind: "none" }
  | { kind: "paragraph"; lines: string[] }
  | { kind: "unordered_list"; items: string[] }
  | { kind: "ordered_list"; items: string[] }
  | { kind: "code_fence"; fence: FenceInfo; lines: string[] };

const NONE: Accumulator = { kind: "none" };

/**
 * Single forward pass over the source lines. Never throws; any string
 * (including the empty string) yields a possibly empty node list.
 */
export function parseBlocks(source: string, options: ParserOptions = {}): BlockNode[] {
  const trace = options.trace;
  const bulletMarkers = options.bulletMarkers ?? defaultParserOptions.bulletMarkers;
  const orderedDelimiters = options.orderedDelimiters ?? defaultParserOptions.orderedDelimiters;

  const nodes: BlockNode[] = [];
  let open: Accumulator = NONE;

  const flush = () => {
    const node = closeAccumulator(open);
    if (node) {
      logDebug(trace, `Flushed ${node.type}`);
      nodes.push(node);
    }
    open = NONE;
  };

  const lines = splitLines(source);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (open.kind === "code_fence") {
      if (parseFenceLine(line)) {
        logDebug(trace, `Line ${i}: closing fence`);
        flush();
      } else {
        open.lines.push(line);
      }
      continue;
    }

    const fence = parseFenceLine(line);
    if (fence) {
      logDebug(trace, `Line ${i}: opening fence, language "${fence.language}"`);
      flush();
      open = { kind: "code_fence", fence, lines: [] };
      continue;
    }

    if (isBlankLine(line)) {
      logDebug(trace, `Line ${i}: blank, open accumulator: ${open.kind}`);
      flush();
      continue;
    }

    const heading = parseAtxHeading(line);
    if (heading) {
      logDebug(trace, `Line ${i}: heading level ${heading.level}`);
      flush();
      nodes.push({ type: "heading", level: heading.level, text: heading.text });
      continue;
    }

    const listLine = parseListLine(line, bulletMarkers, orderedDelimiters);
    if (listLine) {
      const kind = listLine.ordered ? "ordered_list" : "unordered_list";
      logDebug(trace, `Line ${i}: ${kind} item`);
      if (open.kind !== kind) {
        flush();
        open = { kind, items: [] };
      }
      if (open.kind === "ordered_list" || open.kind === "unordered_list") {
        open.items.push(listLine.content);
      }
      continue;
    }

    logDebug(trace, `Line ${i}: paragraph text`);
    if (open.kind !== "paragraph") {
      flush();
      open = { kind: "paragraph", lines: [] };
    }
    if (open.kind === "paragraph") {
      open.lines.push(line.trim());
    }
  }

  if (open.kind === "code_fence") {
    logDebug(trace, `Unterminated fence closed at end of input`);
  }
  flush();

  captureSnapshot(trace, "afterBlockPhase", nodes);
  return nodes;
}

export function closeAccumulator(acc: Accumulator): BlockNode | null {
  switch (acc.kind) {
    case "none":
      return null;
    case "paragraph": {
      const text = acc.lines.join(" ").trim();
      return text ? { type: "paragraph", text } : null;
    }
    case "unordered_list":
    case "ordered_list":
      return acc.items.length > 0 ? { type: acc.kind, items: [...acc.items] } : null;
    case "code_fence":
      return createCodeBlock(acc.fence.language, acc.lines);
  }
}

function createCodeBlock(language: string, lines: string[]): CodeBlockNode {
  return { type: "code_block", language, code: lines.join("\n") };
}
