import { parseBlocks, type ParserOptions } from "./block-parser";
import { renderBlocksToHtml } from "./renderer";
import type { BlockNode } from "./ast";
import { createDebugTrace, type DebugSnapshot } from "./debug";

export function parseMarkdown(markdown: string, options: ParserOptions = {}): BlockNode[] {
  return parseBlocks(markdown, options);
}

export function parseMarkdownToHtml(markdown: string, options: ParserOptions = {}): string {
  return renderBlocksToHtml(parseBlocks(markdown, options));
}

export function parseMarkdownWithDebug(markdown: string): {
  nodes: BlockNode[];
  snapshots: readonly DebugSnapshot[];
} {
  const trace = createDebugTrace();
  const nodes = parseBlocks(markdown, { trace });
  return { nodes, snapshots: trace.snapshots };
}
