export * from "./ast";
export { parseBlocks, defaultParserOptions, type ParserOptions } from "./block-parser";
export { parseMarkdown, parseMarkdownToHtml, parseMarkdownWithDebug } from "./parse-markdown";
export { createDebugTrace, type DebugSnapshot, type DebugTrace } from "./debug";
export { renderBlocksToHtml, renderBlockToHtml, escapeHtml } from "./renderer";
export { parseInlineSegments, resolveReference, type InlineSegment, type MathRun } from "./inline-parser";
export * from "./style-config";
export * from "./styled-text";
export {
  type MarkdownRenderer,
  type NativeMarkdownRendererOptions,
  NativeMarkdownRenderer,
  UnstylableContentError,
  findUnstylableIndex,
  styleMarkdown,
} from "./markdown-renderer";
export { RecordingMarkdownRenderer, RECORDING_TAG, type RecordedRender } from "./recording-renderer";
export { MarkdownViewer } from "./markdown-viewer";
