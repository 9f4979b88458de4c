import type { MarkdownRenderer } from "./markdown-renderer";
import { plainStyledText, type StyledText } from "./styled-text";

export interface RecordedRender {
  markdown: string;
  baseUrl?: string | URL;
}

export const RECORDING_TAG = "[MOCK]\n";

/** Test double: remembers what it was asked to render and echoes it back tagged. */
export class RecordingMarkdownRenderer implements MarkdownRenderer {
  readonly calls: RecordedRender[] = [];

  get lastInput(): string | undefined {
    return this.calls[this.calls.length - 1]?.markdown;
  }

  render(markdown: string, baseUrl?: string | URL): StyledText {
    this.calls.push({ markdown, baseUrl });
    return plainStyledText(RECORDING_TAG + markdown);
  }
}
