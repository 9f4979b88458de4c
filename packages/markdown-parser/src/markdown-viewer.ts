import { NativeMarkdownRenderer, type MarkdownRenderer } from "./markdown-renderer";
import type { StyledText } from "./styled-text";

/**
 * Holds the help text a pane displays and hands it to the injected renderer
 * as-is. Presentation (windows, scrolling) belongs to the host.
 */
export class MarkdownViewer {
    private markdown: string;

    constructor(
        markdown: string,
        private readonly renderer: MarkdownRenderer = new NativeMarkdownRenderer(),
        private readonly baseUrl?: string | URL,
    ) {
        this.markdown = markdown;
    }

    get source(): string {
        return this.markdown;
    }

    setMarkdown(markdown: string): StyledText {
        this.markdown = markdown;
        return this.content();
    }

    content(): StyledText {
        return this.renderer.render(this.markdown, this.baseUrl);
    }
}
