import { visitBlock, type BlockNode } from "./ast";
import { parseBlocks, type ParserOptions } from "./block-parser";
import { type DebugTrace, logDebug } from "./debug";
import { parseInlineSegments } from "./inline-parser";
import { type StyleConfig, type StyleConfigOverrides, type TextAttributes, resolveStyleConfig } from "./style-config";
import { type StyleRole, type StyledText, StyledTextBuilder, plainStyledText } from "./styled-text";

/**
 * Turns markdown source into styled text.
 *
 * Implementations are total: every string yields a result, and when the
 * content cannot be styled the result is the input as plain text of the
 * same length. `baseUrl` only affects how relative link and image targets
 * are resolved.
 */
export interface MarkdownRenderer {
  render(markdown: string, baseUrl?: string | URL): StyledText;
}

export class UnstylableContentError extends Error {
  constructor(
    readonly index: number,
    readonly codeUnit: number,
  ) {
    super(`Unstylable character U+${codeUnit.toString(16).toUpperCase().padStart(4, "0")} at index ${index}`);
    this.name = "UnstylableContentError";
  }
}

// C0/C1 controls other than tab, LF and CR, and unpaired surrogates.
const UNSTYLABLE_RE =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function findUnstylableIndex(markdown: string): number {
  const m = UNSTYLABLE_RE.exec(markdown);
  return m ? m.index : -1;
}

/** Styling engine. Throws `UnstylableContentError` on content it rejects. */
export function styleMarkdown(
  markdown: string,
  config: StyleConfig,
  baseUrl?: string | URL,
  parserOptions: ParserOptions = {},
): StyledText {
  const bad = findUnstylableIndex(markdown);
  if (bad !== -1) {
    throw new UnstylableContentError(bad, markdown.charCodeAt(bad));
  }
  return styleBlocks(parseBlocks(markdown, parserOptions), config, baseUrl);
}

export function styleBlocks(nodes: readonly BlockNode[], config: StyleConfig, baseUrl?: string | URL): StyledText {
  const out = new StyledTextBuilder();
  const body = config.body;
  const itemAttrs: TextAttributes = { ...body };
  const markerAttrs: TextAttributes = { ...body, ...config.listMarker };

  const appendInline = (text: string, role: StyleRole, attrs: TextAttributes) => {
    for (const segment of parseInlineSegments(text, baseUrl)) {
      switch (segment.kind) {
        case "text":
          out.append(segment.text, role, attrs);
          break;
        case "link":
          out.append(segment.text, "link", { ...attrs, ...config.link, link: segment.target });
          break;
        case "image":
          out.append(segment.alt, "image", { ...attrs, image: segment.target });
          break;
        case "math": {
          const mathAttrs: TextAttributes = { ...attrs, ...config.math };
          for (const run of segment.runs) {
            if (run.kind === "plain") {
              out.append(run.text, "math", mathAttrs);
            } else {
              out.append(run.base, "math", mathAttrs);
              out.append(run.sub, "subscript", { ...mathAttrs, ...config.subscript });
            }
          }
          break;
        }
      }
    }
  };

  const appendItems = (items: readonly string[], marker: (index: number) => string) => {
    items.forEach((item, index) => {
      if (index > 0) out.appendPlain("\n");
      out.append(marker(index), "list_marker", markerAttrs);
      appendInline(item, "list_item", itemAttrs);
    });
  };

  nodes.forEach((node, index) => {
    if (index > 0) out.appendPlain(config.blockSeparator);
    visitBlock(node, {
      heading: n => appendInline(n.text, `heading${n.level}`, { ...body, ...config.headings[n.level] }),
      paragraph: n => appendInline(n.text, "paragraph", body),
      unorderedList: n => appendItems(n.items, () => `${config.bullet} `),
      orderedList: n => appendItems(n.items, i => `${i + 1}. `),
      codeBlock: n => {
        out.append(n.code, "code", { ...body, ...config.code });
      },
    });
  });

  return out.build();
}

export interface NativeMarkdownRendererOptions {
  style?: StyleConfigOverrides;
  parser?: Omit<ParserOptions, "trace">;
  trace?: DebugTrace;
}

export class NativeMarkdownRenderer implements MarkdownRenderer {
  private readonly style: StyleConfig;
  private readonly parserOptions: ParserOptions;
  private readonly trace?: DebugTrace;

  constructor(options: NativeMarkdownRendererOptions = {}) {
    this.style = resolveStyleConfig(options.style);
    this.parserOptions = { ...options.parser, trace: options.trace };
    this.trace = options.trace;
  }

  render(markdown: string, baseUrl?: string | URL): StyledText {
    try {
      return styleMarkdown(markdown, this.style, baseUrl, this.parserOptions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logDebug(this.trace, `Falling back to plain text: ${reason}`);
      return plainStyledText(markdown);
    }
  }
}
