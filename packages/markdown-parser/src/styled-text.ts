import type { HeadingLevel } from "./ast";
import { escapeHtml, escapeHtmlAttr, sanitizeUrl } from "./renderer";
import type { TextAttributes } from "./style-config";

export type StyleRole =
  | `heading${HeadingLevel}`
  | "paragraph"
  | "list_marker"
  | "list_item"
  | "code"
  | "link"
  | "image"
  | "math"
  | "subscript";

/** A styled range of `StyledText.text`, in UTF-16 offsets, end exclusive. */
export interface StyleRun {
  start: number;
  end: number;
  role: StyleRole;
  attributes: TextAttributes;
}

export interface StyledText {
  /** Plain-text projection. */
  readonly text: string;
  /** Non-overlapping, ascending. */
  readonly runs: readonly StyleRun[];
}

export function plainStyledText(text: string): StyledText {
  return { text, runs: [] };
}

export class StyledTextBuilder {
  private chunks: string[] = [];
  private runs: StyleRun[] = [];
  private length = 0;

  appendPlain(text: string): this {
    this.chunks.push(text);
    this.length += text.length;
    return this;
  }

  append(text: string, role: StyleRole, attributes: TextAttributes): this {
    if (!text) return this;
    const start = this.length;
    this.appendPlain(text);
    const last = this.runs[this.runs.length - 1];
    if (last && last.end === start && last.role === role && sameAttributes(last.attributes, attributes)) {
      last.end = this.length;
    } else {
      this.runs.push({ start, end: this.length, role, attributes });
    }
    return this;
  }

  build(): StyledText {
    return { text: this.chunks.join(""), runs: this.runs.map(run => ({ ...run })) };
  }
}

const attributeKeys: readonly (keyof TextAttributes)[] = [
  "fontFamily",
  "fontSize",
  "fontWeight",
  "color",
  "backgroundColor",
  "baselineOffset",
  "link",
  "image",
];

function sameAttributes(a: TextAttributes, b: TextAttributes): boolean {
  return attributeKeys.every(key => a[key] === b[key]);
}

export function renderStyledTextToHtml(styled: StyledText): string {
  let html = "";
  let cursor = 0;
  for (const run of styled.runs) {
    if (run.start > cursor) {
      html += escapeHtml(styled.text.slice(cursor, run.start));
    }
    html += wrapRun(styled.text.slice(run.start, run.end), run);
    cursor = run.end;
  }
  if (cursor < styled.text.length) {
    html += escapeHtml(styled.text.slice(cursor));
  }
  return html;
}

function wrapRun(text: string, run: StyleRun): string {
  const style = escapeHtmlAttr(toCss(run.attributes));
  const inner = escapeHtml(text);
  const link = run.attributes.link ? sanitizeUrl(run.attributes.link) : null;
  if (link) {
    return `<a href="${link}" style="${style}">${inner}</a>`;
  }
  const image = run.attributes.image ? sanitizeUrl(run.attributes.image) : null;
  if (image) {
    return `<span data-image="${image}" style="${style}">${inner}</span>`;
  }
  return `<span style="${style}">${inner}</span>`;
}

export function toCss(attributes: TextAttributes): string {
  const decls = [
    `font-family: ${attributes.fontFamily}`,
    `font-size: ${attributes.fontSize}px`,
    `font-weight: ${attributes.fontWeight}`,
    `color: ${attributes.color}`,
  ];
  if (attributes.backgroundColor) decls.push(`background-color: ${attributes.backgroundColor}`);
  if (attributes.baselineOffset) decls.push(`vertical-align: ${attributes.baselineOffset}px`);
  return decls.join("; ");
}
