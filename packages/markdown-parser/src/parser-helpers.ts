import type { HeadingLevel } from "./ast";

export type BulletMarker = "-" | "*" | "+";
export type OrderedDelimiter = "." | ")";

export interface FenceInfo {
  language: string;
}

export interface ListLineInfo {
  ordered: boolean;
  content: string;
}

export function splitLines(source: string): string[] {
  return source.replace(/\r\n?/g, "\n").split("\n");
}

export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

export function parseAtxHeading(line: string): { level: HeadingLevel; text: string } | null {
  const m = line.match(/^[ ]{0,3}(#{1,6})[ \t]+(.*)$/);
  if (!m) return null;
  const level = toHeadingLevel(m[1].length);
  if (level === null) return null;
  return { level, text: stripClosingHashes(m[2]).trim() };
}

// A closing run of '#' only counts when whitespace separates it from the text.
function stripClosingHashes(text: string): string {
  let end = text.length;
  while (end > 0 && isSpaceOrTab(text[end - 1])) end--;
  let hashStart = end;
  while (hashStart > 0 && text[hashStart - 1] === "#") hashStart--;
  if (hashStart === end) return text.slice(0, end);
  if (hashStart === 0 || isSpaceOrTab(text[hashStart - 1])) return text.slice(0, hashStart);
  return text.slice(0, end);
}

function isSpaceOrTab(ch: string): boolean {
  return ch === " " || ch === "\t";
}

function toHeadingLevel(n: number): HeadingLevel | null {
  switch (n) {
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
      return n;
    default:
      return null;
  }
}

/** Any line starting with three backticks opens or closes a fence; what follows is the language. */
export function parseFenceLine(line: string): FenceInfo | null {
  const m = line.match(/^[ ]{0,3}`{3,}(.*)$/);
  if (!m) return null;
  return { language: m[1].trim() };
}

export function parseListLine(
  line: string,
  bulletMarkers: readonly BulletMarker[] = ["-", "*", "+"],
  orderedDelimiters: readonly OrderedDelimiter[] = [".", ")"],
): ListLineInfo | null {
  const mBullet = line.match(/^\s*([*+\-])[ \t]+(.*)$/);
  if (mBullet) {
    const bulletChar = toBulletMarker(mBullet[1]);
    if (bulletChar && (bulletChar === "-" || bulletMarkers.includes(bulletChar))) {
      return { ordered: false, content: mBullet[2].trim() };
    }
  }

  const mOrd = line.match(/^\s*(\d{1,9})([.)])[ \t]+(.*)$/);
  if (mOrd) {
    const delimiter = toOrderedDelimiter(mOrd[2]);
    if (delimiter && (delimiter === "." || orderedDelimiters.includes(delimiter))) {
      return { ordered: true, content: mOrd[3].trim() };
    }
  }

  return null;
}

function toBulletMarker(s: string): BulletMarker | null {
  return s === "-" || s === "*" || s === "+" ? s : null;
}

function toOrderedDelimiter(s: string): OrderedDelimiter | null {
  return s === "." || s === ")" ? s : null;
}
