import type { HeadingLevel } from "./ast";

export interface TextAttributes {
  fontFamily: string;
  fontSize: number;
  fontWeight: number;
  color: string;
  backgroundColor?: string;
  baselineOffset?: number;
  link?: string;
  image?: string;
}

/**
 * Styles the native renderer applies, handed over at construction.
 * Role entries are overrides layered on `body`.
 */
export interface StyleConfig {
  body: TextAttributes;
  headings: Record<HeadingLevel, Partial<TextAttributes>>;
  code: Partial<TextAttributes>;
  listMarker: Partial<TextAttributes>;
  link: Partial<TextAttributes>;
  math: Partial<TextAttributes>;
  subscript: Partial<TextAttributes>;
  bullet: string;
  blockSeparator: string;
}

export type StyleConfigOverrides = {
  [K in keyof StyleConfig]?: StyleConfig[K] extends string
    ? string
    : K extends "headings"
      ? Partial<Record<HeadingLevel, Partial<TextAttributes>>>
      : Partial<StyleConfig[K]>;
};

export const defaultStyleConfig: StyleConfig = {
  body: {
    fontFamily: "system-ui",
    fontSize: 13,
    fontWeight: 400,
    color: "#1d1d1f",
  },
  headings: {
    1: { fontSize: 28, fontWeight: 700 },
    2: { fontSize: 22, fontWeight: 700 },
    3: { fontSize: 18, fontWeight: 600 },
    4: { fontSize: 16, fontWeight: 600 },
    5: { fontSize: 15, fontWeight: 600 },
    6: { fontSize: 14, fontWeight: 600 },
  },
  code: { fontFamily: "ui-monospace", backgroundColor: "#f2f2f7" },
  listMarker: {},
  link: { color: "#0068da" },
  math: { fontFamily: "serif" },
  subscript: { fontSize: 10, baselineOffset: -4 },
  bullet: "•",
  blockSeparator: "\n\n",
};

export function resolveStyleConfig(overrides: StyleConfigOverrides = {}): StyleConfig {
  const base = defaultStyleConfig;
  return {
    body: { ...base.body, ...overrides.body },
    headings: {
      1: { ...base.headings[1], ...overrides.headings?.[1] },
      2: { ...base.headings[2], ...overrides.headings?.[2] },
      3: { ...base.headings[3], ...overrides.headings?.[3] },
      4: { ...base.headings[4], ...overrides.headings?.[4] },
      5: { ...base.headings[5], ...overrides.headings?.[5] },
      6: { ...base.headings[6], ...overrides.headings?.[6] },
    },
    code: { ...base.code, ...overrides.code },
    listMarker: { ...base.listMarker, ...overrides.listMarker },
    link: { ...base.link, ...overrides.link },
    math: { ...base.math, ...overrides.math },
    subscript: { ...base.subscript, ...overrides.subscript },
    bullet: overrides.bullet ?? base.bullet,
    blockSeparator: overrides.blockSeparator ?? base.blockSeparator,
  };
}
