import { test, describe, expect } from "vitest";
import { StyledTextBuilder, plainStyledText, renderStyledTextToHtml, toCss } from "@/styled-text";
import type { TextAttributes } from "@/style-config";

const attrs: TextAttributes = { fontFamily: "serif", fontSize: 12, fontWeight: 400, color: "#000" };

describe("StyledTextBuilder", () => {
    test("merges adjacent runs with the same role and attributes", () => {
        const styled = new StyledTextBuilder().append("a", "paragraph", attrs).append("b", "paragraph", { ...attrs }).build();
        expect(styled).toEqual({ text: "ab", runs: [{ start: 0, end: 2, role: "paragraph", attributes: attrs }] });
    });

    test("starts a new run when the role changes", () => {
        const styled = new StyledTextBuilder().append("a", "paragraph", attrs).append("b", "math", attrs).build();
        expect(styled.runs.map(r => [r.start, r.end, r.role])).toEqual([
            [0, 1, "paragraph"],
            [1, 2, "math"],
        ]);
    });

    test("skips empty text and leaves plain gaps unstyled", () => {
        const styled = new StyledTextBuilder().append("", "code", attrs).appendPlain("\n\n").append("x", "code", attrs).build();
        expect(styled).toEqual({ text: "\n\nx", runs: [{ start: 2, end: 3, role: "code", attributes: attrs }] });
    });
});

describe("plainStyledText", () => {
    test("carries the text with no runs", () => {
        expect(plainStyledText("x")).toEqual({ text: "x", runs: [] });
    });
});

describe("renderStyledTextToHtml", () => {
    test("wraps runs and escapes text", () => {
        const styled = new StyledTextBuilder()
            .append("a<b", "paragraph", attrs)
            .appendPlain(" & ")
            .append("go", "link", { ...attrs, link: "https://example.com/x" })
            .build();
        const css = "font-family: serif; font-size: 12px; font-weight: 400; color: #000";
        expect(renderStyledTextToHtml(styled)).toBe(
            `<span style="${css}">a&lt;b</span> &amp; <a href="https://example.com/x" style="${css}">go</a>`,
        );
    });

    test("drops links and images with a script scheme", () => {
        const styled = new StyledTextBuilder()
            .append("x", "link", { ...attrs, link: "javascript:void0" })
            .append("y", "image", { ...attrs, image: "data:text/html,<b>" })
            .build();
        const css = "font-family: serif; font-size: 12px; font-weight: 400; color: #000";
        expect(renderStyledTextToHtml(styled)).toBe(`<span style="${css}">x</span><span style="${css}">y</span>`);
    });

    test("keeps relative and http links", () => {
        const styled = new StyledTextBuilder().append("r", "link", { ...attrs, link: "guide/intro.md" }).build();
        expect(renderStyledTextToHtml(styled)).toContain('<a href="guide/intro.md"');
    });

    test("renders unstyled text escaped", () => {
        expect(renderStyledTextToHtml(plainStyledText("<x>"))).toBe("&lt;x&gt;");
    });
});

describe("toCss", () => {
    test("includes optional declarations when set", () => {
        expect(toCss({ ...attrs, backgroundColor: "#eee", baselineOffset: -4 })).toBe(
            "font-family: serif; font-size: 12px; font-weight: 400; color: #000; background-color: #eee; vertical-align: -4px",
        );
    });
});
