import { test, describe, expect } from "vitest";
import { parseBlocks } from "@/block-parser";
import { createParagraphNode } from "./test-helpers";

describe("parseBlocks - Paragraphs", () => {
    test("joins consecutive lines with a single space", () => {
        const doc = parseBlocks("Intro paragraph spanning\nmultiple lines.");
        expect(doc).toEqual([createParagraphNode("Intro paragraph spanning multiple lines.")]);
    });

    test("trims each line before joining", () => {
        const doc = parseBlocks("   first  \n\tsecond\t");
        expect(doc).toEqual([createParagraphNode("first second")]);
    });

    test("a blank line separates paragraphs", () => {
        const doc = parseBlocks("one\n\ntwo");
        expect(doc).toEqual([createParagraphNode("one"), createParagraphNode("two")]);
    });

    test("whitespace-only lines count as blank", () => {
        const doc = parseBlocks("one\n   \t \ntwo");
        expect(doc).toEqual([createParagraphNode("one"), createParagraphNode("two")]);
    });

    test("handles CRLF and CR line endings", () => {
        expect(parseBlocks("a\r\nb\r\rc")).toEqual([createParagraphNode("a b"), createParagraphNode("c")]);
    });

    test("a list line ends the paragraph", () => {
        const doc = parseBlocks("text\n- item");
        expect(doc).toEqual([createParagraphNode("text"), { type: "unordered_list", items: ["item"] }]);
    });
});
