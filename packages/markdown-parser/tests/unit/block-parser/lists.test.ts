import { test, describe, expect } from "vitest";
import { parseBlocks } from "@/block-parser";
import { createOrderedListNode, createParagraphNode, createUnorderedListNode } from "./test-helpers";

describe("parseBlocks - Lists", () => {
    test("coalesces adjacent bullet lines", () => {
        expect(parseBlocks("- First\n- Second")).toEqual([createUnorderedListNode("First", "Second")]);
    });

    test("discards the ordinal value and keeps position", () => {
        expect(parseBlocks("3. One\n7. Two\n1. Three")).toEqual([createOrderedListNode("One", "Two", "Three")]);
    });

    test("blank lines flush lists between paragraphs", () => {
        const doc = parseBlocks("First line\n\n- A\n\nSecond para");
        expect(doc).toHaveLength(3);
        expect(doc).toEqual([
            createParagraphNode("First line"),
            createUnorderedListNode("A"),
            createParagraphNode("Second para"),
        ]);
    });

    test("switching marker kind starts a new list node", () => {
        const doc = parseBlocks("- a\n1. b\n- c");
        expect(doc).toEqual([
            createUnorderedListNode("a"),
            createOrderedListNode("b"),
            createUnorderedListNode("c"),
        ]);
    });

    test("a blank line splits two lists of the same kind", () => {
        expect(parseBlocks("- a\n\n- b")).toEqual([createUnorderedListNode("a"), createUnorderedListNode("b")]);
    });

    test("accepts * and + bullets and ) delimiters by default", () => {
        expect(parseBlocks("* a\n+ b\n- c")).toEqual([createUnorderedListNode("a", "b", "c")]);
        expect(parseBlocks("1) a\n2. b")).toEqual([createOrderedListNode("a", "b")]);
    });

    test("extension markers can be switched off", () => {
        const doc = parseBlocks("* a\n1) b", { bulletMarkers: [], orderedDelimiters: [] });
        expect(doc).toEqual([createParagraphNode("* a 1) b")]);
    });

    test("trims item text and drops leading indentation", () => {
        expect(parseBlocks("-   padded   \n    - nested")).toEqual([createUnorderedListNode("padded", "nested")]);
    });

    test("a marker without a following space is paragraph text", () => {
        expect(parseBlocks("-5 degrees\n1.5 litres")).toEqual([createParagraphNode("-5 degrees 1.5 litres")]);
    });

    test("a paragraph line after a list flushes the list", () => {
        expect(parseBlocks("- a\ntext")).toEqual([createUnorderedListNode("a"), createParagraphNode("text")]);
    });
});
