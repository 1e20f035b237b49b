import { describe, expect, it } from "vitest"

import {
    formatTaskResult,
    MISSING_SUMMARY,
    parseTaskResult,
    UNSTRUCTURED_SUMMARY,
} from "../../workflow/ResultParser.js"

describe("parseTaskResult", () => {
    it("should read output and artifacts from a JSON reply", () => {
        const reply =
            'Done.\n```json\n{"output":{"summary":"Drafted","result":"Text"},"artifacts":[{"name":"Draft","filename":"draft.md","content":"# Hi"}]}\n```'
        expect(parseTaskResult(reply)).toEqual({
            output: { summary: "Drafted", result: "Text" },
            artifacts: [
                { name: "Draft", description: "", filename: "draft.md", content: "# Hi" },
            ],
        })
    })

    it("should treat a flat object as the output", () => {
        expect(parseTaskResult('{"summary":"x","result":{"a":1}}').output).toEqual({
            summary: "x",
            result: '{"a":1}',
        })
    })

    it("should fill in a missing summary or result", () => {
        expect(parseTaskResult('{"output":{"result":"r"}}').output).toEqual({
            summary: MISSING_SUMMARY,
            result: "r",
        })
        expect(parseTaskResult('{"output":{"summary":"s"}}').output).toEqual({
            summary: "s",
            result: '{"summary":"s"}',
        })
    })

    it("should keep unstructured text as the result", () => {
        expect(parseTaskResult("just words")).toEqual({
            output: { summary: UNSTRUCTURED_SUMMARY, result: "just words" },
            artifacts: [],
        })
    })

    it("should wrap any reply that is not a JSON object", () => {
        for (const reply of ["", "   ", "{", "```json\n{not: json,}\n```", "[1,2]", "null", "42"]) {
            expect(parseTaskResult(reply)).toEqual({
                output: { summary: UNSTRUCTURED_SUMMARY, result: reply },
                artifacts: [],
            })
        }
    })

    it("should keep HTML with embedded JSON as the raw result", () => {
        const html = [
            "<!doctype html>",
            "<html><head><title>Ada</title>",
            '<script type="application/ld+json">{"@context":"https://schema.org","@type":"Person","name":"Ada"}</script>',
            "<style>body { margin: 0 }</style>",
            "</head><body><h1>Ada</h1><p>data: {}</p></body></html>",
        ].join("\n")

        expect(parseTaskResult(html)).toEqual({
            output: { summary: UNSTRUCTURED_SUMMARY, result: html },
            artifacts: [],
        })
    })

    it("should accept an already-structured record", () => {
        expect(parseTaskResult({ output: { summary: "s", result: "r" } }).output).toEqual({
            summary: "s",
            result: "r",
        })
    })

    it("should serialize non-string artifact content", () => {
        const result = parseTaskResult({
            artifacts: [{ filename: "data.json", content: { rows: 2 } }, "not a record"],
        })
        expect(result.artifacts).toEqual([
            { name: "", description: "", filename: "data.json", content: '{"rows":2}' },
        ])
    })
})

describe("formatTaskResult", () => {
    it("should pass text through", () => {
        expect(formatTaskResult("plain answer")).toBe("plain answer")
    })

    it("should render summary then result", () => {
        expect(formatTaskResult({ summary: "S", result: "R" })).toBe("S\n\nR")
        expect(formatTaskResult({ summary: "S", result: "" })).toBe("S")
    })
})
