import { afterEach, describe, expect, it, vi } from "vitest"

import type { AgentDependencies } from "../agents/BaseAgent.js"
import { PlanningAgent } from "../agents/PlanningAgent.js"
import { PromptGeneratorAgent } from "../agents/PromptGeneratorAgent.js"
import { buildExecutePrompt, buildThinkPrompt } from "../agents/prompts.js"
import { WebScraperAgent } from "../agents/WebScraperAgent.js"
import { WorkerAgent } from "../agents/WorkerAgent.js"
import { ToolExecutionError } from "../core/errors.js"
import { createDefaultToolRegistry, ToolRegistry } from "../tools/ToolRegistry.js"
import type { Oracle } from "../types.js"
import { createMockOracle, createScriptedOracle } from "./helpers/mockOracle.js"

function deps(oracle: Oracle, tools = createDefaultToolRegistry()): AgentDependencies {
    return { oracle, tools, workingDirectory: "/tmp/taskweave-agents" }
}

describe("WorkerAgent", () => {
    it("should think before it acts", async () => {
        const oracle = createMockOracle(["Outline first", "Final answer"])
        expect(await new WorkerAgent(deps(oracle)).act("Summarize tides")).toBe("Final answer")
        expect(oracle.complete.mock.calls.map(([prompt]) => prompt)).toEqual([
            buildThinkPrompt("Summarize tides"),
            buildExecutePrompt("Summarize tides", "Outline first"),
        ])
    })
})

describe("PromptGeneratorAgent", () => {
    it("should refine prompts and fall back to the input", async () => {
        const agent = new PromptGeneratorAgent(
            deps(createMockOracle(["  Explain tides for children  ", new Error("down"), "   "]))
        )
        expect(await agent.refinePrompt("tides?")).toBe("Explain tides for children")
        expect(await agent.refinePrompt("tides?")).toBe("tides?")
        expect(await agent.refinePrompt("tides?")).toBe("tides?")
    })

    it("should answer the refined prompt when acting", async () => {
        const oracle = createMockOracle(["Explain tides", " Tides are... "])
        expect(await new PromptGeneratorAgent(deps(oracle)).act("tides?")).toBe("Tides are...")
        expect(oracle.complete).toHaveBeenLastCalledWith("Explain tides")
    })

    it("should reject empty input", async () => {
        const agent = new PromptGeneratorAgent(deps(createMockOracle([])))
        expect((await agent.generateFinalResponse(" ")).text).toBe("Error: The input is empty.")
    })
})

describe("BaseAgent.generateFinalResponse", () => {
    it("should trim replies and turn failures into text", async () => {
        const agent = new PlanningAgent(deps(createMockOracle([" 1. Plan ", new Error("down")])))
        expect((await agent.generateFinalResponse("plan it")).text).toBe("1. Plan")
        expect((await agent.generateFinalResponse("plan it")).text).toBe("LLM Error: down")
        expect((await agent.generateFinalResponse("")).text).toBe("Error: Empty prompt received.")
    })
})

describe("WebScraperAgent", () => {
    const PAGE =
        "<html><head><title>Tide Tables</title></head><body><p>High tide at noon</p></body></html>"

    afterEach(() => {
        vi.unstubAllGlobals()
    })

    function scraper() {
        const fetchMock = vi.fn((_url: string, _init?: RequestInit) =>
            Promise.resolve(
                new Response(PAGE, { status: 200, headers: { "content-type": "text/html" } })
            )
        )
        vi.stubGlobal("fetch", fetchMock)
        const oracle = createScriptedOracle([
            ["Analyze this web scraping task:", "Fetch the page, read the title"],
            ["what information should be extracted", '{"title": "page title"}'],
            ["Extract structured information", '{"title": "Tide Tables"}'],
            ["Extract just the URL", "I could not find one"],
        ])
        return { agent: new WebScraperAgent(deps(oracle)), fetchMock }
    }

    it("should fetch the task's URL and extract data", async () => {
        const { agent, fetchMock } = scraper()
        const result = await agent.act("Scrape https://tides.example.test/today.")

        expect(fetchMock.mock.calls[0]?.[0]).toBe("https://tides.example.test/today")
        expect(result).toEqual({
            output: {
                summary: "Extracted information from https://tides.example.test/today",
                result: '{\n  "title": "Tide Tables"\n}',
            },
            extracted_data: { title: "Tide Tables" },
        })
    })

    it("should render a landing page artifact when asked for one", async () => {
        const { agent } = scraper()
        const result = await agent.act("Build a landing page from https://tides.example.test")

        expect(result).toMatchObject({
            output: {
                summary: "Created a landing page from https://tides.example.test",
                result: "Landing page written to tide_tables.html",
            },
            artifacts: [{ name: "Landing Page", filename: "tide_tables.html" }],
        })
    })

    it("should fail when the task names no URL", async () => {
        const { agent } = scraper()
        await expect(agent.act("Scrape the tide site")).rejects.toThrow(
            new ToolExecutionError("web_fetch", "No valid URL found in the task")
        )
    })

    it("should require its tools", () => {
        const tools = new ToolRegistry([])
        expect(() => new WebScraperAgent(deps(createMockOracle([]), tools))).toThrow(
            "web_scraper_agent requires tool web_fetch, which is not registered"
        )
    })
})
