import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { createDefaultCatalog } from "../agents/AgentCatalog.js"
import { AgentRegistry } from "../agents/AgentRegistry.js"
import { AgentResolver } from "../agents/AgentResolver.js"
import { PersonaAgent } from "../agents/PersonaAgent.js"
import { WorkerAgent, WORKER_METADATA } from "../agents/WorkerAgent.js"
import { AgentResolutionError } from "../core/errors.js"
import { BlueprintStore } from "../persistence/BlueprintStore.js"
import { createDefaultToolRegistry } from "../tools/ToolRegistry.js"
import type { RoleSpec } from "../types.js"
import {
    createMockOracle,
    makeTempDir,
    type MockOracle,
    removeTempDir,
} from "./helpers/mockOracle.js"

const EDITOR_ROLE: RoleSpec = {
    role: "Copy Editor",
    description: "Edits copy",
    capabilities: ["editing"],
    responsibilities: ["proofread"],
}

describe("AgentResolver", () => {
    let dir: string
    let registry: AgentRegistry
    let blueprints: BlueprintStore

    beforeEach(async () => {
        dir = await makeTempDir("resolver")
        registry = new AgentRegistry(dir)
        blueprints = new BlueprintStore(dir)
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    function makeResolver(oracle: MockOracle): AgentResolver {
        return new AgentResolver({
            registry,
            catalog: createDefaultCatalog(),
            blueprints,
            oracle,
            tools: createDefaultToolRegistry(),
            workingDirectory: dir,
        })
    }

    it("should reuse a built-in agent without asking the oracle", async () => {
        const oracle = createMockOracle([])
        const resolver = makeResolver(oracle)
        expect(await resolver.resolveOrCreate({ ...EDITOR_ROLE, role: "Worker" })).toEqual({
            name: "worker_agent",
            created: false,
        })
        expect(oracle.complete).not.toHaveBeenCalled()
    })

    it("should reuse an agent known only to the registry", async () => {
        await registry.register("copy_editor_agent", { description: "x", capabilities: [] })
        const resolver = makeResolver(createMockOracle([]))
        expect(await resolver.resolveOrCreate(EDITOR_ROLE)).toEqual({
            name: "copy_editor_agent",
            created: false,
        })
    })

    it("should synthesize, store and register a missing agent", async () => {
        const resolver = makeResolver(
            createMockOracle([
                '{"description":"Sharp editor","capabilities":["grammar"],"instructions":"Fix every sentence."}',
            ])
        )
        expect(await resolver.resolveOrCreate(EDITOR_ROLE)).toEqual({
            name: "copy_editor_agent",
            created: true,
        })
        expect(await blueprints.load("copy_editor_agent")).toMatchObject({
            description: "Sharp editor",
            capabilities: ["grammar"],
            instructions: "Fix every sentence.",
        })
        expect(await registry.get("copy_editor_agent")).toEqual({
            description: "Sharp editor",
            capabilities: ["grammar"],
            usageCount: 0,
            successRate: 50,
        })
    })

    it("should keep a prose reply as the instructions", async () => {
        const resolver = makeResolver(createMockOracle(["You are a careful editor."]))
        const blueprint = await resolver.synthesize("copy_editor_agent", "Edits copy", ["editing"])
        expect(blueprint).toMatchObject({
            name: "copy_editor_agent",
            description: "Edits copy",
            capabilities: ["editing"],
            instructions: "You are a careful editor.",
        })
    })

    it("should raise AgentResolutionError when the oracle fails", async () => {
        const resolver = makeResolver(createMockOracle([new Error("down")]))
        await expect(resolver.resolveOrCreate(EDITOR_ROLE)).rejects.toThrow(
            new AgentResolutionError(
                "copy_editor_agent",
                "Could not synthesize copy_editor_agent: down"
            )
        )
    })

    it("should run a stored blueprint as a persona agent", async () => {
        const oracle = createMockOracle([
            '{"description":"Sharp editor","capabilities":["grammar"],"instructions":"Fix every sentence."}',
            "Edited.",
        ])
        const resolver = makeResolver(oracle)
        await resolver.resolveOrCreate(EDITOR_ROLE)

        const agent = await resolver.getAgentInstance("copy_editor_agent")
        expect(agent).toBeInstanceOf(PersonaAgent)
        expect(await agent?.act?.("Fix this paragraph")).toBe("Edited.")
        expect(oracle.complete).toHaveBeenLastCalledWith(
            "Fix every sentence.\n\nRole: Sharp editor\nCapabilities: grammar\n\n---\n\nFix this paragraph"
        )
    })

    it("should instantiate catalog agents and refresh their metadata", async () => {
        const resolver = makeResolver(createMockOracle([]))
        expect(await resolver.getAgentInstance("worker_agent")).toBeInstanceOf(WorkerAgent)
        expect(await registry.get("worker_agent")).toMatchObject(WORKER_METADATA)
        expect(await resolver.getAgentInstance("unknown_agent")).toBeNull()
    })

    it("should scan the catalog and stored blueprints", async () => {
        await blueprints.save({
            name: "copy_editor_agent",
            description: "",
            capabilities: [],
            instructions: "Edit.",
            createdAt: "",
        })
        const found = await makeResolver(createMockOracle([])).scan()
        expect(Object.keys(found)).toEqual([
            "worker_agent",
            "planning_agent",
            "prompt_generator_agent",
            "web_scraper_agent",
            "copy_editor_agent",
        ])
        expect(found.copy_editor_agent?.description).toBe("Auto-detected copy_editor_agent")
    })
})
