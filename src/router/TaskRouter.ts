import type { AgentRegistry } from "../agents/AgentRegistry.js"
import type { AgentResolver } from "../agents/AgentResolver.js"
import { PromptGeneratorAgent } from "../agents/PromptGeneratorAgent.js"
import {
    buildAgentSelectionPrompt,
    buildCapabilityCheckPrompt,
    buildSpecializedAgentPrompt,
    buildSubtaskPrompt,
} from "../agents/prompts.js"
import { DEFAULT_ROUTER_ITERATIONS } from "../core/Config.js"
import { errorMessage } from "../core/errors.js"
import { extractJsonObject, pick, readString, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import { canonicalAgentName } from "../core/naming.js"
import type { EventBus } from "../events/EventBus.js"
import { askOracle } from "../llm/Oracle.js"
import type { AgentIndex, AgentOutput, Oracle } from "../types.js"
import { formatTaskResult } from "../workflow/ResultParser.js"

const PROMPT_GENERATOR = "prompt_generator_agent"
const CREATE_AGENT_PATTERN = /^\s*(create|make|generate)\s+agent\b/i
const BULLET_PATTERN = /^\s*[•*-]\s+(.+)$/

export interface RouteOptions {
    maxIterations?: number
    isSubtask?: boolean
}

export interface TaskRouterOptions {
    oracle: Oracle
    registry: AgentRegistry
    resolver: AgentResolver
    eventBus?: EventBus
    maxIterations?: number
    verifyCapabilities?: boolean
}

interface RouteResult {
    text: string
    agentName: string | null
    failed: boolean
}

/**
 * Sends a free-form request to the best registered agent, creating a
 * specialist when none fits, and follows up on sub-tasks the first answer
 * left open.
 */
export class TaskRouter {
    private readonly oracle: Oracle
    private readonly registry: AgentRegistry
    private readonly resolver: AgentResolver
    private readonly eventBus: EventBus | undefined
    private readonly maxIterations: number
    private readonly verifyCapabilities: boolean

    constructor(options: TaskRouterOptions) {
        this.oracle = options.oracle
        this.registry = options.registry
        this.resolver = options.resolver
        this.eventBus = options.eventBus
        this.maxIterations = options.maxIterations ?? DEFAULT_ROUTER_ITERATIONS
        this.verifyCapabilities = options.verifyCapabilities ?? true
    }

    /** Never throws: every failure comes back as a message. */
    public async routeTask(task: string, options: RouteOptions = {}): Promise<string> {
        const maxIterations = options.maxIterations ?? this.maxIterations
        const isSubtask = options.isSubtask ?? false
        this.eventBus?.emit({ type: "route:start", task, depth: isSubtask ? 1 : 0 })

        let result: RouteResult
        try {
            result = await this.route(task, maxIterations, isSubtask)
        } catch (error) {
            log.router("Routing failed: %s", errorMessage(error))
            result = {
                text: `Error routing task: ${errorMessage(error)}`,
                agentName: null,
                failed: true,
            }
        }

        this.eventBus?.emit({
            type: "route:complete",
            agentName: result.agentName,
            status: result.failed ? "failed" : "completed",
        })
        return result.text
    }

    /**
     * Asks the oracle to name a specialist for the task, reusing an agent
     * that already exists under that name. Returns null when no agent could
     * be created.
     */
    public async createSpecializedAgent(task: string): Promise<string | null> {
        let reply: string
        try {
            reply = await this.oracle.complete(buildSpecializedAgentPrompt(task))
        } catch (error) {
            log.router("Agent proposal failed: %s", errorMessage(error))
            return null
        }

        const proposal = extractJsonObject(reply)
        const proposedName = proposal
            ? readString(proposal, "agent_name") || readString(proposal, "name")
            : ""
        if (!proposal || !proposedName.trim()) {
            log.router("Agent proposal had no name: %s", reply.slice(0, 200))
            return null
        }

        const name = canonicalAgentName(proposedName)
        if (await this.resolver.exists(name)) {
            log.router("Proposed agent %s already exists", name)
            this.eventBus?.emit({ type: "route:agent", agentName: name, created: false })
            return name
        }

        try {
            await this.resolver.synthesize(
                name,
                readString(proposal, "description"),
                toStringArray(pick(proposal, "capabilities"))
            )
        } catch (error) {
            log.router("Could not create %s: %s", name, errorMessage(error))
            return null
        }
        this.eventBus?.emit({ type: "route:agent", agentName: name, created: true })
        return name
    }

    private async route(
        task: string,
        maxIterations: number,
        isSubtask: boolean
    ): Promise<RouteResult> {
        if (CREATE_AGENT_PATTERN.test(task)) {
            const created = await this.createSpecializedAgent(task)
            return created
                ? {
                      text: `Successfully created new agent: ${created}`,
                      agentName: created,
                      failed: false,
                  }
                : { text: "Failed to create specialized agent", agentName: null, failed: true }
        }

        const agents = await this.loadAgents()
        const refined = await this.refine(task)

        let agentName = await this.selectAgent(refined, agents)
        if (!agentName) {
            agentName = await this.createSpecializedAgent(refined)
        } else if (this.verifyCapabilities) {
            const record = agents[agentName]
            if (record && !(await this.canHandle(refined, agentName, record))) {
                log.router("%s declined the task; creating a specialist", agentName)
                agentName = (await this.createSpecializedAgent(refined)) ?? agentName
            }
        }

        if (!agentName) {
            const text = await askOracle(this.oracle, refined)
            return { text, agentName: null, failed: text.startsWith("LLM Error:") }
        }

        const result = await this.execute(agentName, refined)
        if (result.failed || isSubtask || maxIterations <= 1) return result

        const subtasks = await this.findSubtasks(task, result.text)
        let text = result.text
        for (const subtask of subtasks) {
            const response = await this.routeTask(subtask, {
                maxIterations: maxIterations - 1,
                isSubtask: true,
            })
            text += `\n\n--- Subtask: ${subtask} ---\n${response}`
        }
        return { ...result, text }
    }

    private async loadAgents(): Promise<AgentIndex> {
        const agents = await this.registry.list()
        if (Object.keys(agents).length > 0) return agents
        await this.registry.appendMissing(await this.resolver.scan())
        return this.registry.list()
    }

    private async refine(task: string): Promise<string> {
        const agent = await this.resolver.getAgentInstance(PROMPT_GENERATOR)
        if (!(agent instanceof PromptGeneratorAgent)) return task
        const { prompt, refined } = await agent.refine(task)
        await this.recordStats(PROMPT_GENERATOR, refined)
        return prompt
    }

    private async selectAgent(task: string, agents: AgentIndex): Promise<string | null> {
        const names = Object.keys(agents)
        if (names.length === 0) return null
        let reply: string
        try {
            reply = await this.oracle.complete(buildAgentSelectionPrompt(task, agents))
        } catch (error) {
            log.router("Agent selection failed: %s", errorMessage(error))
            return null
        }
        const selected = parseAgentSelection(reply, names)
        log.router("Selected %s for task", selected ?? "no agent")
        return selected
    }

    private async canHandle(
        task: string,
        name: string,
        record: AgentIndex[string]
    ): Promise<boolean> {
        try {
            return parseCapabilityAnswer(
                await this.oracle.complete(buildCapabilityCheckPrompt(task, name, record))
            )
        } catch (error) {
            log.router("Capability check for %s failed: %s", name, errorMessage(error))
            return true
        }
    }

    private async execute(name: string, task: string): Promise<RouteResult> {
        const agent = await this.resolver.getAgentInstance(name)
        if (!agent) {
            return { text: `Failed to initialize agent: ${name}`, agentName: name, failed: true }
        }
        try {
            const output: AgentOutput = agent.act
                ? await agent.act(task)
                : (await agent.generateFinalResponse(task)).text
            await this.recordStats(name, true)
            return { text: formatTaskResult(output), agentName: name, failed: false }
        } catch (error) {
            await this.recordStats(name, false)
            return {
                text: `Error executing task with ${name}: ${errorMessage(error)}`,
                agentName: name,
                failed: true,
            }
        }
    }

    private async findSubtasks(task: string, response: string): Promise<string[]> {
        try {
            return parseSubtasks(
                await this.oracle.complete(buildSubtaskPrompt(task, response))
            )
        } catch (error) {
            log.router("Sub-task check failed: %s", errorMessage(error))
            return []
        }
    }

    private async recordStats(name: string, success: boolean): Promise<void> {
        try {
            await this.registry.updateStats(name, success)
        } catch (error) {
            log.router("Could not update stats for %s: %s", name, errorMessage(error))
        }
    }
}

/**
 * Exact name, then the NONE token, then the longest listed name contained
 * in the reply.
 */
export function parseAgentSelection(reply: string, names: string[]): string | null {
    const cleaned = reply.trim().replace(/["'`]/g, "").trim().toLowerCase()
    const exact = names.find((name) => name.toLowerCase() === cleaned)
    if (exact) return exact
    if (cleaned === "none") return null
    const contained = names
        .filter((name) => cleaned.includes(name.toLowerCase()))
        .sort((a, b) => b.length - a.length)
    return contained[0] ?? null
}

/** Only an answer whose first word is "no" rejects the agent. */
export function parseCapabilityAnswer(reply: string): boolean {
    const first = reply.trim().split(/\s+/)[0] ?? ""
    return first.replace(/[^a-z]/gi, "").toLowerCase() !== "no"
}

export function parseSubtasks(reply: string): string[] {
    if (reply.includes("NO_SUBTASKS") || /no subtasks needed/i.test(reply)) return []
    const subtasks: string[] = []
    for (const line of reply.split("\n")) {
        const text = BULLET_PATTERN.exec(line)?.[1]?.trim()
        if (text) subtasks.push(text)
    }
    return subtasks
}
