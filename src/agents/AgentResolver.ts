import { AgentResolutionError, errorMessage, toError } from "../core/errors.js"
import { extractJsonObject, readString, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import { canonicalAgentName } from "../core/naming.js"
import type { BlueprintStore } from "../persistence/BlueprintStore.js"
import type { ToolRegistry } from "../tools/ToolRegistry.js"
import type {
    Agent,
    AgentBlueprint,
    AgentMetadata,
    Oracle,
    RoleSpec,
} from "../types.js"
import type { AgentCatalog } from "./AgentCatalog.js"
import { autoDescription, type AgentRegistry } from "./AgentRegistry.js"
import type { AgentDependencies } from "./BaseAgent.js"
import { PersonaAgent } from "./PersonaAgent.js"
import { buildBlueprintPrompt } from "./prompts.js"

export interface AgentResolverOptions {
    registry: AgentRegistry
    catalog: AgentCatalog
    blueprints: BlueprintStore
    oracle: Oracle
    tools: ToolRegistry
    workingDirectory: string
}

export interface ResolvedAgent {
    name: string
    created: boolean
}

export class AgentResolver {
    private readonly registry: AgentRegistry
    private readonly catalog: AgentCatalog
    private readonly blueprints: BlueprintStore
    private readonly oracle: Oracle
    private readonly deps: AgentDependencies

    constructor(options: AgentResolverOptions) {
        this.registry = options.registry
        this.catalog = options.catalog
        this.blueprints = options.blueprints
        this.oracle = options.oracle
        this.deps = {
            oracle: options.oracle,
            tools: options.tools,
            workingDirectory: options.workingDirectory,
        }
    }

    public canonicalName(role: string): string {
        return canonicalAgentName(role)
    }

    /** Whether an agent by this name is registered or can be instantiated. */
    public async exists(name: string): Promise<boolean> {
        return (
            this.catalog.has(name) ||
            (await this.registry.has(name)) ||
            (await this.blueprints.load(name)) !== null
        )
    }

    /** Reuses an existing agent for the role, synthesizing one otherwise. */
    public async resolveOrCreate(role: RoleSpec): Promise<ResolvedAgent> {
        const name = this.canonicalName(role.role)
        if (await this.exists(name)) {
            log.agent("Reusing %s for role %s", name, role.role)
            return { name, created: false }
        }
        await this.synthesize(name, role.description, role.capabilities)
        return { name, created: true }
    }

    /**
     * Asks the oracle for a blueprint, persists it and registers the agent.
     * An unparseable reply still yields a blueprint whose instructions are
     * the raw reply.
     */
    public async synthesize(
        name: string,
        description: string,
        capabilities: string[]
    ): Promise<AgentBlueprint> {
        log.agent("Synthesizing %s", name)
        let reply: string
        try {
            reply = await this.oracle.complete(
                buildBlueprintPrompt(name, description, capabilities)
            )
        } catch (error) {
            throw new AgentResolutionError(
                name,
                `Could not synthesize ${name}: ${errorMessage(error)}`,
                toError(error)
            )
        }

        const parsed = extractJsonObject(reply)
        const instructions = parsed ? readString(parsed, "instructions").trim() : ""
        const parsedCapabilities = parsed ? toStringArray(parsed.capabilities) : []
        const blueprint: AgentBlueprint = {
            name,
            description:
                (parsed ? readString(parsed, "description").trim() : "") ||
                description ||
                `Specialist agent for ${name}`,
            capabilities: parsedCapabilities.length
                ? parsedCapabilities
                : capabilities,
            instructions: instructions || reply,
            createdAt: new Date().toISOString(),
        }
        if (!instructions) {
            log.agent("Blueprint reply for %s was not JSON; using raw text", name)
        }

        try {
            await this.blueprints.save(blueprint)
            await this.registry.register(name, {
                description: blueprint.description,
                capabilities: blueprint.capabilities,
            })
        } catch (error) {
            throw new AgentResolutionError(
                name,
                `Could not store ${name}: ${errorMessage(error)}`,
                toError(error)
            )
        }
        return blueprint
    }

    /** Catalog entries and stored blueprints, with their declared metadata. */
    public async scan(): Promise<Record<string, AgentMetadata>> {
        const found: Record<string, AgentMetadata> = {}
        for (const name of this.catalog.names()) {
            found[name] = withFallback(name, this.catalog.get(name)?.metadata)
        }
        for (const blueprint of await this.blueprints.list()) {
            found[blueprint.name] ??= withFallback(blueprint.name, blueprint)
        }
        return found
    }

    /** Never throws; failures are logged and give null. */
    public async getAgentInstance(name: string): Promise<Agent | null> {
        try {
            const entry = this.catalog.get(name)
            let agent: Agent
            let metadata: AgentMetadata
            if (entry) {
                agent = entry.create(this.deps)
                metadata = withFallback(name, entry.metadata)
            } else {
                const blueprint = await this.blueprints.load(name)
                if (!blueprint) {
                    log.agent("No implementation found for %s", name)
                    return null
                }
                agent = new PersonaAgent(blueprint, this.deps)
                metadata = withFallback(name, blueprint)
            }
            await this.registry.updateMetadata(name, metadata)
            return agent
        } catch (error) {
            log.agent("Failed to instantiate %s: %s", name, errorMessage(error))
            return null
        }
    }
}

function withFallback(
    name: string,
    metadata: AgentMetadata | undefined
): AgentMetadata {
    if (!metadata || !metadata.description) {
        return {
            description: autoDescription(name),
            capabilities: metadata?.capabilities ?? [],
        }
    }
    return {
        description: metadata.description,
        capabilities: metadata.capabilities,
    }
}
