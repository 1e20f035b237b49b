import type { Agent, AgentMetadata } from "../types.js"
import type { AgentDependencies } from "./BaseAgent.js"
import { PLANNING_METADATA, PlanningAgent } from "./PlanningAgent.js"
import {
    PROMPT_GENERATOR_METADATA,
    PromptGeneratorAgent,
} from "./PromptGeneratorAgent.js"
import { WEB_SCRAPER_METADATA, WebScraperAgent } from "./WebScraperAgent.js"
import { WORKER_METADATA, WorkerAgent } from "./WorkerAgent.js"

export interface CatalogEntry {
    metadata?: AgentMetadata
    create(deps: AgentDependencies): Agent
}

/** Agents implemented in code, by canonical name. */
export class AgentCatalog {
    private readonly entries: Map<string, CatalogEntry> = new Map()

    public register(name: string, entry: CatalogEntry): this {
        this.entries.set(name, entry)
        return this
    }

    public get(name: string): CatalogEntry | undefined {
        return this.entries.get(name)
    }

    public has(name: string): boolean {
        return this.entries.has(name)
    }

    public names(): string[] {
        return [...this.entries.keys()]
    }
}

export function createDefaultCatalog(): AgentCatalog {
    return new AgentCatalog()
        .register("worker_agent", {
            metadata: WORKER_METADATA,
            create: (deps) => new WorkerAgent(deps),
        })
        .register("planning_agent", {
            metadata: PLANNING_METADATA,
            create: (deps) => new PlanningAgent(deps),
        })
        .register("prompt_generator_agent", {
            metadata: PROMPT_GENERATOR_METADATA,
            create: (deps) => new PromptGeneratorAgent(deps),
        })
        .register("web_scraper_agent", {
            metadata: WEB_SCRAPER_METADATA,
            create: (deps) => new WebScraperAgent(deps),
        })
}
