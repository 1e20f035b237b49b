import { errorMessage } from "../core/errors.js"
import { isRecord, pick, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import { FileStore } from "../persistence/FileStore.js"
import type { AgentIndex, AgentMetadata, AgentRecord } from "../types.js"

export const INDEX_KEY = "agents_index"
export const DEFAULT_SUCCESS_RATE = 50
export const SUCCESS_RATE_STEP = 5

function clampRate(value: number): number {
    return Math.min(100, Math.max(0, value))
}

export function normalizeAgentRecord(value: unknown): AgentRecord {
    const entry = isRecord(value) ? value : {}
    const description = pick(entry, "description")
    const usage = pick(entry, "usageCount", "usage_count")
    const rate = pick(entry, "successRate", "success_rate")
    return {
        description: typeof description === "string" ? description : "",
        capabilities: toStringArray(entry.capabilities),
        usageCount:
            typeof usage === "number" && Number.isInteger(usage) && usage >= 0
                ? usage
                : 0,
        successRate:
            typeof rate === "number" && Number.isFinite(rate)
                ? clampRate(rate)
                : DEFAULT_SUCCESS_RATE,
    }
}

/**
 * The agent index at `<dataPath>/agents_index.json`. Every call reads,
 * modifies and rewrites the whole file.
 */
export class AgentRegistry {
    private readonly files: FileStore

    constructor(dataPath: string) {
        this.files = new FileStore(dataPath)
    }

    public get indexPath(): string {
        return this.files.pathFor(INDEX_KEY)
    }

    /** Loads the index, resetting it to `{}` when missing or unreadable. */
    public async load(): Promise<AgentIndex> {
        let document: unknown
        try {
            document = await this.files.read(INDEX_KEY)
        } catch (error) {
            log.registry(
                "Agent index unreadable, resetting: %s",
                errorMessage(error)
            )
            document = null
        }
        if (!isRecord(document)) {
            const empty: AgentIndex = {}
            await this.files.write(INDEX_KEY, empty)
            return empty
        }
        const index: AgentIndex = {}
        for (const [name, entry] of Object.entries(document)) {
            index[name] = normalizeAgentRecord(entry)
        }
        return index
    }

    public list(): Promise<AgentIndex> {
        return this.load()
    }

    public async get(name: string): Promise<AgentRecord | null> {
        const index = await this.load()
        return index[name] ?? null
    }

    public async has(name: string): Promise<boolean> {
        return (await this.get(name)) !== null
    }

    /** Adds a new entry, or refreshes the metadata of an existing one. */
    public async register(
        name: string,
        metadata: AgentMetadata
    ): Promise<AgentRecord> {
        const index = await this.load()
        const existing = index[name]
        const record: AgentRecord = existing
            ? { ...existing, ...metadata }
            : {
                  ...metadata,
                  usageCount: 0,
                  successRate: DEFAULT_SUCCESS_RATE,
              }
        index[name] = record
        await this.files.write(INDEX_KEY, index)
        log.registry("%s %s", existing ? "Updated" : "Registered", name)
        return record
    }

    /**
     * Refreshes metadata, registering the agent when it is missing. An
     * "Auto-detected" placeholder never overwrites a real description.
     */
    public async updateMetadata(
        name: string,
        metadata: AgentMetadata
    ): Promise<AgentRecord> {
        const index = await this.load()
        const existing = index[name]
        if (existing && metadata.description === autoDescription(name)) {
            return existing
        }
        return this.register(name, metadata)
    }

    /** Registers the entries not already present; returns their names. */
    public async appendMissing(
        entries: Record<string, AgentMetadata>
    ): Promise<string[]> {
        const index = await this.load()
        const added: string[] = []
        for (const [name, metadata] of Object.entries(entries)) {
            if (index[name]) continue
            index[name] = {
                ...metadata,
                usageCount: 0,
                successRate: DEFAULT_SUCCESS_RATE,
            }
            added.push(name)
        }
        if (added.length > 0) {
            await this.files.write(INDEX_KEY, index)
            log.registry("Appended %d agents: %s", added.length, added.join(", "))
        }
        return added
    }

    public async updateStats(
        name: string,
        success: boolean
    ): Promise<AgentRecord | null> {
        const index = await this.load()
        const record = index[name]
        if (!record) {
            log.registry("Stats update for unknown agent %s ignored", name)
            return null
        }
        record.usageCount += 1
        record.successRate = clampRate(
            record.successRate + (success ? SUCCESS_RATE_STEP : -SUCCESS_RATE_STEP)
        )
        await this.files.write(INDEX_KEY, index)
        log.registry(
            "%s: usage %d, success %d%%",
            name,
            record.usageCount,
            record.successRate
        )
        return record
    }
}

export function autoDescription(name: string): string {
    return `Auto-detected ${name}`
}
