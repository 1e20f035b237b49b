import { readdir } from "node:fs/promises"
import { join } from "node:path"

import { errorMessage } from "../core/errors.js"
import { isRecord, readString, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import type { AgentBlueprint } from "../types.js"
import { FileStore } from "./FileStore.js"

const NAME_PATTERN = /^[a-z0-9_]+$/
const DIRECTORY = "agents"

export function parseBlueprint(value: unknown): AgentBlueprint | null {
    if (!isRecord(value)) return null
    const name = readString(value, "name")
    const instructions = readString(value, "instructions")
    if (!NAME_PATTERN.test(name) || !instructions) return null
    return {
        name,
        description: readString(value, "description"),
        capabilities: toStringArray(value.capabilities),
        instructions,
        createdAt: readString(value, "createdAt"),
    }
}

/** Synthesized agent definitions, one JSON file each under `<dataPath>/agents/`. */
export class BlueprintStore {
    private readonly files: FileStore
    private readonly directory: string

    constructor(dataPath: string) {
        this.files = new FileStore(dataPath)
        this.directory = join(dataPath, DIRECTORY)
    }

    public async save(blueprint: AgentBlueprint): Promise<void> {
        if (!NAME_PATTERN.test(blueprint.name)) {
            throw new Error(`Invalid agent name: ${blueprint.name}`)
        }
        await this.files.write(`${DIRECTORY}/${blueprint.name}`, blueprint)
    }

    public async load(name: string): Promise<AgentBlueprint | null> {
        if (!NAME_PATTERN.test(name)) return null
        try {
            return parseBlueprint(await this.files.read(`${DIRECTORY}/${name}`))
        } catch (error) {
            log.persistence("Blueprint %s unreadable: %s", name, errorMessage(error))
            return null
        }
    }

    public async names(): Promise<string[]> {
        try {
            const entries = await readdir(this.directory)
            return entries
                .filter((f) => f.endsWith(".json"))
                .map((f) => f.slice(0, -".json".length))
                .filter((name) => NAME_PATTERN.test(name))
                .sort()
        } catch {
            return []
        }
    }

    public async list(): Promise<AgentBlueprint[]> {
        const blueprints: AgentBlueprint[] = []
        for (const name of await this.names()) {
            const blueprint = await this.load(name)
            if (blueprint) blueprints.push(blueprint)
        }
        return blueprints
    }
}
