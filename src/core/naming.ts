const AGENT_SUFFIX = "_agent"
const MAX_ID_STEM = 40

/** "Front-End Designer" -> "front_end_designer" */
export function toSnakeCase(value: string): string {
    return value
        .trim()
        .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "_")
        .replace(/^_+|_+$/g, "")
}

export function canonicalAgentName(role: string): string {
    const base = toSnakeCase(role) || "generic"
    return base.endsWith(AGENT_SUFFIX) ? base : `${base}${AGENT_SUFFIX}`
}

export function sameRole(a: string, b: string): boolean {
    return toSnakeCase(a) === toSnakeCase(b)
}

/** Filesystem-safe workflow id stem; the caller appends the timestamp. */
export function workflowIdStem(name: string): string {
    const stem = toSnakeCase(name).slice(0, MAX_ID_STEM).replace(/_+$/, "")
    return stem || "workflow"
}

export function workflowId(name: string, createdAt: Date): string {
    return `${workflowIdStem(name)}_${Math.floor(createdAt.getTime() / 1000)}`
}

/** Short display name for a goal: its first few words. */
export function nameFromGoal(goal: string, maxWords = 6): string {
    const words = goal.trim().split(/\s+/).filter(Boolean).slice(0, maxWords)
    return words.join(" ") || "workflow"
}
