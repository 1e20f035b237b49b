/**
 * Helpers for pulling JSON out of model completions and narrowing the
 * parsed `unknown` into plain records, strings and string lists.
 */

export type JsonRecord = Record<string, unknown>

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function readString(
    record: JsonRecord,
    key: string,
    fallback = ""
): string {
    const value = record[key]
    if (typeof value === "string") return value
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value)
    }
    return fallback
}

/** Non-list values become []; list items that aren't strings or numbers are dropped. */
export function toStringArray(value: unknown): string[] {
    if (!Array.isArray(value)) return []
    return value
        .filter(
            (item): item is string | number =>
                typeof item === "string" || typeof item === "number"
        )
        .map((item) => String(item).trim())
        .filter((item) => item.length > 0)
}

/** First key present on the record, for snake_case/camelCase tolerant reads. */
export function pick(record: JsonRecord, ...keys: string[]): unknown {
    for (const key of keys) {
        if (key in record) return record[key]
    }
    return undefined
}

const FENCE_PATTERN = /```(?:json|JSON)?\s*([\s\S]*?)```/g

/**
 * Candidate JSON texts in the order they should be tried: the whole
 * completion, fenced code blocks, the greedy first-`{` to last-`}` span and
 * the first balanced object.
 */
export function extractJsonCandidates(text: string): string[] {
    const candidates: string[] = []
    const add = (candidate: string | null): void => {
        const trimmed = candidate?.trim()
        if (trimmed && !candidates.includes(trimmed)) {
            candidates.push(trimmed)
        }
    }

    add(text)

    for (const match of text.matchAll(FENCE_PATTERN)) {
        const body = match[1]
        if (body?.includes("{")) add(body)
    }

    const first = text.indexOf("{")
    const last = text.lastIndexOf("}")
    if (first !== -1 && last > first) {
        add(text.slice(first, last + 1))
    }

    add(firstBalancedObject(text))

    return candidates
}

export function extractJsonObject(text: string): JsonRecord | null {
    for (const candidate of extractJsonCandidates(text)) {
        const parsed = tryParse(candidate)
        if (isRecord(parsed)) return parsed
    }
    return null
}

function tryParse(text: string): unknown {
    try {
        const parsed: unknown = JSON.parse(text)
        return parsed
    } catch {
        return undefined
    }
}

function firstBalancedObject(text: string): string | null {
    const start = text.indexOf("{")
    if (start === -1) return null

    let depth = 0
    let inString = false
    let escaped = false
    for (let i = start; i < text.length; i++) {
        const ch = text[i]
        if (inString) {
            if (escaped) escaped = false
            else if (ch === "\\") escaped = true
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === "{") depth++
        else if (ch === "}") {
            depth--
            if (depth === 0) return text.slice(start, i + 1)
        }
    }
    return null
}
