import { extractJsonCandidates, isRecord, type JsonRecord } from "../core/json.js"
import type { AgentOutput, ArtifactDraft, TaskResult } from "../types.js"

export const MISSING_SUMMARY = "Task completed without a summary"
export const UNSTRUCTURED_SUMMARY =
    "Task completed but returned unstructured response"

function asText(value: unknown): string {
    if (typeof value === "string") return value
    if (value === undefined) return ""
    return JSON.stringify(value) ?? ""
}

function normalizeArtifact(value: JsonRecord): ArtifactDraft {
    const field = (key: string): string => {
        const v = value[key]
        return typeof v === "string" ? v : ""
    }
    return {
        name: field("name"),
        description: field("description"),
        filename: field("filename"),
        content: asText(value.content),
    }
}

function normalizeRecord(raw: JsonRecord): TaskResult {
    const output = isRecord(raw.output) ? raw.output : raw
    const summary =
        typeof output.summary === "string" && output.summary.trim()
            ? output.summary
            : MISSING_SUMMARY
    const result =
        output.result === undefined
            ? JSON.stringify(output)
            : asText(output.result)
    const artifacts = Array.isArray(raw.artifacts)
        ? raw.artifacts.filter(isRecord).map(normalizeArtifact)
        : []
    return { output: { summary, result }, artifacts }
}

const RESULT_KEYS = ["summary", "result", "artifacts"]

/** JSON embedded in prose (JSON-LD, inline data) is not a task result. */
function carriesResult(record: JsonRecord): boolean {
    return isRecord(record.output) || RESULT_KEYS.some((key) => key in record)
}

/**
 * Turns whatever an agent returned into `{output, artifacts}`. Never
 * throws: text with no JSON object in it becomes an unstructured result.
 */
export function parseTaskResult(raw: AgentOutput): TaskResult {
    if (typeof raw !== "string") return normalizeRecord(raw)

    for (const candidate of extractJsonCandidates(raw)) {
        let parsed: unknown
        try {
            parsed = JSON.parse(candidate)
        } catch {
            continue
        }
        if (isRecord(parsed) && carriesResult(parsed)) return normalizeRecord(parsed)
    }

    return {
        output: { summary: UNSTRUCTURED_SUMMARY, result: raw },
        artifacts: [],
    }
}

/** Display form used by the router: summary, blank line, result. */
export function formatTaskResult(raw: AgentOutput): string {
    if (typeof raw === "string") return raw
    const { output } = parseTaskResult(raw)
    return output.result ? `${output.summary}\n\n${output.result}` : output.summary
}
