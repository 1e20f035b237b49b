import { appendFile, mkdir, readdir, readFile, writeFile } from "node:fs/promises"
import { dirname, isAbsolute, relative, resolve } from "node:path"

import { errorMessage, toError, ToolExecutionError } from "../core/errors.js"
import { extractJsonObject, isRecord, type JsonRecord } from "../core/json.js"
import { log } from "../core/Logger.js"
import type {
    ToolContext,
    ToolDefinition,
    ToolExecutionResult,
} from "../types.js"
import {
    extractTitle,
    fillTemplate,
    isPageTheme,
    renderPage,
    selectElements,
    stripTags,
} from "./html.js"

const MAX_TOOL_OUTPUT = 30_000
const MAX_EXTRACT_INPUT = 10_000
const DEFAULT_TIMEOUT_MS = 30_000

function truncateOutput(output: string): string {
    if (output.length <= MAX_TOOL_OUTPUT) return output
    const omitted = output.length - MAX_TOOL_OUTPUT
    return `${output.slice(0, MAX_TOOL_OUTPUT)}\n\n[… truncated ${omitted} characters …]`
}

function argString(args: Record<string, unknown>, key: string): string {
    const value = args[key]
    return typeof value === "string" ? value : ""
}

function argRecord(args: Record<string, unknown>, key: string): JsonRecord {
    const value = args[key]
    return isRecord(value) ? value : {}
}

function argNumber(
    args: Record<string, unknown>,
    key: string,
    fallback: number
): number {
    const value = args[key]
    return typeof value === "number" && value > 0 ? value : fallback
}

/** Absolute path under the working directory, or null when it escapes. */
function resolveInside(context: ToolContext, path: string): string | null {
    const basePath = resolve(context.workingDirectory)
    const target = resolve(basePath, path || ".")
    const rel = relative(basePath, target)
    if (rel.startsWith("..") || isAbsolute(rel)) return null
    return target
}

export const filesystemTool: ToolDefinition = {
    name: "filesystem",
    description:
        "Read, write, append to or list files under the working directory.",
    parameters: {
        type: "object",
        properties: {
            operation: {
                type: "string",
                enum: ["read", "write", "append", "list"],
            },
            path: {
                type: "string",
                description: "Path relative to the working directory",
            },
            content: {
                type: "string",
                description: "Content for write and append",
            },
        },
        required: ["operation", "path"],
    },
    execute: async (args, context): Promise<ToolExecutionResult> => {
        const operation = argString(args, "operation")
        const path = argString(args, "path")
        const target = resolveInside(context, path)
        if (!target) {
            return {
                content: "Path must stay under the working directory.",
                isError: true,
            }
        }
        try {
            switch (operation) {
                case "read": {
                    const content = await readFile(target, "utf-8")
                    return { content: truncateOutput(content), isError: false }
                }
                case "write":
                case "append": {
                    await mkdir(dirname(target), { recursive: true })
                    const content = argString(args, "content")
                    if (operation === "write") {
                        await writeFile(target, content, "utf-8")
                    } else {
                        await appendFile(target, content, "utf-8")
                    }
                    return {
                        content: `Wrote ${content.length} characters to ${path}`,
                        isError: false,
                        data: { path },
                    }
                }
                case "list": {
                    const entries = await readdir(target, {
                        withFileTypes: true,
                    })
                    const names = entries
                        .map((e) => (e.isDirectory() ? `${e.name}/` : e.name))
                        .sort()
                    return {
                        content: names.join("\n") || "(empty)",
                        isError: false,
                        data: { files: names },
                    }
                }
                default:
                    return {
                        content: `Unknown operation: ${operation}`,
                        isError: true,
                    }
            }
        } catch (error) {
            throw new ToolExecutionError(
                "filesystem",
                `${operation} ${path} failed: ${errorMessage(error)}`,
                toError(error)
            )
        }
    },
}

export const webFetchTool: ToolDefinition = {
    name: "web_fetch",
    description:
        "Fetch a web page and return its title and text content, optionally restricted to elements matching a tag, #id or .class selector.",
    parameters: {
        type: "object",
        properties: {
            url: { type: "string", description: "Absolute http(s) URL" },
            selector: {
                type: "string",
                description: "Optional tag, #id or .class selector",
            },
            timeoutMs: { type: "number" },
        },
        required: ["url"],
    },
    execute: async (args): Promise<ToolExecutionResult> => {
        const url = argString(args, "url")
        if (!/^https?:\/\//i.test(url)) {
            return { content: `Not an http(s) URL: ${url}`, isError: true }
        }
        const selector = argString(args, "selector")
        const timeout = argNumber(args, "timeoutMs", DEFAULT_TIMEOUT_MS)

        let response: Response
        let body: string
        try {
            log.tool("GET %s", url)
            response = await fetch(url, {
                headers: { "User-Agent": "taskweave/0.1" },
                signal: AbortSignal.timeout(timeout),
            })
            body = await response.text()
        } catch (error) {
            throw new ToolExecutionError(
                "web_fetch",
                `Fetching ${url} failed: ${errorMessage(error)}`,
                toError(error)
            )
        }
        if (!response.ok) {
            return {
                content: `GET ${url} returned ${response.status}`,
                isError: true,
                data: { statusCode: response.status, url },
            }
        }

        const contentType = response.headers.get("content-type") ?? ""
        const title = extractTitle(body)
        const selected = selector
            ? selectElements(body, selector).map(stripTags)
            : null
        const text = selected ? selected.join("\n\n") : stripTags(body)
        return {
            content: truncateOutput(text),
            isError: false,
            data: {
                statusCode: response.status,
                url,
                contentType,
                title,
                text,
                ...(selected ? { selected } : {}),
            },
        }
    },
}

export const htmlRenderTool: ToolDefinition = {
    name: "html_render",
    description:
        "Render structured data as HTML, either into a template with {key} placeholders or as a default landing page.",
    parameters: {
        type: "object",
        properties: {
            data: { type: "object", description: "Values to render" },
            template: {
                type: "string",
                description: "Optional template with {key} placeholders",
            },
            theme: { type: "string", enum: ["light", "dark"] },
        },
        required: ["data"],
    },
    execute: async (args): Promise<ToolExecutionResult> => {
        const data = argRecord(args, "data")
        const template = argString(args, "template")
        const theme = isPageTheme(args.theme) ? args.theme : "light"
        const html = template
            ? fillTemplate(template, data)
            : renderPage(data, theme)
        return { content: html, isError: false }
    },
}

export const dataExtractTool: ToolDefinition = {
    name: "data_extract",
    description:
        "Extract structured data from text, either with a regex per key or by asking the model to fill a schema.",
    parameters: {
        type: "object",
        properties: {
            text: { type: "string" },
            schema: {
                type: "object",
                description:
                    "Key to regex (pattern mode) or key to description (model mode)",
            },
            useModel: { type: "boolean" },
        },
        required: ["text"],
    },
    execute: async (args, context): Promise<ToolExecutionResult> => {
        const text = argString(args, "text")
        const schema = argRecord(args, "schema")
        let data: JsonRecord

        if (args.useModel === true) {
            if (!context.oracle) {
                return {
                    content: "Model extraction needs an oracle in the tool context.",
                    isError: true,
                }
            }
            const wanted = Object.keys(schema).length
                ? JSON.stringify(schema, null, 2)
                : "Extract all key entities, facts and relationships."
            const reply = await context.oracle.complete(
                [
                    "Extract structured information from the following text according to these requirements:",
                    wanted,
                    "TEXT:",
                    text.slice(0, MAX_EXTRACT_INPUT),
                    "Return ONLY a valid JSON object with the extracted information.",
                ].join("\n\n")
            )
            data = extractJsonObject(reply) ?? { raw_extraction: reply }
        } else {
            data = extractWithPatterns(text, schema)
        }
        return { content: JSON.stringify(data, null, 2), isError: false, data }
    },
}

/** All matches per key; the first capture group when the pattern has one. */
export function extractWithPatterns(
    text: string,
    schema: JsonRecord
): Record<string, string[]> {
    const result: Record<string, string[]> = {}
    for (const [key, pattern] of Object.entries(schema)) {
        if (typeof pattern !== "string") continue
        let regex: RegExp
        try {
            regex = new RegExp(pattern, "g")
        } catch (error) {
            throw new ToolExecutionError(
                "data_extract",
                `Invalid pattern for ${key}: ${errorMessage(error)}`,
                toError(error)
            )
        }
        result[key] = [...text.matchAll(regex)].map(
            (match) => match[1] ?? match[0]
        )
    }
    return result
}

export interface ApiToolOptions {
    baseUrl: string
    apiKey?: string
    timeoutMs?: number
}

export function createApiTool(options: ApiToolOptions): ToolDefinition {
    return {
        name: "api",
        description: `GET a JSON endpoint under ${options.baseUrl}.`,
        parameters: {
            type: "object",
            properties: {
                endpoint: {
                    type: "string",
                    description: "Path appended to the base URL",
                },
                params: {
                    type: "object",
                    description: "Query string parameters",
                },
            },
            required: ["endpoint"],
        },
        execute: async (args): Promise<ToolExecutionResult> => {
            const url = new URL(options.baseUrl + argString(args, "endpoint"))
            for (const [key, value] of Object.entries(argRecord(args, "params"))) {
                url.searchParams.set(key, String(value))
            }
            const headers: Record<string, string> = {
                Accept: "application/json",
            }
            if (options.apiKey) {
                headers.Authorization = `Bearer ${options.apiKey}`
            }

            let status: number
            let payload: unknown
            try {
                const response = await fetch(url, {
                    headers,
                    signal: AbortSignal.timeout(
                        options.timeoutMs ?? DEFAULT_TIMEOUT_MS
                    ),
                })
                status = response.status
                if (!response.ok) {
                    return {
                        content: `GET ${url.pathname} returned ${status}`,
                        isError: true,
                        data: { statusCode: status },
                    }
                }
                payload = await response.json()
            } catch (error) {
                throw new ToolExecutionError(
                    "api",
                    `GET ${url.pathname} failed: ${errorMessage(error)}`,
                    toError(error)
                )
            }
            return {
                content: truncateOutput(JSON.stringify(payload, null, 2)),
                isError: false,
                data: { statusCode: status, body: payload },
            }
        },
    }
}

export const BUILTIN_TOOLS: ToolDefinition[] = [
    filesystemTool,
    webFetchTool,
    htmlRenderTool,
    dataExtractTool,
]
