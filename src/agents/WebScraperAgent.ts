import { ToolExecutionError } from "../core/errors.js"
import { extractJsonObject } from "../core/json.js"
import { log } from "../core/Logger.js"
import { toSnakeCase } from "../core/naming.js"
import type { AgentMetadata, StructuredRecord } from "../types.js"
import { BaseAgent, type AgentDependencies } from "./BaseAgent.js"
import {
    buildExtractionSchemaPrompt,
    buildScrapePlanPrompt,
    buildUrlPrompt,
} from "./prompts.js"

export const WEB_SCRAPER_METADATA: AgentMetadata = {
    description: "Specializes in web scraping and information extraction",
    capabilities: [
        "web scraping",
        "html parsing",
        "data extraction",
        "content analysis",
        "landing page creation",
    ],
}

const DEFAULT_SCHEMA: Record<string, string> = {
    title: "Main title or heading of the page",
    description: "Main description or summary",
    content: "Primary content of interest",
    key_points: "Important points or highlights",
}

const URL_PATTERN = /https?:\/\/[^\s"'<>)]+/i
const PAGE_KEYWORDS = ["landing page", "webpage", "website"]

export class WebScraperAgent extends BaseAgent {
    constructor(deps: AgentDependencies) {
        super("web_scraper_agent", WEB_SCRAPER_METADATA, deps)
        this.registerTool("web_fetch")
        this.registerTool("data_extract")
        this.registerTool("html_render")
    }

    public think(task: string): Promise<string> {
        return this.oracle.complete(buildScrapePlanPrompt(task))
    }

    /**
     * Fetches the URL named in the task and extracts what the task asks
     * for. Tasks that mention a landing page also get a rendered HTML
     * artifact.
     */
    public async act(task: string): Promise<StructuredRecord> {
        const plan = await this.think(task)
        log.agent("Scrape plan: %s", plan.slice(0, 120))

        const url = await this.findUrl(task)
        const page = await this.useTool("web_fetch", { url })
        const text =
            typeof page.data?.text === "string" ? page.data.text : page.content

        const schemaReply = await this.oracle.complete(
            buildExtractionSchemaPrompt(task)
        )
        const schema = extractJsonObject(schemaReply) ?? DEFAULT_SCHEMA
        const extraction = await this.useTool("data_extract", {
            text,
            schema,
            useModel: true,
        })
        const extracted = extraction.data ?? {}

        const lower = task.toLowerCase()
        if (!PAGE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
            return {
                output: {
                    summary: `Extracted information from ${url}`,
                    result: JSON.stringify(extracted, null, 2),
                },
                extracted_data: extracted,
            }
        }

        const html = await this.useTool("html_render", {
            data: extracted,
            theme: lower.includes("dark") ? "dark" : "light",
        })
        const title =
            typeof extracted.title === "string" ? extracted.title : ""
        const filename = `${toSnakeCase(title) || "landing_page"}.html`
        return {
            output: {
                summary: `Created a landing page from ${url}`,
                result: `Landing page written to ${filename}`,
            },
            extracted_data: extracted,
            artifacts: [
                {
                    name: "Landing Page",
                    description: `Created from data scraped from ${url}`,
                    filename,
                    content: html.content,
                },
            ],
        }
    }

    private async findUrl(task: string): Promise<string> {
        const inline = URL_PATTERN.exec(task)?.[0]
        if (inline) return inline.replace(/[.,;]+$/, "")
        const reply = (await this.oracle.complete(buildUrlPrompt(task))).trim()
        const url = URL_PATTERN.exec(reply)?.[0]
        if (!url) {
            throw new ToolExecutionError(
                "web_fetch",
                "No valid URL found in the task"
            )
        }
        return url
    }
}
