import type { CostBreakdown, CostSummary, TokenUsage } from "../types.js"
import { log } from "./Logger.js"

export interface ModelPricing {
    inputPerMillion: number
    outputPerMillion: number
}

const FALLBACK_PRICING: ModelPricing = {
    inputPerMillion: 2.5,
    outputPerMillion: 10,
}

/** USD per million tokens. Longest prefix wins for dated model ids. */
const PRICE_TABLE: Record<string, ModelPricing> = {
    "gpt-4o": { inputPerMillion: 2.5, outputPerMillion: 10 },
    "gpt-4o-mini": { inputPerMillion: 0.15, outputPerMillion: 0.6 },
    "gpt-4.1": { inputPerMillion: 2, outputPerMillion: 8 },
    "gpt-4.1-mini": { inputPerMillion: 0.4, outputPerMillion: 1.6 },
    "claude-sonnet-4-20250514": { inputPerMillion: 3, outputPerMillion: 15 },
    "claude-3-5-haiku": { inputPerMillion: 0.8, outputPerMillion: 4 },
}

export function getModelPricing(model: string): ModelPricing {
    const exact = PRICE_TABLE[model]
    if (exact) return exact

    const prefix = Object.keys(PRICE_TABLE)
        .filter((key) => model.startsWith(key))
        .sort((a, b) => b.length - a.length)[0]
    const byPrefix = prefix === undefined ? undefined : PRICE_TABLE[prefix]
    if (byPrefix) return byPrefix

    log.llm("No price entry for %s, using fallback pricing", model)
    return FALLBACK_PRICING
}

export function calculateCost(model: string, usage: TokenUsage): CostBreakdown {
    const pricing = getModelPricing(model)
    const inputCost = (usage.promptTokens / 1_000_000) * pricing.inputPerMillion
    const outputCost =
        (usage.completionTokens / 1_000_000) * pricing.outputPerMillion
    return { inputCost, outputCost, totalCost: inputCost + outputCost }
}

export function formatCost(cost: number): string {
    return cost < 0.01 ? `$${cost.toFixed(4)}` : `$${cost.toFixed(2)}`
}

function emptyUsage(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

function emptyCost(): CostBreakdown {
    return { inputCost: 0, outputCost: 0, totalCost: 0 }
}

function addUsage(into: TokenUsage, usage: TokenUsage): void {
    into.promptTokens += usage.promptTokens
    into.completionTokens += usage.completionTokens
    into.totalTokens += usage.totalTokens
}

function addCost(into: CostBreakdown, cost: CostBreakdown): void {
    into.inputCost += cost.inputCost
    into.outputCost += cost.outputCost
    into.totalCost += cost.totalCost
}

/** Running totals of oracle usage, per model and overall. */
export class CostLedger {
    private summary: CostSummary = {
        totalCost: emptyCost(),
        totalTokens: emptyUsage(),
        calls: 0,
        byModel: {},
    }

    public record(model: string, usage: TokenUsage): CostSummary {
        const cost = calculateCost(model, usage)
        const entry = this.summary.byModel[model] ?? {
            cost: emptyCost(),
            tokenUsage: emptyUsage(),
        }
        addCost(entry.cost, cost)
        addUsage(entry.tokenUsage, usage)
        this.summary.byModel[model] = entry

        addCost(this.summary.totalCost, cost)
        addUsage(this.summary.totalTokens, usage)
        this.summary.calls++
        return this.snapshot()
    }

    public snapshot(): CostSummary {
        return structuredClone(this.summary)
    }
}
