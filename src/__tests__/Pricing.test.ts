import { describe, expect, it } from "vitest"

import {
    calculateCost,
    CostLedger,
    formatCost,
    getModelPricing,
} from "../core/Pricing.js"
import type { TokenUsage } from "../types.js"

function usage(promptTokens: number, completionTokens: number): TokenUsage {
    return {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
    }
}

describe("Pricing", () => {
    describe("getModelPricing", () => {
        it("should return exact pricing for known models", () => {
            expect(getModelPricing("gpt-4o-mini")).toEqual({
                inputPerMillion: 0.15,
                outputPerMillion: 0.6,
            })
        })

        it("should use the longest matching prefix for dated model ids", () => {
            expect(getModelPricing("gpt-4o-mini-2024-07-18").inputPerMillion).toBe(0.15)
            expect(getModelPricing("gpt-4o-2024-08-06").inputPerMillion).toBe(2.5)
            expect(getModelPricing("claude-3-5-haiku-20241022").outputPerMillion).toBe(4)
        })

        it("should fall back for unknown models", () => {
            expect(getModelPricing("local-llama")).toEqual({
                inputPerMillion: 2.5,
                outputPerMillion: 10,
            })
        })
    })

    describe("calculateCost", () => {
        it("should price input and output tokens separately", () => {
            const cost = calculateCost("gpt-4o", usage(1_000_000, 100_000))
            expect(cost.inputCost).toBe(2.5)
            expect(cost.outputCost).toBe(1)
            expect(cost.totalCost).toBe(3.5)
        })

        it("should handle zero tokens", () => {
            expect(calculateCost("gpt-4.1", usage(0, 0)).totalCost).toBe(0)
        })
    })

    describe("formatCost", () => {
        it("should show four decimals below a cent", () => {
            expect(formatCost(0.0025)).toBe("$0.0025")
            expect(formatCost(0)).toBe("$0.0000")
        })

        it("should show two decimals from a cent up", () => {
            expect(formatCost(0.01)).toBe("$0.01")
            expect(formatCost(1.5)).toBe("$1.50")
        })
    })

    describe("CostLedger", () => {
        it("should total usage per model and overall", () => {
            const ledger = new CostLedger()
            ledger.record("gpt-4o-mini", usage(1_000_000, 1_000_000))
            const summary = ledger.record("gpt-4o", usage(1_000_000, 0))

            expect(summary.calls).toBe(2)
            expect(summary.totalTokens).toEqual(usage(2_000_000, 1_000_000))
            expect(summary.totalCost.totalCost).toBeCloseTo(3.25)
            expect(summary.byModel["gpt-4o-mini"]?.cost.totalCost).toBeCloseTo(0.75)
            expect(summary.byModel["gpt-4o"]?.tokenUsage.promptTokens).toBe(1_000_000)
        })

        it("should hand out snapshots that do not alias the ledger", () => {
            const ledger = new CostLedger()
            const first = ledger.record("gpt-4o", usage(10, 10))
            first.calls = 99
            expect(ledger.snapshot().calls).toBe(1)
        })
    })
})
