import { writeFile } from "node:fs/promises"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { resolveConfig } from "../cli/config.js"
import {
    dataPathOf,
    getDefaultModel,
    loadEnvFile,
    loadRcConfig,
    parseRcConfig,
    RC_FILENAME,
    selectProvider,
    workspacePathOf,
} from "../core/Config.js"
import { ConfigError } from "../core/errors.js"
import { makeTempDir, removeTempDir } from "./helpers/mockOracle.js"

describe("Config", () => {
    let dir: string

    beforeEach(async () => {
        dir = await makeTempDir("config")
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    describe("parseRcConfig", () => {
        it("should keep only well-typed known fields", () => {
            expect(
                parseRcConfig(
                    {
                        model: "gpt-4.1",
                        maxIterations: 5,
                        verbose: "yes",
                        provider: "mistral",
                        renderer: "log",
                        unknown: 1,
                    },
                    "rc"
                )
            ).toEqual({ model: "gpt-4.1", maxIterations: 5, renderer: "log" })
        })

        it("should reject a document that is not an object", () => {
            expect(() => parseRcConfig([], "rc")).toThrow(
                new ConfigError("rc must contain a JSON object")
            )
        })
    })

    describe("loadRcConfig", () => {
        it("should return an empty config when the file is missing", async () => {
            expect(await loadRcConfig(dir)).toEqual({})
        })

        it("should raise ConfigError on invalid JSON", async () => {
            await writeFile(join(dir, RC_FILENAME), "{oops", "utf-8")
            await expect(loadRcConfig(dir)).rejects.toThrow(ConfigError)
            await expect(loadRcConfig(dir)).rejects.toThrow(
                `Invalid JSON in ${join(dir, RC_FILENAME)}`
            )
        })
    })

    describe("loadEnvFile", () => {
        it("should fill unset variables without overriding set ones", async () => {
            await writeFile(
                join(dir, ".env"),
                [
                    'export OPENAI_API_KEY="test-secret"',
                    "# comment",
                    "TASKWEAVE_BASE_URL=http://localhost:8080/v1",
                    "ANTHROPIC_API_KEY=from-file",
                    "NOEQUALS",
                ].join("\n"),
                "utf-8"
            )
            const env: NodeJS.ProcessEnv = { ANTHROPIC_API_KEY: "from-env" }
            await loadEnvFile(dir, env)
            expect(env).toEqual({
                OPENAI_API_KEY: "test-secret",
                TASKWEAVE_BASE_URL: "http://localhost:8080/v1",
                ANTHROPIC_API_KEY: "from-env",
            })
        })
    })

    describe("provider and paths", () => {
        it("should prefer an explicit provider, then the one with a key", () => {
            expect(selectProvider({ workingDirectory: dir })).toBe("openai")
            expect(selectProvider({ workingDirectory: dir, anthropicApiKey: "k" })).toBe(
                "anthropic"
            )
            expect(
                selectProvider({ workingDirectory: dir, provider: "anthropic", openaiApiKey: "k" })
            ).toBe("anthropic")
        })

        it("should apply model overrides to the provider default", () => {
            expect(getDefaultModel("anthropic", { model: "claude-3-5-haiku" })).toEqual({
                provider: "anthropic",
                model: "claude-3-5-haiku",
                temperature: 0.2,
                maxTokens: 4096,
            })
        })

        it("should place workspace and data under the working directory", () => {
            expect(workspacePathOf({ workingDirectory: "/w" })).toBe(join("/w", "workspace"))
            expect(dataPathOf({ workingDirectory: "/w" })).toBe(join("/w", ".taskweave"))
            expect(dataPathOf({ workingDirectory: "/w", dataPath: "/data" })).toBe("/data")
        })
    })

    describe("resolveConfig", () => {
        it("should layer flags over environment over rc file", async () => {
            await writeFile(
                join(dir, RC_FILENAME),
                JSON.stringify({
                    model: "rc-model",
                    openaiApiKey: "rc-key",
                    renderer: "none",
                    maxIterations: 4,
                }),
                "utf-8"
            )
            await writeFile(join(dir, ".env"), "OPENAI_API_KEY=env-file-key\n", "utf-8")

            const config = await resolveConfig({ model: "flag-model" }, dir, {})
            expect(config).toMatchObject({
                workingDirectory: dir,
                openaiApiKey: "env-file-key",
                model: "flag-model",
                renderer: "none",
                maxIterations: 4,
                verbose: false,
            })
        })

        it("should reject unknown providers and renderers", async () => {
            await expect(resolveConfig({ provider: "mistral" }, dir, {})).rejects.toThrow(
                'Unknown provider "mistral" (expected openai or anthropic)'
            )
            await expect(resolveConfig({ renderer: "fancy" }, dir, {})).rejects.toThrow(
                ConfigError
            )
        })
    })
})
