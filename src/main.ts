#!/usr/bin/env node

import { Command } from "commander"

import { type CliCommand, executeCommand } from "./cli/commands.js"
import { type CliFlags, resolveConfig } from "./cli/config.js"
import { formatCostLine } from "./cli/format.js"
import { runInteractiveLoop } from "./cli/interactive.js"
import { errorMessage } from "./core/errors.js"
import { log } from "./core/Logger.js"
import { Orchestrator } from "./orchestrator/Orchestrator.js"

type GlobalOptions = Omit<CliFlags, "maxIterations">

async function withOrchestrator(
    flags: CliFlags,
    run: (orchestrator: Orchestrator) => Promise<void>
): Promise<void> {
    const config = await resolveConfig(flags, process.cwd())
    const orchestrator = new Orchestrator(config)
    try {
        await run(orchestrator)
    } finally {
        orchestrator.dispose()
    }
    const costs = orchestrator.getCostSummary()
    if (costs.calls > 0) console.error(formatCostLine(costs))
}

function runOnce(flags: CliFlags, command: CliCommand): Promise<void> {
    return withOrchestrator(flags, async (orchestrator) => {
        console.log(await executeCommand(orchestrator, command))
    })
}

function parseCount(value: string): number {
    return Number.parseInt(value, 10)
}

const program = new Command()

program
    .name("taskweave")
    .description("Plan goals into agent workflows, route tasks and iterate on feedback")
    .version("0.1.0")
    .option("--provider <provider>", "LLM provider (openai or anthropic)")
    .option("--model <model>", "Model name")
    .option("--renderer <type>", "Output renderer (terminal, log, none)")
    .option("--verbose", "Include oracle calls in the output")

const workflow = program.command("workflow").description("Create, revise and inspect workflows")

workflow
    .command("create")
    .description("Plan a goal into tasks, bind agents and execute")
    .argument("<goal...>", "What the workflow should achieve")
    .option("--name <name>", "Workflow name (defaults to the first words of the goal)")
    .option("--max-iterations <n>", "Maximum tasks to run", parseCount)
    .action(async (goal: string[], options: { name?: string; maxIterations?: number }, cmd: Command) => {
        const flags: CliFlags = { ...cmd.optsWithGlobals<GlobalOptions>(), maxIterations: options.maxIterations }
        await runOnce(flags, {
            kind: "create",
            goal: goal.join(" "),
            name: options.name,
            maxIterations: options.maxIterations,
        })
    })

workflow
    .command("feedback")
    .description("Revise a workflow from feedback and re-run affected tasks")
    .argument("<id>", "Workflow id")
    .argument("<text...>", "Feedback")
    .action(async (workflowId: string, text: string[], _options: unknown, cmd: Command) => {
        await runOnce(cmd.optsWithGlobals<GlobalOptions>(), {
            kind: "feedback",
            workflowId,
            text: text.join(" "),
        })
    })

workflow
    .command("list")
    .description("List stored workflows, newest first")
    .action(async (_options: unknown, cmd: Command) => {
        await runOnce(cmd.optsWithGlobals<GlobalOptions>(), { kind: "list" })
    })

workflow
    .command("open")
    .description("Show a workflow's summary")
    .argument("<id>", "Workflow id")
    .action(async (workflowId: string, _options: unknown, cmd: Command) => {
        await runOnce(cmd.optsWithGlobals<GlobalOptions>(), { kind: "open", workflowId })
    })

program
    .command("route")
    .description("Send a single task to the best agent")
    .argument("<task...>", "Task to route")
    .action(async (task: string[], _options: unknown, cmd: Command) => {
        await runOnce(cmd.optsWithGlobals<GlobalOptions>(), {
            kind: "route",
            task: task.join(" "),
        })
    })

program
    .command("interactive", { isDefault: true })
    .description("Read commands from stdin (default)")
    .action(async (_options: unknown, cmd: Command) => {
        const flags = cmd.optsWithGlobals<GlobalOptions>()
        // Line output by default under the prompt.
        await withOrchestrator({ ...flags, renderer: flags.renderer ?? "log" }, (orchestrator) =>
            runInteractiveLoop((command) => executeCommand(orchestrator, command))
        )
    })

program.parseAsync().catch((error: unknown) => {
    log.app("Fatal: %O", error)
    console.error(`Error: ${errorMessage(error)}`)
    process.exitCode = 1
})
