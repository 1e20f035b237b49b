import { createInterface } from "node:readline/promises"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { CliCommand } from "./commands.js"

const PROMPT = "taskweave> "

export const HELP_TEXT = [
    "Commands:",
    "  workflow create <goal>",
    "  workflow feedback <id> <text>",
    "  workflow list",
    "  workflow open <id>",
    "  route <task>",
    "  help | quit | exit",
    "Anything else is routed to an agent.",
].join("\n")

export type InteractiveCommand =
    | CliCommand
    | { kind: "quit" }
    | { kind: "help" }
    | { kind: "invalid"; message: string }

export function parseInteractiveCommand(line: string): InteractiveCommand {
    const trimmed = line.trim()
    const lowered = trimmed.toLowerCase()
    if (!trimmed || lowered === "quit" || lowered === "exit") return { kind: "quit" }
    if (lowered === "help") return { kind: "help" }

    const [head = "", ...rest] = trimmed.split(/\s+/)
    if (head.toLowerCase() === "route") {
        const task = rest.join(" ")
        return task ? { kind: "route", task } : { kind: "invalid", message: "Usage: route <task>" }
    }
    if (head.toLowerCase() !== "workflow") return { kind: "route", task: trimmed }

    const [sub = "", ...args] = rest
    switch (sub.toLowerCase()) {
        case "create":
            return args.length > 0
                ? { kind: "create", goal: args.join(" ") }
                : { kind: "invalid", message: "Usage: workflow create <goal>" }
        case "feedback": {
            const [workflowId, ...text] = args
            return workflowId && text.length > 0
                ? { kind: "feedback", workflowId, text: text.join(" ") }
                : { kind: "invalid", message: "Usage: workflow feedback <id> <text>" }
        }
        case "list":
            return { kind: "list" }
        case "open":
            return args[0]
                ? { kind: "open", workflowId: args[0] }
                : { kind: "invalid", message: "Usage: workflow open <id>" }
        default:
            return { kind: "invalid", message: `Unknown workflow command: ${sub || "(none)"}` }
    }
}

export interface InteractiveIO {
    input?: NodeJS.ReadableStream
    output?: NodeJS.WritableStream
}

/**
 * Reads commands until empty input, quit, exit or end of input. A failing
 * command prints its error and the loop goes on.
 */
export async function runInteractiveLoop(
    handle: (command: CliCommand) => Promise<string>,
    io: InteractiveIO = {}
): Promise<void> {
    const output = io.output ?? process.stdout
    const rl = createInterface({
        input: io.input ?? process.stdin,
        output,
        terminal: false,
    })
    const write = (text: string): void => {
        output.write(`${text}\n`)
    }

    write("taskweave interactive mode. Type help for commands.")
    rl.setPrompt(PROMPT)
    rl.prompt()
    try {
        for await (const line of rl) {
            const command = parseInteractiveCommand(line)
            if (command.kind === "quit") break
            if (command.kind === "help") {
                write(HELP_TEXT)
            } else if (command.kind === "invalid") {
                write(command.message)
            } else {
                try {
                    write(await handle(command))
                } catch (error) {
                    log.app("Command failed: %s", errorMessage(error))
                    write(`Error: ${errorMessage(error)}`)
                }
            }
            rl.prompt()
        }
    } finally {
        rl.close()
    }
}
