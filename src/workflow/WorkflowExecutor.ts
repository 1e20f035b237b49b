import { mkdir, writeFile } from "node:fs/promises"
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path"

import type { AgentRegistry } from "../agents/AgentRegistry.js"
import type { AgentResolver } from "../agents/AgentResolver.js"
import { DEFAULT_MAX_ITERATIONS } from "../core/Config.js"
import {
    AgentResolutionError,
    ArtifactWriteError,
    errorMessage,
    TaskExecutionError,
    toError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { sameRole } from "../core/naming.js"
import type { EventBus } from "../events/EventBus.js"
import type { WorkflowStore } from "../persistence/WorkflowStore.js"
import type {
    AgentOutput,
    ArtifactDraft,
    HistoryStatus,
    TaskStatus,
    Workflow,
    WorkflowSummary,
    WorkflowTask,
} from "../types.js"
import { parseTaskResult } from "./ResultParser.js"
import { buildTaskPrompt } from "./prompts.js"

const RESERVED_FILENAMES = new Set(["workflow.json", "workflow_summary.json"])

export interface ExecuteOptions {
    maxIterations?: number
}

export interface WorkflowExecutorOptions {
    store: WorkflowStore
    resolver: AgentResolver
    registry: AgentRegistry
    eventBus?: EventBus
}

/**
 * Runs a planned workflow's tasks one at a time in sequence order. Each
 * task's failure is recorded on the task; the run itself only fails on
 * persistence errors.
 */
export class WorkflowExecutor {
    private readonly store: WorkflowStore
    private readonly resolver: AgentResolver
    private readonly registry: AgentRegistry
    private readonly eventBus: EventBus | undefined

    constructor(options: WorkflowExecutorOptions) {
        this.store = options.store
        this.resolver = options.resolver
        this.registry = options.registry
        this.eventBus = options.eventBus
    }

    public async execute(
        workflow: Workflow,
        options: ExecuteOptions = {}
    ): Promise<WorkflowSummary> {
        const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
        const startedAt = Date.now()
        const taskById = new Map(workflow.tasks.map((t) => [t.id, t]))

        if (workflow.status !== "feedback_execution") {
            workflow.status = "execution"
        }
        await this.store.save(workflow)
        this.eventBus?.emit({
            type: "workflow:start",
            workflowId: workflow.id,
            name: workflow.name,
            taskIds: [...workflow.workflowSequence],
        })

        let iterations = 0
        for (const [index, taskId] of workflow.workflowSequence.entries()) {
            const task = taskById.get(taskId)
            if (!task) {
                log.executor("Sequence names unknown task %s", taskId)
                continue
            }
            if (task.status === "completed") continue

            if (iterations >= maxIterations) {
                const remaining = workflow.workflowSequence
                    .slice(index)
                    .filter((id) => taskById.get(id)?.status !== "completed")
                log.executor(
                    "Iteration limit %d reached with %d tasks left",
                    maxIterations,
                    remaining.length
                )
                this.eventBus?.emit({
                    type: "executor:iteration_limit",
                    workflowId: workflow.id,
                    maxIterations,
                    remaining,
                })
                break
            }
            iterations++
            await this.runTask(workflow, task, taskById)
        }

        workflow.status = workflow.tasks.every((t) => t.status === "completed")
            ? "completed"
            : "partial"
        await this.store.save(workflow)
        const summary = buildWorkflowSummary(workflow)
        await this.store.saveSummary(summary)

        this.eventBus?.emit({
            type: "workflow:complete",
            workflowId: workflow.id,
            status: workflow.status,
            duration: Date.now() - startedAt,
        })
        log.executor("Workflow %s finished: %s", workflow.id, workflow.status)
        return summary
    }

    private async runTask(
        workflow: Workflow,
        task: WorkflowTask,
        taskById: Map<string, WorkflowTask>
    ): Promise<void> {
        const missing = task.dependsOn.filter(
            (dep) => taskById.get(dep)?.status !== "completed"
        )
        if (missing.length > 0) {
            task.status = "skipped"
            this.recordHistory(
                workflow,
                task,
                null,
                "skipped",
                `Unmet dependencies: ${missing.join(", ")}`
            )
            this.eventBus?.emit({
                type: "task:skipped",
                workflowId: workflow.id,
                taskId: task.id,
                missing,
            })
            await this.store.save(workflow)
            return
        }

        const startedAt = Date.now()
        let agentName: string | null = null
        let succeeded = false
        try {
            const binding = workflow.agents.find((b) =>
                sameRole(b.role, task.assignedTo)
            )
            if (!binding) {
                throw new AgentResolutionError(
                    task.assignedTo,
                    `No agent is bound to role "${task.assignedTo}"`
                )
            }
            agentName = binding.name
            const agent = await this.resolver.getAgentInstance(binding.name)
            if (!agent) {
                throw new AgentResolutionError(
                    binding.name,
                    `Agent ${binding.name} could not be instantiated`
                )
            }

            log.executor("Running %s with %s", task.id, agent.name)
            this.eventBus?.emit({
                type: "task:start",
                workflowId: workflow.id,
                taskId: task.id,
                name: task.name || task.id,
                agentName: agent.name,
            })

            const prompt = buildTaskPrompt(task, {
                agentName: agent.name,
                workspace: workflow.workspace,
                memory: workflow.memory,
                artifacts: workflow.artifacts,
            })
            const raw: AgentOutput = agent.act
                ? await agent.act(prompt)
                : (await agent.generateFinalResponse(prompt)).text

            const result = parseTaskResult(raw)
            workflow.memory[task.id] = result.output
            for (const draft of result.artifacts) {
                await this.writeArtifact(workflow, task, agent.name, draft)
            }

            task.status = "completed"
            succeeded = true
            this.recordHistory(
                workflow,
                task,
                agentName,
                "completed",
                result.output.summary
            )
            this.eventBus?.emit({
                type: "task:complete",
                workflowId: workflow.id,
                taskId: task.id,
                summary: result.output.summary,
                duration: Date.now() - startedAt,
            })
        } catch (error) {
            const failure =
                error instanceof TaskExecutionError
                    ? error
                    : new TaskExecutionError(
                          task.id,
                          `Task ${task.id} failed: ${errorMessage(error)}`,
                          toError(error)
                      )
            log.executor("%s", failure.message)
            task.status = "failed"
            this.recordHistory(workflow, task, agentName, "failed", failure.message)
            this.eventBus?.emit({
                type: "task:failed",
                workflowId: workflow.id,
                taskId: task.id,
                error: failure.message,
            })
        }

        if (agentName) await this.recordStats(agentName, succeeded)
        await this.store.save(workflow)
    }

    /**
     * Writes an artifact inside the workflow workspace and records it,
     * replacing any earlier record for the same file.
     */
    private async writeArtifact(
        workflow: Workflow,
        task: WorkflowTask,
        agentName: string,
        draft: ArtifactDraft
    ): Promise<void> {
        const requested = draft.filename.trim()
        if (!requested) {
            log.executor("Dropping artifact without a filename from %s", task.id)
            return
        }
        if (isAbsolute(requested)) {
            throw new ArtifactWriteError(
                requested,
                `Artifact path must be relative: ${requested}`
            )
        }
        const root = resolve(workflow.workspace)
        const target = resolve(root, requested)
        const rel = relative(root, target)
        if (!rel || rel.startsWith("..") || isAbsolute(rel)) {
            throw new ArtifactWriteError(
                requested,
                `Artifact path escapes the workspace: ${requested}`
            )
        }
        const filename = rel.split(sep).join("/")
        if (RESERVED_FILENAMES.has(filename)) {
            throw new ArtifactWriteError(
                filename,
                `Artifact name is reserved: ${filename}`
            )
        }

        try {
            await mkdir(dirname(target), { recursive: true })
            await writeFile(target, draft.content, "utf-8")
        } catch (error) {
            throw new ArtifactWriteError(
                filename,
                `Could not write ${filename}: ${errorMessage(error)}`,
                toError(error)
            )
        }

        workflow.artifacts = workflow.artifacts.filter(
            (a) => a.filename !== filename
        )
        workflow.artifacts.push({
            name: draft.name || filename,
            description: draft.description,
            filename,
            createdBy: agentName,
            createdAt: new Date().toISOString(),
            taskId: task.id,
        })
        this.eventBus?.emit({
            type: "artifact:saved",
            workflowId: workflow.id,
            taskId: task.id,
            filename,
        })
    }

    private recordHistory(
        workflow: Workflow,
        task: WorkflowTask,
        agent: string | null,
        status: HistoryStatus,
        message: string
    ): void {
        workflow.history.push({
            workflowId: workflow.id,
            taskId: task.id,
            agent,
            timestamp: new Date().toISOString(),
            status,
            message,
        })
    }

    private async recordStats(agentName: string, success: boolean): Promise<void> {
        try {
            await this.registry.updateStats(agentName, success)
        } catch (error) {
            log.executor(
                "Could not update stats for %s: %s",
                agentName,
                errorMessage(error)
            )
        }
    }
}

export function buildWorkflowSummary(workflow: Workflow): WorkflowSummary {
    const taskResults: Record<string, string> = {}
    for (const id of workflow.workflowSequence) {
        const entry = workflow.memory[id]
        if (entry) taskResults[id] = entry.summary
    }
    const taskStatuses: Record<string, TaskStatus> = {}
    for (const task of workflow.tasks) taskStatuses[task.id] = task.status

    return {
        workflowId: workflow.id,
        name: workflow.name,
        goal: workflow.goal,
        status: workflow.status,
        createdAt: workflow.createdAt,
        updatedAt: workflow.updatedAt,
        workspace: workflow.workspace,
        successCriteria: [...workflow.successCriteria],
        artifacts: workflow.artifacts.map((a) => ({
            name: a.name,
            description: a.description,
            filename: a.filename,
            createdBy: a.createdBy,
            fullPath: join(workflow.workspace, a.filename),
        })),
        taskResults,
        taskStatuses,
        memory: structuredClone(workflow.memory),
    }
}
