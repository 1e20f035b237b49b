import { mkdir, readdir } from "node:fs/promises"
import { join } from "node:path"

import { errorMessage, toError, WorkflowError } from "../core/errors.js"
import { isRecord, readString, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import { workflowId } from "../core/naming.js"
import type {
    Workflow,
    WorkflowListing,
    WorkflowSummary,
} from "../types.js"
import {
    isWorkflowStatus,
    normalizeArtifacts,
    normalizeBindings,
    normalizeFeedbackHistory,
    normalizeHistory,
    normalizeMemory,
    normalizeRoles,
    normalizeTasks,
} from "../workflow/normalize.js"
import { FileStore } from "./FileStore.js"

export const WORKFLOW_FILE = "workflow"
export const SUMMARY_FILE = "workflow_summary"

const ID_PATTERN = /^[A-Za-z0-9_-]+$/

/**
 * Persists each workflow as `<workspacePath>/<id>/workflow.json`, with the
 * run summary beside it. The workflow directory doubles as the artifact
 * workspace.
 */
export class WorkflowStore {
    public readonly workspacePath: string
    private readonly files: FileStore

    constructor(workspacePath: string) {
        this.workspacePath = workspacePath
        this.files = new FileStore(workspacePath)
    }

    public workspaceFor(id: string): string {
        return join(this.workspacePath, id)
    }

    public async create(
        name: string,
        goal: string,
        now: Date = new Date()
    ): Promise<Workflow> {
        const base = workflowId(name, now)
        let id = base
        for (let n = 2; await this.exists(id); n++) {
            id = `${base}_${n}`
        }

        const timestamp = now.toISOString()
        const workflow: Workflow = {
            id,
            name,
            goal,
            status: "initialized",
            createdAt: timestamp,
            updatedAt: timestamp,
            workspace: this.workspaceFor(id),
            roles: [],
            tasks: [],
            workflowSequence: [],
            successCriteria: [],
            agents: [],
            artifacts: [],
            memory: {},
            history: [],
            feedbackHistory: [],
        }
        await mkdir(workflow.workspace, { recursive: true })
        await this.files.write(`${id}/${WORKFLOW_FILE}`, workflow)
        log.persistence("Created workflow %s", id)
        return workflow
    }

    public async exists(id: string): Promise<boolean> {
        return ID_PATTERN.test(id) && this.files.exists(`${id}/${WORKFLOW_FILE}`)
    }

    public async load(id: string): Promise<Workflow> {
        if (!ID_PATTERN.test(id)) {
            throw new WorkflowError(`Invalid workflow id: ${id}`)
        }
        let document: unknown
        try {
            document = await this.files.read(`${id}/${WORKFLOW_FILE}`)
        } catch (error) {
            throw new WorkflowError(
                `Workflow ${id} could not be read: ${errorMessage(error)}`,
                toError(error)
            )
        }
        if (document === null) {
            throw new WorkflowError(`Workflow not found: ${id}`)
        }
        const workflow = parseWorkflowDocument(document)
        if (!workflow) {
            throw new WorkflowError(`Workflow ${id} is not a valid document`)
        }
        if (!workflow.workspace) workflow.workspace = this.workspaceFor(id)
        return workflow
    }

    /** Writes the whole document, moving `updatedAt` forward but never back. */
    public async save(workflow: Workflow): Promise<void> {
        const now = new Date().toISOString()
        if (now > workflow.updatedAt) workflow.updatedAt = now
        await this.files.write(`${workflow.id}/${WORKFLOW_FILE}`, workflow)
        log.persistence("Saved workflow %s (%s)", workflow.id, workflow.status)
    }

    public async saveSummary(summary: WorkflowSummary): Promise<void> {
        await this.files.write(`${summary.workflowId}/${SUMMARY_FILE}`, summary)
    }

    /** Every readable workflow under the workspace, newest first. */
    public async list(): Promise<WorkflowListing[]> {
        let entries: string[]
        try {
            const dirents = await readdir(this.workspacePath, {
                withFileTypes: true,
            })
            entries = dirents.filter((d) => d.isDirectory()).map((d) => d.name)
        } catch {
            return []
        }

        const listings: WorkflowListing[] = []
        for (const id of entries) {
            try {
                const workflow = await this.load(id)
                listings.push({
                    id: workflow.id,
                    name: workflow.name,
                    goal: workflow.goal,
                    status: workflow.status,
                    createdAt: workflow.createdAt,
                    updatedAt: workflow.updatedAt,
                    taskCount: workflow.tasks.length,
                })
            } catch (error) {
                log.persistence("Skipping %s: %s", id, errorMessage(error))
            }
        }
        return listings.sort((a, b) => b.createdAt.localeCompare(a.createdAt))
    }
}

export function parseWorkflowDocument(value: unknown): Workflow | null {
    if (!isRecord(value)) return null
    const id = readString(value, "id")
    if (!id) return null
    const createdAt = readString(value, "createdAt")
    return {
        id,
        name: readString(value, "name"),
        goal: readString(value, "goal"),
        status: isWorkflowStatus(value.status) ? value.status : "initialized",
        createdAt,
        updatedAt: readString(value, "updatedAt", createdAt),
        workspace: readString(value, "workspace"),
        roles: normalizeRoles(value.roles),
        tasks: normalizeTasks(value.tasks),
        workflowSequence: toStringArray(value.workflowSequence),
        successCriteria: toStringArray(value.successCriteria),
        agents: normalizeBindings(value.agents),
        artifacts: normalizeArtifacts(value.artifacts),
        memory: normalizeMemory(value.memory),
        history: normalizeHistory(value.history),
        feedbackHistory: normalizeFeedbackHistory(value.feedbackHistory),
    }
}
