import { toSnakeCase } from "../core/naming.js"
import type { RoleSpec, WorkflowTask } from "../types.js"

export interface GraphValidationOptions {
    roles?: RoleSpec[]
}

/** Every problem with a task graph and its execution order; empty when valid. */
export function validateTaskGraph(
    tasks: WorkflowTask[],
    sequence: string[],
    options: GraphValidationOptions = {}
): string[] {
    const problems: string[] = []
    const ids = new Set<string>()
    for (const task of tasks) {
        if (ids.has(task.id)) problems.push(`Duplicate task id: ${task.id}`)
        ids.add(task.id)
    }

    const position = new Map<string, number>()
    sequence.forEach((id, index) => {
        if (!ids.has(id)) {
            problems.push(`Sequence references unknown task: ${id}`)
        } else if (position.has(id)) {
            problems.push(`Task ${id} appears more than once in the sequence`)
        } else {
            position.set(id, index)
        }
    })

    const roleNames = options.roles
        ? new Set(options.roles.map((r) => toSnakeCase(r.role)))
        : null

    for (const task of tasks) {
        const at = position.get(task.id)
        if (at === undefined) {
            problems.push(`Task ${task.id} is missing from the sequence`)
        }
        for (const dep of task.dependsOn) {
            if (!ids.has(dep)) {
                problems.push(`Task ${task.id} depends on unknown task ${dep}`)
                continue
            }
            const depAt = position.get(dep)
            if (at !== undefined && depAt !== undefined && depAt >= at) {
                problems.push(
                    `Task ${task.id} runs before its dependency ${dep}`
                )
            }
        }
        if (roleNames && !roleNames.has(toSnakeCase(task.assignedTo))) {
            problems.push(
                `Task ${task.id} is assigned to unknown role "${task.assignedTo}"`
            )
        }
    }
    return problems
}

/**
 * Kahn ordering that keeps the original task order among ready tasks.
 * Null on a cycle. Dependencies on unknown ids are ignored.
 */
export function topologicalOrder(tasks: WorkflowTask[]): string[] | null {
    const ids = new Set(tasks.map((t) => t.id))
    const remaining = new Map(
        tasks.map((t) => [t.id, new Set(t.dependsOn.filter((d) => ids.has(d)))])
    )
    const order: string[] = []

    while (remaining.size > 0) {
        const ready = tasks.find(
            (t) => remaining.get(t.id)?.size === 0
        )
        if (!ready) return null
        order.push(ready.id)
        remaining.delete(ready.id)
        for (const deps of remaining.values()) deps.delete(ready.id)
    }
    return order
}
