import createDebug from "debug"

const NAMESPACE_ROOT = "taskweave"

export type Logger = createDebug.Debugger

export function createLogger(subsystem: string): Logger {
    return createDebug(`${NAMESPACE_ROOT}:${subsystem}`)
}

/**
 * One debug channel per subsystem, silent unless enabled, e.g.
 * `DEBUG=taskweave:*` or `DEBUG=taskweave:executor,taskweave:router`.
 */
export const log = {
    app: createLogger("app"),
    workflow: createLogger("workflow"),
    planner: createLogger("planner"),
    executor: createLogger("executor"),
    feedback: createLogger("feedback"),
    agent: createLogger("agent"),
    registry: createLogger("registry"),
    router: createLogger("router"),
    llm: createLogger("llm"),
    tool: createLogger("tool"),
    persistence: createLogger("persistence"),
}
