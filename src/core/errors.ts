export class TaskweaveError extends Error {
    public readonly code: string
    public override readonly cause?: Error

    constructor(message: string, code: string, cause?: Error) {
        super(message)
        this.name = "TaskweaveError"
        this.code = code
        this.cause = cause
    }
}

export class OracleError extends TaskweaveError {
    constructor(message: string, cause?: Error) {
        super(message, "ORACLE_ERROR", cause)
        this.name = "OracleError"
    }
}

export class PlanningError extends TaskweaveError {
    constructor(message: string, cause?: Error) {
        super(message, "PLANNING_ERROR", cause)
        this.name = "PlanningError"
    }
}

export class AgentResolutionError extends TaskweaveError {
    public readonly agentName: string

    constructor(agentName: string, message: string, cause?: Error) {
        super(message, "AGENT_RESOLUTION_ERROR", cause)
        this.name = "AgentResolutionError"
        this.agentName = agentName
    }
}

export class ArtifactWriteError extends TaskweaveError {
    public readonly filename: string

    constructor(filename: string, message: string, cause?: Error) {
        super(message, "ARTIFACT_WRITE_ERROR", cause)
        this.name = "ArtifactWriteError"
        this.filename = filename
    }
}

export class TaskExecutionError extends TaskweaveError {
    public readonly taskId: string

    constructor(taskId: string, message: string, cause?: Error) {
        super(message, "TASK_EXECUTION_ERROR", cause)
        this.name = "TaskExecutionError"
        this.taskId = taskId
    }
}

export class ToolExecutionError extends TaskweaveError {
    public readonly toolName: string

    constructor(toolName: string, message: string, cause?: Error) {
        super(message, "TOOL_ERROR", cause)
        this.name = "ToolExecutionError"
        this.toolName = toolName
    }
}

export class WorkflowError extends TaskweaveError {
    constructor(message: string, cause?: Error) {
        super(message, "WORKFLOW_ERROR", cause)
        this.name = "WorkflowError"
    }
}

export class ConfigError extends TaskweaveError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR")
        this.name = "ConfigError"
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

export function toError(error: unknown): Error | undefined {
    return error instanceof Error ? error : undefined
}
