export type LLMProviderType = "openai" | "anthropic"

export type WorkflowStatus =
    | "initialized"
    | "agent_creation"
    | "execution"
    | "feedback_execution"
    | "completed"
    | "partial"

export type TaskStatus = "pending" | "completed" | "failed" | "skipped"

export type HistoryStatus = Exclude<TaskStatus, "pending">

export interface ModelConfig {
    provider: LLMProviderType
    model: string
    temperature?: number
    maxTokens?: number
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

export interface LLMMessage {
    role: "system" | "user" | "assistant"
    content: string
}

export interface LLMResponse {
    content: string | null
    usage: TokenUsage
    model: string
}

export interface LLMProvider {
    chat(messages: LLMMessage[], model: ModelConfig): Promise<LLMResponse>
}

/** The completion endpoint every planner, agent and router call goes through. */
export interface Oracle {
    complete(prompt: string): Promise<string>
}

export interface RoleSpec {
    role: string
    description: string
    capabilities: string[]
    responsibilities: string[]
}

export interface WorkflowTask {
    id: string
    name: string
    description: string
    assignedTo: string
    dependsOn: string[]
    expectedOutput: string
    status: TaskStatus
}

export interface AgentBinding {
    name: string
    role: string
    description: string
    capabilities: string[]
    responsibilities: string[]
}

export interface ArtifactRecord {
    name: string
    description: string
    filename: string
    createdBy: string
    createdAt: string
    taskId: string
}

export interface TaskOutput {
    summary: string
    result: string
}

export interface HistoryEntry {
    workflowId: string
    taskId: string
    agent: string | null
    timestamp: string
    status: HistoryStatus
    message: string
}

export interface FeedbackEntry {
    feedback: string
    analysis: string
    changesNeeded: string[]
    tasksToUpdate: string[]
    newTaskIds: string[]
    timestamp: string
}

export interface Workflow {
    id: string
    name: string
    goal: string
    status: WorkflowStatus
    createdAt: string
    updatedAt: string
    workspace: string
    roles: RoleSpec[]
    tasks: WorkflowTask[]
    workflowSequence: string[]
    successCriteria: string[]
    agents: AgentBinding[]
    artifacts: ArtifactRecord[]
    memory: Record<string, TaskOutput>
    history: HistoryEntry[]
    feedbackHistory: FeedbackEntry[]
}

export interface WorkflowPlan {
    roles: RoleSpec[]
    tasks: WorkflowTask[]
    workflowSequence: string[]
    successCriteria: string[]
}

export interface UpdatePlan {
    analysis: string
    changesNeeded: string[]
    tasksToUpdate: string[]
    newTasks: WorkflowTask[]
}

export interface ArtifactDraft {
    name: string
    description: string
    filename: string
    content: string
}

export interface TaskResult {
    output: TaskOutput
    artifacts: ArtifactDraft[]
}

export interface SummaryArtifact {
    name: string
    description: string
    filename: string
    createdBy: string
    fullPath: string
}

export interface WorkflowSummary {
    workflowId: string
    name: string
    goal: string
    status: WorkflowStatus
    createdAt: string
    updatedAt: string
    workspace: string
    successCriteria: string[]
    artifacts: SummaryArtifact[]
    taskResults: Record<string, string>
    taskStatuses: Record<string, TaskStatus>
    memory: Record<string, TaskOutput>
}

export interface WorkflowListing {
    id: string
    name: string
    goal: string
    status: WorkflowStatus
    createdAt: string
    updatedAt: string
    taskCount: number
}

export interface AgentMetadata {
    description: string
    capabilities: string[]
}

export interface AgentRecord extends AgentMetadata {
    usageCount: number
    successRate: number
}

export type AgentIndex = Record<string, AgentRecord>

export interface AgentBlueprint extends AgentMetadata {
    name: string
    instructions: string
    createdAt: string
}

export type StructuredRecord = Record<string, unknown>

export type AgentOutput = string | StructuredRecord

export interface FinalResponse {
    text: string
    elapsedSeconds: number
}

export interface Agent {
    readonly name: string
    readonly metadata: AgentMetadata
    think?(task: string): Promise<string>
    act?(task: string): Promise<AgentOutput>
    generateFinalResponse(prompt: string): Promise<FinalResponse>
}

export type Outcome<T, E extends Error = Error> =
    | { ok: true; value: T }
    | { ok: false; error: E }

export interface JSONSchemaProperty {
    type: "string" | "number" | "boolean" | "array" | "object"
    description?: string
    items?: JSONSchemaProperty
    enum?: string[]
}

export interface ToolParameterSchema {
    type: "object"
    properties: Record<string, JSONSchemaProperty>
    required?: string[]
}

export interface ToolContext {
    workingDirectory: string
    oracle?: Oracle
}

export interface ToolExecutionResult {
    content: string
    isError: boolean
    data?: Record<string, unknown>
}

export interface ToolDefinition {
    name: string
    description: string
    parameters: ToolParameterSchema
    execute: (
        args: Record<string, unknown>,
        context: ToolContext
    ) => Promise<ToolExecutionResult>
}

export type RendererType = "terminal" | "log" | "none"

export interface TaskweaveConfig {
    openaiApiKey?: string
    anthropicApiKey?: string
    baseUrl?: string
    apiBaseUrl?: string
    apiKey?: string
    provider?: LLMProviderType
    model?: string
    temperature?: number
    maxTokens?: number
    workingDirectory: string
    workspacePath?: string
    dataPath?: string
    maxIterations?: number
    routerMaxIterations?: number
    verifyCapabilities?: boolean
    renderer?: RendererType
    verbose?: boolean
    llmRetryDelays?: number[]
    providers?: Partial<Record<LLMProviderType, LLMProvider>>
}

export interface CostBreakdown {
    inputCost: number
    outputCost: number
    totalCost: number
}

export interface CostSummary {
    totalCost: CostBreakdown
    totalTokens: TokenUsage
    calls: number
    byModel: Record<string, { cost: CostBreakdown; tokenUsage: TokenUsage }>
}
