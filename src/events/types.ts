import type {
    CostSummary,
    TaskStatus,
    TokenUsage,
    WorkflowStatus,
} from "../types.js"

export type TaskweaveEvent =
    | {
          type: "workflow:created"
          workflowId: string
          name: string
          goal: string
      }
    | {
          type: "workflow:planned"
          workflowId: string
          taskCount: number
          roleCount: number
      }
    | {
          type: "workflow:start"
          workflowId: string
          name: string
          taskIds: string[]
      }
    | {
          type: "workflow:complete"
          workflowId: string
          status: WorkflowStatus
          duration: number
      }
    | {
          type: "agent:resolved"
          workflowId: string
          role: string
          agentName: string
          created: boolean
      }
    | {
          type: "task:start"
          workflowId: string
          taskId: string
          name: string
          agentName: string
      }
    | {
          type: "task:complete"
          workflowId: string
          taskId: string
          summary: string
          duration: number
      }
    | {
          type: "task:failed"
          workflowId: string
          taskId: string
          error: string
      }
    | {
          type: "task:skipped"
          workflowId: string
          taskId: string
          missing: string[]
      }
    | {
          type: "artifact:saved"
          workflowId: string
          taskId: string
          filename: string
      }
    | {
          type: "executor:iteration_limit"
          workflowId: string
          maxIterations: number
          remaining: string[]
      }
    | {
          type: "feedback:received"
          workflowId: string
          resetTaskIds: string[]
          newTaskIds: string[]
      }
    | {
          type: "route:start"
          task: string
          depth: number
      }
    | {
          type: "route:agent"
          agentName: string
          created: boolean
      }
    | {
          type: "route:complete"
          agentName: string | null
          status: Extract<TaskStatus, "completed" | "failed">
      }
    | {
          type: "oracle:call"
          model: string
          usage: TokenUsage
          duration: number
          attempt: number
      }
    | {
          type: "cost:update"
          summary: CostSummary
      }

export type TaskweaveEventType = TaskweaveEvent["type"]
