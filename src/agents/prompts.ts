import type { AgentIndex, AgentMetadata } from "../types.js"

export function buildThinkPrompt(task: string): string {
    return [
        "You are an expert task executor. Analyze the following task and determine the most effective approach to complete it successfully.",
        `Task: ${task}`,
        "Your analysis:",
    ].join("\n\n")
}

export function buildExecutePrompt(task: string, analysis: string): string {
    return [
        "You are a skilled assistant tasked with completing the following request. Provide a thoughtful, helpful and accurate response.",
        `Request: ${task}`,
        `Approach you settled on:\n${analysis}`,
        "Your response:",
    ].join("\n\n")
}

export function buildPlanningPrompt(goal: string): string {
    return [
        "You are an expert task planner. Given the following high-level goal, break it down into smaller, logical steps that an AI agent can execute effectively.",
        `Goal: ${goal}`,
        "Steps:",
    ].join("\n\n")
}

export function buildRefinePrompt(input: string): string {
    return [
        "You are an AI assistant skilled in prompt engineering. If the user is asking for a prompt about something, maintain that meta-level intent: do not convert 'create a prompt about X' into just 'create X'. Rewrite the user's raw input into a well-structured AI prompt with clear, specific context, using bullet points or numbered lists where appropriate. Do NOT answer the prompt; only rewrite it.",
        `User Input: ${input}`,
        "Refined Prompt:",
    ].join("\n\n")
}

export function buildPersonaPrompt(
    instructions: string,
    metadata: AgentMetadata,
    task: string
): string {
    const capabilities = metadata.capabilities.length
        ? `\nCapabilities: ${metadata.capabilities.join(", ")}`
        : ""
    return `${instructions.trim()}\n\nRole: ${metadata.description}${capabilities}\n\n---\n\n${task}`
}

export function buildBlueprintPrompt(
    name: string,
    description: string,
    capabilities: string[]
): string {
    return [
        `Design a specialist AI agent named "${name}".`,
        `It is responsible for: ${description || name}`,
        `Expected capabilities: ${capabilities.join(", ") || "unspecified"}`,
        "Write the system instructions this agent will follow for every task it is given: its expertise, working method, quality bar and output conventions.",
        'Return ONLY a JSON object: {"description": "one sentence", "capabilities": ["..."], "instructions": "the full instructions"}',
    ].join("\n\n")
}

export function buildSpecializedAgentPrompt(task: string): string {
    return [
        "No existing agent can handle the following task. Propose a specialist agent for it.",
        `Task: ${task}`,
        'Return ONLY a JSON object: {"agent_name": "short_snake_case_name", "description": "what the agent does", "capabilities": ["capability", "..."]}',
    ].join("\n\n")
}

export function buildAgentSelectionPrompt(task: string, agents: AgentIndex): string {
    const lines = Object.entries(agents).map(
        ([name, record]) =>
            `- ${name}: ${record.description} (Capabilities: ${record.capabilities.join(", ") || "none"})`
    )
    return [
        "Choose the single best agent for the task below.",
        `Task: ${task}`,
        `Available agents:\n${lines.join("\n")}`,
        "Reply with exactly one agent name from the list, or NONE if no agent is suitable. Reply with the name only.",
    ].join("\n\n")
}

export function buildCapabilityCheckPrompt(
    task: string,
    name: string,
    record: AgentMetadata
): string {
    return [
        `Agent: ${name}`,
        `Description: ${record.description}`,
        `Capabilities: ${record.capabilities.join(", ") || "none"}`,
        `Task: ${task}`,
        "Can this agent fully handle the task? Answer YES or NO.",
    ].join("\n")
}

export function buildSubtaskPrompt(task: string, response: string): string {
    return [
        "Here is a task and the response produced for it.",
        `Task: ${task}`,
        `Response:\n${response}`,
        "If important parts of the task remain unaddressed, list each remaining subtask on its own line starting with '- '. If nothing remains, reply with exactly NO_SUBTASKS.",
    ].join("\n\n")
}

export function buildScrapePlanPrompt(task: string): string {
    return [
        "Analyze this web scraping task:",
        task,
        "What is the best strategy to complete it? Consider which URL to fetch, what information to extract, how to present it and any output requirements. Provide a step-by-step plan.",
    ].join("\n\n")
}

export function buildUrlPrompt(task: string): string {
    return `Extract just the URL from this task and reply with nothing else: ${task}`
}

export function buildExtractionSchemaPrompt(task: string): string {
    return [
        "Based on this task, what information should be extracted from the web page?",
        task,
        "Return ONLY a JSON object whose keys are the data points to extract and whose values briefly describe what to look for.",
    ].join("\n\n")
}
