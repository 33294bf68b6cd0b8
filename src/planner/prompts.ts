import { getConfig } from "../config.js";
import type { RegularTask } from "../graph/types.js";

export const SOURCE_NAMING_PROMPT = `Your purpose is to turn a user's request into a task name.

Summarize the request in as few words as possible (at most eight). Reply with the task name only, on a single line, without quotes or punctuation at the end.`;

export const ACTOR_SYSTEM_PROMPT = `You are an AI agent called "Actor". Your purpose is to address task requests effectively.

Key principles for your response:
1. Respond directly to the task without unnecessary elaboration unless clarification is needed.
2. Keep information accurate, clear and concise.
3. Use examples or additional context only when they improve understanding.
4. Keep a natural and user-friendly tone.`;

export const ALLOCATOR_SYSTEM_PROMPT = `You are an AI agent called "Allocator". You receive a task, its input and the answer another agent produced for it.

Decide whether the answer fully satisfies the task. If it does not, split the task into smaller sub-tasks that together would satisfy it.

Reply in exactly this format:

**Satisfaction Decision**: True or False
**Reasoning**: one line explaining the decision

Only when the decision is False, continue with:

**Decomposition Mode**: sequential or parallel
- **Sub-task 1**:
  - **Description**: what the sub-task must do
  - **Name**: short-kebab-case-name
- **Sub-task 2**:
  - **Description**: ...
  - **Name**: ...

Rules:
- Use "sequential" when each sub-task needs the previous one's result, "parallel" when they are independent.
- Number sub-tasks from 1 in execution order.
- Names must be unique, short and descriptive.`;

export const ALLOCATOR_FORMAT_REMINDER =
  "IMPORTANT: Your previous reply did not follow the required format. Reply again using exactly the **Satisfaction Decision** / **Reasoning** / **Decomposition Mode** / **Sub-task** layout.";

export function truncate(text: string, maxLen = getConfig().limits.outputTruncation): string {
  return text.length > maxLen ? text.slice(0, maxLen) + "...(truncated)" : text;
}

function taskHeader(task: RegularTask): string {
  return task.description && task.description !== task.name
    ? `Task: ${task.name}\nDescription: ${task.description}`
    : `Task: ${task.name}`;
}

/** The message sent to the Actor for one task execution. */
export function formatActorInput(task: RegularTask, input: string): string {
  return `${taskHeader(task)}\n\nInput:\n${truncate(input)}`;
}

/** The message sent to the Allocator once the Actor has answered. */
export function formatAllocatorInput(task: RegularTask, input: string, answer: string): string {
  return `${taskHeader(task)}\n\nInput:\n${truncate(input)}\n\nAnswer:\n${truncate(answer)}`;
}
