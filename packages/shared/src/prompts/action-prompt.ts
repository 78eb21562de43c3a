import type { ActionTask } from '../schemas/action-plan';

export const ACTION_SYSTEM_PROMPT = `You convert short clinical instructions into patient-facing JSON. Always reply with a single JSON object containing exactly the keys task, stop_time, and note.`;

export function buildActionPrompt(task: ActionTask, input: string): string {
  return `Return ONLY a JSON object with keys task, stop_time, note. No markdown, no extra text.
- task must be "${task}".
- stop_time: a short phrase such as "4 days before surgery"; use null if nothing changes.
- note: a very short notification for the patient. Do not repeat the drug, shower or fast; just say when, relative to surgery.

Input:
${input}

Output: JSON only.`;
}
