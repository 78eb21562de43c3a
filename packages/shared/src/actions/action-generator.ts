import { isJsonObject, parseModelJson } from '../json/tolerant-json';
import type { ModelGateway } from '../models/gateway';
import { ACTION_SYSTEM_PROMPT, buildActionPrompt } from '../prompts/action-prompt';
import { ModelActionSchema, type ActionItem, type ActionTask } from '../schemas/action-plan';
import {
  populatedGeneralInstructions,
  type GeneralInstructionKey,
  type StructuredReport,
} from '../schemas/structured-report';
import { formatLocalIso, parseSurgeryAnchor, type SurgeryAnchor } from '../time/surgery-anchor';
import { classifyTimePhrase, isNoChangePhrase } from '../time/time-phrase';
import { inferProductFromInstruction } from './product-inference';

const TASK_FOR_INSTRUCTION: Record<GeneralInstructionKey, ActionTask> = {
  fasting: 'Fasting',
  bathing: 'Bath',
  substance_use: 'Alcohol and Tobacco',
};

interface PendingAction {
  task: ActionTask;
  input: string;
  /** The instruction's own timing phrase, tried when the model's does not resolve */
  sourcePhrase: string | null | undefined;
  medication: string | null;
  label: string;
}

const textOf = (phrase: unknown): string | null =>
  typeof phrase === 'string' && phrase.trim() ? phrase.trim() : null;

/**
 * Model phrase first, then the source instruction's phrase. Null only when
 * the instruction says to carry on as usual; a phrase that cannot be placed
 * on the calendar is kept verbatim and marked unresolved.
 */
export function resolveStopTime(
  anchor: SurgeryAnchor | null,
  modelPhrase: unknown,
  sourcePhrase: unknown,
): Pick<ActionItem, 'stop_time' | 'stop_time_status'> {
  for (const phrase of [modelPhrase, sourcePhrase]) {
    const resolution = classifyTimePhrase(anchor, phrase);
    if (resolution.kind === 'absolute') {
      return { stop_time: formatLocalIso(resolution.at), stop_time_status: 'absolute' };
    }
  }

  const remaining = textOf(modelPhrase) ?? textOf(sourcePhrase);
  if (remaining === null || isNoChangePhrase(remaining)) {
    return { stop_time: null, stop_time_status: 'no-change' };
  }
  return { stop_time: remaining, stop_time_status: 'unresolved' };
}

function pendingActions(report: StructuredReport): PendingAction[] {
  const pending: PendingAction[] = [];

  for (const med of report.medications_instructions) {
    pending.push({
      task: 'Medications',
      input: JSON.stringify(med, null, 2),
      sourcePhrase: med.pre_op_action,
      medication: med.medication ?? null,
      label: `medication '${med.medication ?? 'unknown'}'`,
    });
  }

  for (const { key, instruction } of populatedGeneralInstructions(report)) {
    pending.push({
      task: TASK_FOR_INSTRUCTION[key],
      input: `Task: ${key}\nInstruction: ${instruction}`,
      sourcePhrase: instruction,
      medication: null,
      label: `instruction [${key}]`,
    });
  }

  return pending;
}

async function generateAction(
  pending: PendingAction,
  anchor: SurgeryAnchor | null,
  gateway: ModelGateway,
): Promise<ActionItem | null> {
  const responseText = await gateway.complete({
    system: ACTION_SYSTEM_PROMPT,
    prompt: buildActionPrompt(pending.task, pending.input),
    maxTokens: 256,
    temperature: 0.1,
    topP: 0.9,
    json: true,
  });

  const parsed = parseModelJson(responseText);
  const modelAction = isJsonObject(parsed) ? ModelActionSchema.safeParse(parsed) : null;
  if (!modelAction?.success) {
    console.error(`[Actions] Invalid JSON response for ${pending.label}. Raw output:`, responseText);
    return null;
  }
  const { stop_time: modelPhrase, note, medication: modelMedication } = modelAction.data;

  let medication = pending.medication;
  if (pending.task === 'Bath') {
    medication = typeof modelMedication === 'string' && modelMedication.trim()
      ? modelMedication.trim()
      : inferProductFromInstruction(pending.sourcePhrase) ?? inferProductFromInstruction(note);
  }

  return {
    task: pending.task,
    ...resolveStopTime(anchor, modelPhrase, pending.sourcePhrase),
    note: typeof note === 'string' ? note.trim() : '',
    medication,
  };
}

/**
 * Turn the structured report into patient-facing actions: medications
 * first, then general instructions in document order. Items whose model
 * output cannot be parsed are logged and left out.
 */
export async function generateActions(report: StructuredReport, gateway: ModelGateway): Promise<ActionItem[]> {
  const anchor = parseSurgeryAnchor(report.surgery_details);
  if (!anchor) {
    console.warn('[Actions] Surgery date missing or malformed; stop times will be null.');
  }

  const actions: ActionItem[] = [];
  for (const pending of pendingActions(report)) {
    const action = await generateAction(pending, anchor, gateway);
    if (action) actions.push(action);
  }

  console.log(`[Actions] Generated ${actions.length} actions.`);
  return actions;
}
