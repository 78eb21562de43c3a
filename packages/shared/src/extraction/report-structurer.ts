import { parseModelJson } from '../json/tolerant-json';
import type { ModelGateway } from '../models/gateway';
import { buildReportStructuringPrompt, REPORT_STRUCTURING_SYSTEM_PROMPT } from '../prompts/report-structuring-prompt';
import { StructuredReportSchema, type StructuredReport } from '../schemas/structured-report';

/**
 * Ask the hosted model to turn raw pre-op report text into the structured
 * report shape. Null when there is no text, no response, or the response
 * does not validate.
 */
export async function structureReport(text: string, gateway: ModelGateway): Promise<StructuredReport | null> {
  if (!text.trim()) {
    console.error('[Structuring] No text content provided to structure.');
    return null;
  }

  const responseText = await gateway.complete({
    system: REPORT_STRUCTURING_SYSTEM_PROMPT,
    prompt: buildReportStructuringPrompt(text),
    maxTokens: 2048,
    temperature: 0.1,
    topP: 0.9,
    json: true,
  });
  if (!responseText) return null;

  const parsed = parseModelJson(responseText);
  if (parsed === null) {
    console.error('[Structuring] Could not parse JSON from model output:', responseText.slice(0, 1000));
    return null;
  }

  const result = StructuredReportSchema.safeParse(parsed);
  if (!result.success) {
    console.error('[Structuring] Model output does not match the report schema:', result.error.issues);
    return null;
  }
  return result.data;
}
