import type { ComplianceItem } from '../schemas/compliance';

export function buildHeadingSelectionPrompt(item: ComplianceItem, headingSummary: string): string {
  return `You are choosing which guideline headings are relevant for one perioperative instruction.

INSTRUCTION JSON:
${JSON.stringify(item, null, 2)}

AVAILABLE GUIDELINE HEADINGS (IDs and titles):
${headingSummary}

Pick ALL relevant heading IDs; more than one is allowed.
Return ONLY JSON of the form {"selected_heading_ids": ["H1", "H4"]} with the IDs in order of relevance.`;
}
