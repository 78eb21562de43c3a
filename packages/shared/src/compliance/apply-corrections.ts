import { ComplianceIssueSchema, type ComplianceIssue } from '../schemas/compliance';
import {
  isGeneralInstructionKey,
  type GeneralPreOpInstructions,
  MedicationInstructionSchema,
  type StructuredReport,
} from '../schemas/structured-report';

/**
 * Apply reviewed corrections to a structured report. Medication issues
 * replace the entry with the matching medication name; general-instruction
 * issues overwrite the named instruction. The input report is left as is.
 */
export function applyCorrections(report: StructuredReport, flaggedItems: unknown[]): StructuredReport {
  const medications = [...report.medications_instructions];
  const general: GeneralPreOpInstructions = { ...(report.general_pre_op_instructions ?? {}) };
  let generalTouched = false;

  for (const raw of flaggedItems) {
    const parsed = ComplianceIssueSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn('[Corrections] Skipping malformed flagged item:', parsed.error.issues);
      continue;
    }
    const issue: ComplianceIssue = parsed.data;

    if (issue.item_type === 'medication') {
      const index = medications.findIndex(med => med.medication === issue.name);
      const replacement = MedicationInstructionSchema.safeParse(issue.suggested_entry);
      if (index === -1 || !replacement.success) {
        console.warn(`[Corrections] No medication entry to correct for '${issue.name}'`);
        continue;
      }
      medications[index] = replacement.data;
      continue;
    }

    const instruction = issue.suggested_entry.instruction;
    if (!isGeneralInstructionKey(issue.name) || typeof instruction !== 'string') {
      console.warn(`[Corrections] Cannot apply general instruction correction for '${issue.name}'`);
      continue;
    }
    general[issue.name] = instruction;
    generalTouched = true;
  }

  return {
    ...report,
    medications_instructions: medications,
    ...(generalTouched ? { general_pre_op_instructions: general } : {}),
  };
}
