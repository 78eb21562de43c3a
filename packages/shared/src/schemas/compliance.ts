import { z } from 'zod';
import type { GeneralInstructionKey, MedicationInstruction } from './structured-report';

export type ComplianceItem =
  | { item_type: 'medication'; name: string; details: MedicationInstruction }
  | { item_type: 'general_instruction'; name: GeneralInstructionKey; details: { instruction: string } };

export type ComplianceItemType = ComplianceItem['item_type'];

export const ComplianceIssueSchema = z.object({
  item_type: z.enum(['medication', 'general_instruction']),
  name: z.string(),
  old_entry: z.record(z.unknown()),
  suggested_entry: z.record(z.unknown()),
  explanation: z.string(),
  issue: z.string().optional(),
  guideline_heading: z.string().optional(),
  guideline_page: z.number().int().optional(),
});

export const ComplianceReportSchema = z.object({
  compliance_summary: z.string(),
  flagged_items: z.array(ComplianceIssueSchema),
});

// Model-facing shapes; the auditor normalises them.
export const HeadingSelectionSchema = z.object({
  selected_heading_ids: z.array(z.unknown()),
});

// Malformed fields read as undefined.
export const ModelIssueSchema = z.object({
  issue: z.string().optional().catch(undefined),
  suggested_entry: z.union([z.record(z.unknown()), z.string()]).optional().catch(undefined),
  explanation: z.string().optional().catch(undefined),
  guideline_heading: z.string().optional().catch(undefined),
  guideline_page: z.number().int().optional().catch(undefined),
});

export type ComplianceIssue = z.infer<typeof ComplianceIssueSchema>;
export type ComplianceReport = z.infer<typeof ComplianceReportSchema>;
export type ModelIssue = z.infer<typeof ModelIssueSchema>;
