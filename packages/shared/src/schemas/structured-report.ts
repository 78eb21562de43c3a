import { z } from 'zod';

export const PatientInfoSchema = z.object({
  age: z.union([z.number(), z.string()]).nullable().optional(),
  sex: z.string().nullable().optional(),
  bmi: z.union([z.number(), z.string()]).nullable().optional(),
}).passthrough();

export const SurgeryDetailsSchema = z.object({
  procedure: z.string().nullable().optional(),
  date: z.string().nullable().optional(),
  time: z.string().nullable().optional(),
}).passthrough();

export const MedicationInstructionSchema = z.object({
  medication: z.string().nullable().optional(),
  pre_op_action: z.string().nullable().optional(),
}).passthrough();

export const GENERAL_INSTRUCTION_KEYS = ['fasting', 'bathing', 'substance_use'] as const;

export const GeneralPreOpInstructionsSchema = z.object({
  fasting: z.string().nullable().optional(),
  bathing: z.string().nullable().optional(),
  substance_use: z.string().nullable().optional(),
}).passthrough();

export const StructuredReportSchema = z.object({
  patient_info: PatientInfoSchema.nullable().optional(),
  surgery_details: SurgeryDetailsSchema.nullable().optional(),
  medications_instructions: z.array(MedicationInstructionSchema).nullable().optional()
    .transform(meds => meds ?? []),
  general_pre_op_instructions: GeneralPreOpInstructionsSchema.nullable().optional(),
}).passthrough();

export type PatientInfo = z.infer<typeof PatientInfoSchema>;
export type SurgeryDetails = z.infer<typeof SurgeryDetailsSchema>;
export type MedicationInstruction = z.infer<typeof MedicationInstructionSchema>;
export type GeneralInstructionKey = typeof GENERAL_INSTRUCTION_KEYS[number];
export type GeneralPreOpInstructions = z.infer<typeof GeneralPreOpInstructionsSchema>;
export type StructuredReport = z.infer<typeof StructuredReportSchema>;
export type StructuredReportInput = z.input<typeof StructuredReportSchema>;

export const isGeneralInstructionKey = (key: string): key is GeneralInstructionKey =>
  GENERAL_INSTRUCTION_KEYS.some(known => known === key);

/** Populated general instructions in document order, restricted to the known keys. */
export function populatedGeneralInstructions(
  report: StructuredReport,
): Array<{ key: GeneralInstructionKey; instruction: string }> {
  const general = report.general_pre_op_instructions ?? {};
  const entries: Array<{ key: GeneralInstructionKey; instruction: string }> = [];
  for (const [key, value] of Object.entries(general)) {
    if (!isGeneralInstructionKey(key) || typeof value !== 'string' || !value.trim()) continue;
    entries.push({ key, instruction: value });
  }
  return entries;
}
