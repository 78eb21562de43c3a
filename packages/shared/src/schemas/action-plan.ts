import { z } from 'zod';
import { ComplianceReportSchema } from './compliance';
import { PatientInfoSchema, SurgeryDetailsSchema } from './structured-report';

export const ACTION_TASKS = ['Medications', 'Fasting', 'Bath', 'Alcohol and Tobacco'] as const;

/**
 * `absolute`: stop_time is an ISO datetime. `no-change`: stop_time is null.
 * `unresolved`: stop_time is the phrase as given, for a person to read.
 */
export const STOP_TIME_STATUSES = ['absolute', 'no-change', 'unresolved'] as const;

export const ActionItemSchema = z.object({
  task: z.enum(ACTION_TASKS),
  /** ISO datetime, the unresolved phrase, or null for "keep doing what you do today" */
  stop_time: z.string().nullable(),
  stop_time_status: z.enum(STOP_TIME_STATUSES),
  note: z.string(),
  medication: z.string().nullable(),
});

// What the model is asked to return for one instruction
export const ModelActionSchema = z.object({
  task: z.unknown().optional(),
  stop_time: z.unknown().optional(),
  note: z.unknown().optional(),
  medication: z.unknown().optional(),
});

export const ActionPlanSchema = z.object({
  patient_info: PatientInfoSchema.nullable(),
  surgery_details: SurgeryDetailsSchema.nullable(),
  actions: z.array(ActionItemSchema),
  compliance_report: ComplianceReportSchema.optional(),
});

export type ActionTask = typeof ACTION_TASKS[number];
export type StopTimeStatus = typeof STOP_TIME_STATUSES[number];
export type ActionItem = z.infer<typeof ActionItemSchema>;
export type ModelAction = z.infer<typeof ModelActionSchema>;
export type ActionPlan = z.infer<typeof ActionPlanSchema>;
