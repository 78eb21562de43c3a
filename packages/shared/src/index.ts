// Layout
export { openLayoutDocument } from './layout/pdf-reader';
export { extractText, pageText, documentText } from './layout/text';
export type { TextExtractionOptions } from './layout/text';
export type { Glyph, LayoutPage, LayoutDocument, BoundingBox } from './layout/types';

// Guidelines
export { extractHeadings, inferLevels, DEFAULT_HEADING_OPTIONS } from './guidelines/heading-extractor';
export type { Heading, HeadingExtractionOptions, SeparationPolicy } from './guidelines/heading-extractor';
export { buildLines, isBoldFont, medianLineGap, DEFAULT_BOLD_MARKERS } from './guidelines/lines';
export type { GlyphLine } from './guidelines/lines';
export { collectSections } from './guidelines/section-collector';
export type { Section, CollectSectionsOptions } from './guidelines/section-collector';
export { headingsToTree } from './guidelines/heading-tree';
export type { HeadingNode } from './guidelines/heading-tree';

// Time
export { parseSurgeryAnchor, formatLocalIso, subtractTime } from './time/surgery-anchor';
export type { SurgeryAnchor, SurgeryDateFields } from './time/surgery-anchor';
export { classifyTimePhrase, resolveTimePhrase, computeStopTime, isNoChangePhrase } from './time/time-phrase';
export type { TimePhraseResolution } from './time/time-phrase';

// JSON
export { parseModelJson, stripCodeFence, extractFirstJsonObject, isJsonObject } from './json/tolerant-json';

// Models
export type { ModelGateway, ModelRequest } from './models/gateway';
export { AnthropicGateway } from './claude/anthropic-gateway';
export type { AnthropicGatewayOptions, MessagesClient } from './claude/anthropic-gateway';
export { getAnthropicClient } from './claude/client';
export { MODELS, resolveModel, DEFAULT_REMOTE_MODEL } from './claude/model-router';
export type { ModelTier } from './claude/model-router';
export { OllamaGateway, OllamaHttpError, DEFAULT_OLLAMA_BASE_URL, DEFAULT_OLLAMA_MODEL } from './ollama/ollama-gateway';
export type { OllamaGatewayOptions, JsonFormatSetting } from './ollama/ollama-gateway';

// Config
export { loadPipelineConfig } from './config/pipeline-config';
export type { PipelineConfig } from './config/pipeline-config';

// Schemas
export {
  StructuredReportSchema, MedicationInstructionSchema, GeneralPreOpInstructionsSchema,
  SurgeryDetailsSchema, PatientInfoSchema, GENERAL_INSTRUCTION_KEYS,
} from './schemas/structured-report';
export type {
  StructuredReport, StructuredReportInput, MedicationInstruction, GeneralPreOpInstructions,
  GeneralInstructionKey, SurgeryDetails, PatientInfo,
} from './schemas/structured-report';
export { ComplianceIssueSchema, ComplianceReportSchema } from './schemas/compliance';
export type { ComplianceItem, ComplianceIssue, ComplianceReport } from './schemas/compliance';
export { ActionItemSchema, ActionPlanSchema, ACTION_TASKS, STOP_TIME_STATUSES } from './schemas/action-plan';
export type { ActionItem, ActionPlan, ActionTask, StopTimeStatus } from './schemas/action-plan';

// Pipeline stages
export { structureReport } from './extraction/report-structurer';
export { auditCompliance, buildComplianceItems } from './compliance/compliance-auditor';
export type { ComplianceAuditOptions } from './compliance/compliance-auditor';
export { applyCorrections } from './compliance/apply-corrections';
export { generateActions } from './actions/action-generator';
export { inferProductFromInstruction } from './actions/product-inference';
export { runActionPlan, buildActionPlan } from './pipeline/action-plan';
export type { ActionPlanOptions, ReportSource } from './pipeline/action-plan';
