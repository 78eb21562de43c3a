import { generateActions } from '../actions/action-generator';
import { auditCompliance } from '../compliance/compliance-auditor';
import { extractHeadings, type HeadingExtractionOptions } from '../guidelines/heading-extractor';
import { collectSections } from '../guidelines/section-collector';
import { openLayoutDocument } from '../layout/pdf-reader';
import { documentText } from '../layout/text';
import type { LayoutDocument } from '../layout/types';
import type { ModelGateway } from '../models/gateway';
import { structureReport } from '../extraction/report-structurer';
import type { ActionItem, ActionPlan } from '../schemas/action-plan';
import type { ComplianceReport } from '../schemas/compliance';
import type { StructuredReport } from '../schemas/structured-report';

export type ReportSource =
  | { kind: 'pdf'; path: string }
  | { kind: 'structured'; report: StructuredReport };

export interface ActionPlanOptions {
  report: ReportSource;
  guidelinePath?: string;
  /** Hosted model: report structuring and action generation */
  remote: ModelGateway;
  /** Local model: compliance audit */
  local: ModelGateway;
  headingOptions?: Partial<HeadingExtractionOptions>;
  targetLevel?: number;
  maxSectionChars?: number;
  readDocument?: (path: string) => Promise<LayoutDocument>;
}

export function buildActionPlan(
  report: StructuredReport,
  actions: ActionItem[],
  complianceReport?: ComplianceReport | null,
): ActionPlan {
  return {
    patient_info: report.patient_info ?? null,
    surgery_details: report.surgery_details ?? null,
    actions,
    ...(complianceReport ? { compliance_report: complianceReport } : {}),
  };
}

async function loadDocument(
  path: string,
  readDocument: (path: string) => Promise<LayoutDocument>,
): Promise<LayoutDocument | null> {
  try {
    return await readDocument(path);
  } catch (error) {
    console.error(`Failed to read document ${path}:`, error);
    return null;
  }
}

async function resolveReport(options: ActionPlanOptions, read: (path: string) => Promise<LayoutDocument>) {
  if (options.report.kind === 'structured') return options.report.report;

  console.log(`Processing PDF: ${options.report.path}`);
  const document = await loadDocument(options.report.path, read);
  if (!document) return null;

  return structureReport(documentText(document), options.remote);
}

async function checkGuidelines(
  report: StructuredReport,
  guidelinePath: string,
  options: ActionPlanOptions,
  read: (path: string) => Promise<LayoutDocument>,
): Promise<ComplianceReport | null> {
  console.log(`Extracting guidelines from: ${guidelinePath}`);
  const document = await loadDocument(guidelinePath, read);
  if (!document) return null;

  const headings = extractHeadings(document, options.headingOptions);
  const sections = collectSections(document, { headings, targetLevel: options.targetLevel ?? 2 });
  console.log(`[Headings] ${headings.length} headings, ${sections.length} sections at level ${options.targetLevel ?? 2}.`);

  const compliance = await auditCompliance(report, sections, options.local, {
    maxSectionChars: options.maxSectionChars,
  });
  if (compliance) console.log(`[Compliance] ${compliance.compliance_summary}`);
  return compliance;
}

/**
 * Structure the report, generate patient actions and, when a guideline
 * document is given, audit the instructions against it. Null when the
 * report itself cannot be read or structured.
 */
export async function runActionPlan(options: ActionPlanOptions): Promise<ActionPlan | null> {
  const read = options.readDocument ?? openLayoutDocument;

  const report = await resolveReport(options, read);
  if (!report) {
    console.error('Failed to extract structured data from the report.');
    return null;
  }

  const actions = await generateActions(report, options.remote);
  const complianceReport = options.guidelinePath
    ? await checkGuidelines(report, options.guidelinePath, options, read)
    : null;

  return buildActionPlan(report, actions, complianceReport);
}
