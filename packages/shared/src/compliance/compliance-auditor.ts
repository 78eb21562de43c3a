import type { Section } from '../guidelines/section-collector';
import { isJsonObject, parseModelJson } from '../json/tolerant-json';
import type { ModelGateway } from '../models/gateway';
import { buildComplianceAuditPrompt } from '../prompts/compliance-audit-prompt';
import { buildHeadingSelectionPrompt } from '../prompts/heading-selection-prompt';
import {
  HeadingSelectionSchema,
  ModelIssueSchema,
  type ComplianceIssue,
  type ComplianceItem,
  type ComplianceReport,
} from '../schemas/compliance';
import { populatedGeneralInstructions, type StructuredReport } from '../schemas/structured-report';

export interface ComplianceAuditOptions {
  /** Per-section character cap in the audit prompt; 0 disables truncation */
  maxSectionChars?: number;
}

export type ItemAuditOutcome =
  | { stage: 'skipped'; headingIds: string[] }
  | { stage: 'audited'; headingIds: string[]; sections: Section[]; issues: ComplianceIssue[] };

const DEFAULT_MAX_SECTION_CHARS = 2000;
const HEADING_ID_RE = /^H(\d+)$/;
const TRUTHY_STRINGS = new Set(['true', 'yes', '1']);

export function buildComplianceItems(report: StructuredReport): ComplianceItem[] {
  const items: ComplianceItem[] = [];

  for (const med of report.medications_instructions) {
    items.push({
      item_type: 'medication',
      name: med.medication || 'Unknown medication',
      details: med,
    });
  }

  for (const { key, instruction } of populatedGeneralInstructions(report)) {
    items.push({ item_type: 'general_instruction', name: key, details: { instruction } });
  }

  return items;
}

export function summarizeHeadings(sections: Section[]): string {
  return sections
    .map((section, i) => `- H${i + 1} | ${section.heading || '(missing heading)'} (page ${section.page})`)
    .join('\n');
}

/** Map "H<n>" ids onto sections; malformed, out-of-range and repeated ids are dropped. */
export function resolveHeadingIds(ids: string[], sections: Section[]): Section[] {
  const seen = new Set<number>();
  const selected: Section[] = [];
  for (const id of ids) {
    const match = HEADING_ID_RE.exec(id);
    if (!match) continue;
    const index = parseInt(match[1], 10) - 1;
    if (index < 0 || index >= sections.length || seen.has(index)) continue;
    seen.add(index);
    selected.push(sections[index]);
  }
  return selected;
}

export function isCompliantValue(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  if (typeof value === 'number') return value !== 0;
  return false;
}

function truncate(text: string, maxChars: number): string {
  if (maxChars > 0 && text.length > maxChars) {
    return `${text.slice(0, maxChars).trimEnd()}...`;
  }
  return text;
}

export function buildGuidelineContent(sections: Section[], maxChars = DEFAULT_MAX_SECTION_CHARS): string {
  return sections
    .map(section => `### ${section.heading || 'Unknown'}\n${truncate(section.content, maxChars)}`)
    .join('\n\n');
}

export async function selectHeadings(
  item: ComplianceItem,
  headingSummary: string,
  gateway: ModelGateway,
): Promise<string[]> {
  const responseText = await gateway.complete({
    prompt: buildHeadingSelectionPrompt(item, headingSummary),
    maxTokens: 256,
    temperature: 0.1,
    topP: 0.9,
    json: true,
  });

  const parsed = HeadingSelectionSchema.safeParse(parseModelJson(responseText));
  if (!parsed.success) return [];

  return parsed.data.selected_heading_ids
    .filter((id): id is string => typeof id === 'string')
    .map(id => id.trim())
    .filter(Boolean);
}

function suggestedEntryFor(item: ComplianceItem, suggested: Record<string, unknown> | string): Record<string, unknown> {
  if (typeof suggested !== 'string') return suggested;
  return item.item_type === 'medication'
    ? { ...item.details, pre_op_action: suggested }
    : { instruction: suggested };
}

/**
 * Audit one item against the selected guideline sections. Returns no issues
 * when the model judges the item compliant, lists no issues, or produces
 * nothing parseable.
 */
export async function auditItem(
  item: ComplianceItem,
  sections: Section[],
  gateway: ModelGateway,
  options: ComplianceAuditOptions = {},
): Promise<ComplianceIssue[]> {
  const content = buildGuidelineContent(sections, options.maxSectionChars ?? DEFAULT_MAX_SECTION_CHARS);
  const responseText = await gateway.complete({
    prompt: buildComplianceAuditPrompt(item, content),
    maxTokens: 1024,
    temperature: 0.1,
    topP: 0.9,
    json: true,
  });

  const parsed = parseModelJson(responseText);
  if (!isJsonObject(parsed)) {
    console.error(`[Compliance] No usable audit result for ${item.item_type} '${item.name}':`, responseText?.slice(0, 200));
    return [];
  }

  const rawIssues = Array.isArray(parsed.issues) ? parsed.issues.filter(isJsonObject) : [];
  if (isCompliantValue(parsed.is_compliant) || rawIssues.length === 0) return [];

  const first = sections[0];
  const issues: ComplianceIssue[] = [];
  for (const raw of rawIssues) {
    const modelIssue = ModelIssueSchema.parse(raw);
    if (modelIssue.suggested_entry === undefined) {
      console.warn(`[Compliance] Dropping issue without suggested_entry for '${item.name}'`);
      continue;
    }

    issues.push({
      item_type: item.item_type,
      name: item.name,
      old_entry: item.details,
      suggested_entry: suggestedEntryFor(item, modelIssue.suggested_entry),
      explanation: modelIssue.explanation ?? modelIssue.issue ?? '',
      ...(modelIssue.issue !== undefined ? { issue: modelIssue.issue } : {}),
      guideline_heading: modelIssue.guideline_heading ?? first?.heading,
      guideline_page: modelIssue.guideline_page ?? first?.page,
    });
  }
  return issues;
}

export async function auditOneItem(
  item: ComplianceItem,
  sections: Section[],
  headingSummary: string,
  gateway: ModelGateway,
  options: ComplianceAuditOptions = {},
): Promise<ItemAuditOutcome> {
  const headingIds = await selectHeadings(item, headingSummary, gateway);
  console.log(`[Compliance] ${item.item_type} '${item.name}' -> headings ${headingIds.join(', ') || 'none'}`);

  const selected = resolveHeadingIds(headingIds, sections);
  if (selected.length === 0) {
    return { stage: 'skipped', headingIds };
  }

  const issues = await auditItem(item, selected, gateway, options);
  return { stage: 'audited', headingIds, sections: selected, issues };
}

/**
 * Check every medication and general instruction against the guideline
 * sections, one item per model round-trip. Null when there is nothing to
 * audit against.
 */
export async function auditCompliance(
  report: StructuredReport,
  sections: Section[],
  gateway: ModelGateway,
  options: ComplianceAuditOptions = {},
): Promise<ComplianceReport | null> {
  if (sections.length === 0) {
    console.warn('[Compliance] Guideline sections are required for compliance checking.');
    return null;
  }

  const items = buildComplianceItems(report);
  const headingSummary = summarizeHeadings(sections);
  const flagged: ComplianceIssue[] = [];

  for (const item of items) {
    const outcome = await auditOneItem(item, sections, headingSummary, gateway, options);
    if (outcome.stage === 'audited') {
      flagged.push(...outcome.issues);
    }
  }

  return {
    compliance_summary: `Processed ${items.length} items; flagged ${flagged.length} potential issues.`,
    flagged_items: flagged,
  };
}
