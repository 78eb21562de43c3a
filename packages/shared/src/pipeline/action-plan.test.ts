import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { LayoutDocument } from '../layout/types';
import { StructuredReportSchema } from '../schemas/structured-report';
import { guidelineDoc } from '../testing/guideline-fixture';
import { doc, line, page } from '../testing/layout-builder';
import { ScriptedGateway } from '../testing/scripted-gateway';
import { buildActionPlan, runActionPlan } from './action-plan';

const report = StructuredReportSchema.parse({
  patient_info: { age: 61 },
  surgery_details: { procedure: 'Knee arthroscopy', date: '2025-03-10', time: '08:00' },
  medications_instructions: [{ medication: 'Ibuprofen', pre_op_action: 'Continue' }],
});

const reportDoc = doc(page(1, [
  line('Procedure: Knee arthroscopy', { top: 100 }),
  line('Date: 2025-03-10 08:00', { top: 114 }),
  line('Ibuprofen: continue', { top: 128 }),
]));

const ibuprofenAction = { task: 'Medications', stop_time: 'continue', note: 'Keep taking it.' };

const readerFor = (documents: Record<string, LayoutDocument>) =>
  vi.fn(async (path: string) => {
    const found = documents[path];
    if (!found) throw new Error(`ENOENT: ${path}`);
    return found;
  });

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runActionPlan', () => {
  it('produces actions and a compliance report for a structured report', async () => {
    const remote = new ScriptedGateway([ibuprofenAction]);
    const local = new ScriptedGateway([
      { selected_heading_ids: ['H1'] },
      {
        is_compliant: false,
        issues: [{ suggested_entry: 'Hold 3 days before surgery', explanation: 'NSAIDs are held 3 days before surgery.' }],
      },
    ]);
    const readDocument = readerFor({ 'guidelines.pdf': guidelineDoc });

    const plan = await runActionPlan({
      report: { kind: 'structured', report },
      guidelinePath: 'guidelines.pdf',
      remote,
      local,
      readDocument,
    });

    expect(plan).toEqual({
      patient_info: { age: 61 },
      surgery_details: { procedure: 'Knee arthroscopy', date: '2025-03-10', time: '08:00' },
      actions: [{ task: 'Medications', stop_time: null, stop_time_status: 'no-change', note: 'Keep taking it.', medication: 'Ibuprofen' }],
      compliance_report: {
        compliance_summary: 'Processed 1 items; flagged 1 potential issues.',
        flagged_items: [{
          item_type: 'medication',
          name: 'Ibuprofen',
          old_entry: { medication: 'Ibuprofen', pre_op_action: 'Continue' },
          suggested_entry: { medication: 'Ibuprofen', pre_op_action: 'Hold 3 days before surgery' },
          explanation: 'NSAIDs are held 3 days before surgery.',
          guideline_heading: 'NSAIDs',
          guideline_page: 1,
        }],
      },
    });
    expect(local.requests[0].prompt).toContain('- H1 | NSAIDs (page 1)\n- H2 | Anticoagulants (page 2)');
  });

  it('structures a PDF report from its text', async () => {
    const remote = new ScriptedGateway([
      {
        surgery_details: { date: '2025-03-10', time: '08:00' },
        medications_instructions: [{ medication: 'Ibuprofen', pre_op_action: 'Continue' }],
      },
      ibuprofenAction,
    ]);

    const plan = await runActionPlan({
      report: { kind: 'pdf', path: 'report.pdf' },
      remote,
      local: new ScriptedGateway([]),
      readDocument: readerFor({ 'report.pdf': reportDoc }),
    });

    expect(remote.requests[0].prompt).toContain('Procedure: Knee arthroscopy\nDate: 2025-03-10 08:00\nIbuprofen: continue');
    expect(plan?.actions).toHaveLength(1);
    expect(plan).not.toHaveProperty('compliance_report');
  });

  it('returns null when the report cannot be read', async () => {
    const remote = new ScriptedGateway([]);
    const plan = await runActionPlan({
      report: { kind: 'pdf', path: 'missing.pdf' },
      remote,
      local: new ScriptedGateway([]),
      readDocument: readerFor({}),
    });

    expect(plan).toBeNull();
    expect(remote.requests).toHaveLength(0);
  });

  it('still returns the actions when the guideline cannot be read', async () => {
    const plan = await runActionPlan({
      report: { kind: 'structured', report },
      guidelinePath: 'missing.pdf',
      remote: new ScriptedGateway([ibuprofenAction]),
      local: new ScriptedGateway([]),
      readDocument: readerFor({}),
    });

    expect(plan?.actions).toHaveLength(1);
    expect(plan).not.toHaveProperty('compliance_report');
  });
});

describe('buildActionPlan', () => {
  it('nulls missing report sections', () => {
    const empty = StructuredReportSchema.parse({});
    expect(buildActionPlan(empty, [])).toEqual({ patient_info: null, surgery_details: null, actions: [] });
  });
});
