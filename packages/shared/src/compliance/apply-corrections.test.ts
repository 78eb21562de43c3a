import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StructuredReportSchema } from '../schemas/structured-report';
import { applyCorrections } from './apply-corrections';

const report = StructuredReportSchema.parse({
  surgery_details: { date: '2025-03-10', time: '08:00' },
  medications_instructions: [
    { medication: 'Ibuprofen', pre_op_action: 'Continue' },
    { medication: 'Atenolol', pre_op_action: 'Continue' },
  ],
  general_pre_op_instructions: { fasting: 'Clear fluids until 6am', bathing: null, substance_use: null },
});

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('applyCorrections', () => {
  it('replaces flagged entries and leaves the rest alone', () => {
    const corrected = applyCorrections(report, [
      {
        item_type: 'medication',
        name: 'Ibuprofen',
        old_entry: { medication: 'Ibuprofen', pre_op_action: 'Continue' },
        suggested_entry: { medication: 'Ibuprofen', pre_op_action: 'Hold 3 days before surgery' },
        explanation: 'NSAID',
      },
      {
        item_type: 'general_instruction',
        name: 'fasting',
        old_entry: { instruction: 'Clear fluids until 6am' },
        suggested_entry: { instruction: 'Nothing by mouth after midnight' },
        explanation: 'Fasting rule',
      },
    ]);

    expect(corrected.medications_instructions).toEqual([
      { medication: 'Ibuprofen', pre_op_action: 'Hold 3 days before surgery' },
      { medication: 'Atenolol', pre_op_action: 'Continue' },
    ]);
    expect(corrected.general_pre_op_instructions).toEqual({
      fasting: 'Nothing by mouth after midnight',
      bathing: null,
      substance_use: null,
    });
    expect(report.medications_instructions[0].pre_op_action).toBe('Continue');
    expect(report.general_pre_op_instructions?.fasting).toBe('Clear fluids until 6am');
  });

  it('skips malformed, unknown and unmatched items', () => {
    const corrected = applyCorrections(report, [
      { foo: 1 },
      {
        item_type: 'medication',
        name: 'Warfarin',
        old_entry: {},
        suggested_entry: { medication: 'Warfarin', pre_op_action: 'Hold' },
        explanation: '',
      },
      {
        item_type: 'general_instruction',
        name: 'diet',
        old_entry: {},
        suggested_entry: { instruction: 'Light dinner' },
        explanation: '',
      },
    ]);

    expect(corrected).toEqual(report);
    expect(console.warn).toHaveBeenCalledTimes(3);
  });
});
