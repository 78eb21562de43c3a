import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ACTION_SYSTEM_PROMPT } from '../prompts/action-prompt';
import { StructuredReportSchema, type StructuredReportInput } from '../schemas/structured-report';
import { ScriptedGateway } from '../testing/scripted-gateway';
import { parseSurgeryAnchor } from '../time/surgery-anchor';
import { generateActions, resolveStopTime } from './action-generator';

const surgery_details = { procedure: 'Knee arthroscopy', date: '2025-03-10', time: '08:00' };

const reportOf = (input: StructuredReportInput) => StructuredReportSchema.parse(input);

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('generateActions', () => {
  it('turns every instruction into a timed action', async () => {
    const report = reportOf({
      surgery_details,
      medications_instructions: [
        { medication: 'Ibuprofen', pre_op_action: 'Hold 3 days before surgery' },
        { medication: 'Atenolol', pre_op_action: 'Continue' },
      ],
      general_pre_op_instructions: {
        fasting: 'Nothing after midnight',
        bathing: 'Shower using Hibiclens before bed',
        substance_use: 'No alcohol 24 hours before surgery',
      },
    });
    const gateway = new ScriptedGateway([
      { task: 'Medications', stop_time: '3 days before surgery', note: ' Stop 3 days before surgery. ' },
      { task: 'Medications', stop_time: 'continue', note: 'Keep taking as usual.' },
      '```json\n{"task": "Diet", "stop_time": null, "note": "Stop eating at midnight."}\n```',
      { task: 'Bath', stop_time: 'night before', note: 'Shower the night before surgery.' },
      'not json at all',
    ]);

    const actions = await generateActions(report, gateway);

    expect(actions).toEqual([
      { task: 'Medications', stop_time: '2025-03-07T08:00:00', stop_time_status: 'absolute', note: 'Stop 3 days before surgery.', medication: 'Ibuprofen' },
      { task: 'Medications', stop_time: null, stop_time_status: 'no-change', note: 'Keep taking as usual.', medication: 'Atenolol' },
      { task: 'Fasting', stop_time: '2025-03-10T00:00:00', stop_time_status: 'absolute', note: 'Stop eating at midnight.', medication: null },
      { task: 'Bath', stop_time: '2025-03-09T21:00:00', stop_time_status: 'absolute', note: 'Shower the night before surgery.', medication: 'Hibiclens' },
    ]);

    expect(gateway.requests).toHaveLength(5);
    expect(gateway.requests[0].system).toBe(ACTION_SYSTEM_PROMPT);
    expect(gateway.requests[0].prompt).toContain('- task must be "Medications".');
    expect(gateway.requests[0].prompt).toContain('"medication": "Ibuprofen"');
    expect(gateway.requests[2].prompt).toContain('Task: fasting\nInstruction: Nothing after midnight');
    expect(gateway.requests[4].prompt).toContain('- task must be "Alcohol and Tobacco".');
  });

  it('keeps the phrase, not null, when there is no surgery date', async () => {
    const report = reportOf({
      medications_instructions: [{ medication: 'Ibuprofen', pre_op_action: 'Hold 3 days before surgery' }],
    });
    const gateway = new ScriptedGateway([{ task: 'Medications', stop_time: '3 days before surgery', note: 'Stop soon.' }]);

    expect(await generateActions(report, gateway)).toEqual([
      { task: 'Medications', stop_time: '3 days before surgery', stop_time_status: 'unresolved', note: 'Stop soon.', medication: 'Ibuprofen' },
    ]);
  });

  it('never reports an unresolvable hold as no change', async () => {
    const report = reportOf({
      surgery_details,
      medications_instructions: [
        { medication: 'Aspirin', pre_op_action: 'Hold one week before surgery' },
        { medication: 'Atenolol', pre_op_action: 'Continue' },
      ],
    });
    const gateway = new ScriptedGateway([
      { task: 'Medications', stop_time: '1 week before surgery', note: 'Stop a week before surgery.' },
      { task: 'Medications', stop_time: 'continue', note: 'Keep taking it.' },
    ]);

    const actions = await generateActions(report, gateway);

    expect(actions.map(a => [a.medication, a.stop_time, a.stop_time_status])).toEqual([
      ['Aspirin', '1 week before surgery', 'unresolved'],
      ['Atenolol', null, 'no-change'],
    ]);
  });

  it('prefers the product the model names for bathing', async () => {
    const report = reportOf({
      surgery_details,
      general_pre_op_instructions: { bathing: 'Shower using Hibiclens before bed' },
    });
    const gateway = new ScriptedGateway([
      { task: 'Bath', stop_time: null, note: 'Shower tonight.', medication: ' Chlorhexidine wash ' },
    ]);

    const [action] = await generateActions(report, gateway);
    expect(action).toEqual({
      task: 'Bath',
      stop_time: 'Shower using Hibiclens before bed',
      stop_time_status: 'unresolved',
      note: 'Shower tonight.',
      medication: 'Chlorhexidine wash',
    });
  });

  it('falls back to the note when the instruction names no product', async () => {
    const report = reportOf({ surgery_details, general_pre_op_instructions: { bathing: 'Shower tonight' } });
    const gateway = new ScriptedGateway([{ task: 'Bath', stop_time: null, note: 'Use Sage cloth wipes.' }]);

    const [action] = await generateActions(report, gateway);
    expect(action.medication).toBe('Sage cloth wipes');
  });

  it('defaults a missing note to an empty string', async () => {
    const report = reportOf({ surgery_details, general_pre_op_instructions: { substance_use: 'No alcohol 24 hours before surgery' } });
    const gateway = new ScriptedGateway([{ task: 'Alcohol and Tobacco', stop_time: '24 hours before surgery' }]);

    expect(await generateActions(report, gateway)).toEqual([
      { task: 'Alcohol and Tobacco', stop_time: '2025-03-09T08:00:00', stop_time_status: 'absolute', note: '', medication: null },
    ]);
  });
});

describe('resolveStopTime', () => {
  const anchor = parseSurgeryAnchor(surgery_details);

  it('uses the model phrase when it resolves', () => {
    expect(resolveStopTime(anchor, 'night before', 'Nothing after midnight')).toEqual({
      stop_time: '2025-03-09T21:00:00',
      stop_time_status: 'absolute',
    });
  });

  it('falls back to the source instruction', () => {
    expect(resolveStopTime(anchor, null, 'Nothing after midnight').stop_time).toBe('2025-03-10T00:00:00');
    expect(resolveStopTime(anchor, 'eventually', 'Hold 5 days before surgery').stop_time).toBe('2025-03-05T08:00:00');
  });

  it('gives null only for a carry-on-as-usual instruction', () => {
    expect(resolveStopTime(anchor, 'continue', 'Continue')).toEqual({ stop_time: null, stop_time_status: 'no-change' });
    expect(resolveStopTime(anchor, 'As usual', 'Hold one week before surgery')).toEqual({
      stop_time: null,
      stop_time_status: 'no-change',
    });
    expect(resolveStopTime(anchor, null, null)).toEqual({ stop_time: null, stop_time_status: 'no-change' });
  });

  it('keeps a hold it cannot place on the calendar', () => {
    expect(resolveStopTime(anchor, ' 1 week before surgery ', 'Hold one week before surgery')).toEqual({
      stop_time: '1 week before surgery',
      stop_time_status: 'unresolved',
    });
    expect(resolveStopTime(anchor, null, 'Hold one week before surgery')).toEqual({
      stop_time: 'Hold one week before surgery',
      stop_time_status: 'unresolved',
    });
  });

  it('recognises carry-on instructions without a surgery date', () => {
    expect(resolveStopTime(null, 'no change', 'Continue')).toEqual({ stop_time: null, stop_time_status: 'no-change' });
  });
});
