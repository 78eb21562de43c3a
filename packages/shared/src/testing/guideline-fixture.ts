import { doc, line, page } from './layout-builder';

/**
 * Two-page guideline: a 16pt top-level heading with two 12pt subsections,
 * the first of which spills onto page 2.
 */
export const guidelineDoc = doc(
  page(1, [
    line('Medication Management', { top: 100, size: 16, bold: true }),
    line('Review all medications.', { top: 130 }),
    line('Bring a list to clinic.', { top: 144 }),
    line('Ask about supplements.', { top: 158 }),
    line('NSAIDs', { top: 186, size: 12, bold: true }),
    line('Hold ibuprofen 3 days before surgery.', { top: 200 }),
    line('Hold naproxen 4 days before surgery.', { top: 214 }),
    line('Aspirin per surgeon.', { top: 228 }),
  ]),
  page(2, [
    line('Celecoxib may continue.', { top: 100 }),
    line('Check kidney function.', { top: 114 }),
    line('Document the plan.', { top: 128 }),
    line('Anticoagulants', { top: 156, size: 12, bold: true }),
    line('Hold warfarin 5 days before surgery.', { top: 170 }),
    line('Bridge if high risk.', { top: 184 }),
  ]),
);
