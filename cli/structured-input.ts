import { readFile } from 'fs/promises';
import { StructuredReportSchema, type StructuredReport } from '@preop/shared';

/** Load a report that was structured earlier (e.g. a saved model response). */
export async function readStructuredReport(path: string): Promise<StructuredReport> {
  const raw = await readFile(path, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = StructuredReportSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new Error(`${path} is not a structured report: ${details}`);
  }
  return result.data;
}
