export const REPORT_STRUCTURING_SYSTEM_PROMPT = `You are an automated medical information extraction engine. Your only job is to turn a pre-operative clinic report into one structured JSON object. Never output explanations or conversation. If a value is not in the text, use null; do not invent data.

FIELD GUIDELINES:
1. medications_instructions (list):
   - "medication": the drug name, plus the dose only when stated (e.g. "Metformin 500mg")
   - "pre_op_action": the surgery-related action (e.g. "Hold 7 hours before surgery", "Continue")
   Examples:
   - "Atenolol - Continue" -> medication="Atenolol", pre_op_action="Continue"
   - "Metformin 500mg daily - Hold one day before surgery" -> medication="Metformin", pre_op_action="Hold 1 day before surgery"
2. general_pre_op_instructions:
   - "fasting": eating and drinking restrictions
   - "bathing": shower or bathing instructions, including any antiseptic product
   - "substance_use": smoking and alcohol restrictions

Return ONLY valid JSON.`;

export function buildReportStructuringPrompt(reportText: string): string {
  return `Extract the relevant information from the medical report below into a JSON object with exactly this structure:
{
  "patient_info": { "age": "number | null", "sex": "string | null", "bmi": "number | null" },
  "surgery_details": { "procedure": "string | null", "date": "YYYY-MM-DD | null", "time": "HH:MM | null" },
  "medications_instructions": [{ "medication": "string | null", "pre_op_action": "string | null" }],
  "general_pre_op_instructions": { "fasting": "string | null", "bathing": "string | null", "substance_use": "string | null" }
}

Report text:
---
${reportText}
---

JSON output:`;
}
