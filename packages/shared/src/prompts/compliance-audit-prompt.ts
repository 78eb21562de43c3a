import type { ComplianceItem } from '../schemas/compliance';

const COMPLIANCE_RULES = `COMPLIANCE RULES:
1. An instruction to "Continue" a medication the guideline says to hold or stop is NON-COMPLIANT.
2. NSAIDs (ibuprofen, naproxen, aspirin and similar) MUST be held before surgery when the guideline says so.
3. More conservative than the guideline = COMPLIANT. Less conservative = NON-COMPLIANT.

EXAMPLES:
NON-COMPLIANT: guideline "Hold ibuprofen 3 days before surgery", instruction "Continue ibuprofen"
COMPLIANT: guideline "Hold 4 days", instruction "Hold 4 days"
COMPLIANT: guideline "Hold 2 days", instruction "Hold 3 days" (stricter)
NON-COMPLIANT: guideline "Hold 2 days", instruction "Hold day of" (less strict)`;

export function buildComplianceAuditPrompt(item: ComplianceItem, guidelineContent: string): string {
  return `You are a strict medical compliance auditor checking ONE perioperative instruction.

INSTRUCTION TO AUDIT:
${JSON.stringify(item, null, 2)}

GUIDELINE CONTENT:
${guidelineContent}

${COMPLIANCE_RULES}

If the instruction is less safe than the guideline, return is_compliant=false with issues.
If it matches or exceeds the guideline's safety, return is_compliant=true with an empty issues list.

For every NON-COMPLIANT finding you MUST provide:
1. suggested_entry: the complete corrected entry in EXACTLY the same shape as the original "details"
2. explanation: one line on what changed and why

OUTPUT FORMAT (JSON only):
{
  "is_compliant": boolean,
  "issues": [{
    "issue": "description",
    "suggested_entry": {<complete corrected entry>},
    "explanation": "one line explanation"
  }]
}`;
}
