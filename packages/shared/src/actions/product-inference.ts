const PRODUCT_PATTERNS = [
  /\b(?:using|use|with)\s+([A-Za-z0-9\-\s]{3,80})/i,
  /\bapply\s+([A-Za-z0-9\-\s]{3,80})/i,
];

// Cuts a captured name off at the first clause boundary or timing word
const CLAUSE_BOUNDARY = /[.;,\n]|\b(?:before|after|prior|night|morning|evening|day)\b/i;

export const KNOWN_BATH_PRODUCTS = [
  'chlorhexidine',
  'hibiclens',
  'antibacterial soap',
  'antibacterial wash',
  'sage cloth',
  'surgical scrub',
] as const;

const titleCase = (value: string): string =>
  value.replace(/\b([a-z])([a-z]*)/g, (_, first: string, rest: string) => first.toUpperCase() + rest);

/**
 * Pull the product named in a bathing instruction ("shower using Hibiclens
 * the night before"). Falls back to a fixed list of antiseptic products;
 * those are title-cased only when the instruction itself is all lower-case.
 */
export function inferProductFromInstruction(text: unknown): string | null {
  if (typeof text !== 'string' || !text.trim()) return null;

  const candidates: string[] = [];
  for (const pattern of PRODUCT_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const cleaned = match[1].split(CLAUSE_BOUNDARY)[0].trim();
    if (cleaned) candidates.push(cleaned);
  }

  if (candidates.length > 0) {
    return candidates.reduce((shortest, c) => (c.length < shortest.length ? c : shortest));
  }

  const lower = text.toLowerCase();
  for (const product of KNOWN_BATH_PRODUCTS) {
    const index = lower.indexOf(product);
    if (index === -1) continue;
    return text === lower ? titleCase(product) : text.slice(index, index + product.length);
  }
  return null;
}
