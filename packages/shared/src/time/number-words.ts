const NUMBER_WORDS: Record<string, number> = {
  zero: 0, one: 1, two: 2, three: 3, four: 4, five: 5,
  six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
  eleven: 11, twelve: 12, thirteen: 13, fourteen: 14,
  fifteen: 15, sixteen: 16, seventeen: 17, eighteen: 18,
  nineteen: 19, twenty: 20, thirty: 30, forty: 40,
  fifty: 50, sixty: 60,
};

const wordValue = (word: string): number | null =>
  Object.prototype.hasOwnProperty.call(NUMBER_WORDS, word) ? NUMBER_WORDS[word] : null;

/** "5" -> 5, "five" -> 5, "twenty-one" -> 21; anything else -> null. */
export function parseCount(token: string): number | null {
  const value = token.trim().toLowerCase();
  if (/^\d+$/.test(value)) return parseInt(value, 10);

  const parts = value.split('-');
  if (parts.length === 2) {
    const tens = wordValue(parts[0]);
    const ones = wordValue(parts[1]);
    if (tens !== null && ones !== null) return tens + ones;
  }

  return wordValue(value);
}
