const DIGIT_CLASS = /[0-9\n.,-]/;

/**
 * Keeps digits, line breaks and `. , -`, in their original order.
 * Lines left with nothing are dropped.
 */
export function filterDigits(text: string): string {
  let out = '';
  for (const ch of text) {
    if (DIGIT_CLASS.test(ch)) out += ch;
  }
  return out
    .split('\n')
    .filter((line) => line.length > 0)
    .join('\n');
}
