// A number may not touch another digit run through a decimal point, so "1.2.3" yields nothing.
// ".5" is a decimal; "112." is a whole number.
const DECIMAL = String.raw`(?<![\d.])(?:\d+(?:\.\d*)?|\.\d+)(?![\d.]*\.\d)`;
const NUMBER = `(${DECIMAL})`;

const UNIT_PATTERNS: readonly RegExp[] = [
  new RegExp(`${NUMBER}\\s*mph`, 'gi'),
  new RegExp(`${NUMBER}\\s*ft`, 'gi'),
  new RegExp(`${NUMBER}\\s*°`, 'gi'),
  new RegExp(`${NUMBER}\\s*rpm`, 'gi'),
  new RegExp(`${NUMBER}\\s*/s`, 'gi'),
];

// The sign sits outside the lookbehind so "2.3-0.8" keeps the minus on 0.8.
const SIGNED_DECIMAL = new RegExp(`(-?${DECIMAL})`, 'g');

/** Undo the recognizer's usual letter-for-digit swaps. */
export function normalizeOcrText(text: string): string {
  return text.replace(/[Oo]/g, '0').replace(/[lI]/g, '1');
}

function collect(pattern: RegExp, text: string, out: number[]) {
  for (const match of text.matchAll(pattern)) {
    const value = Number(match[1]);
    if (Number.isFinite(value)) out.push(value);
  }
}

/**
 * Numbers in the order the rules find them: every unit-suffixed pattern in
 * priority order, then the generic signed decimal. A value with a unit is
 * therefore reported twice; callers rely on that count, so it is kept.
 */
export function extractNumbers(text: string): number[] {
  const normalized = normalizeOcrText(text);
  const numbers: number[] = [];
  for (const pattern of UNIT_PATTERNS) collect(pattern, normalized, numbers);
  collect(SIGNED_DECIMAL, normalized, numbers);
  return numbers;
}
