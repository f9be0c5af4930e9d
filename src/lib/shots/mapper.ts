import type { DisplayLayout, ShotField } from './model';

/**
 * Assigns the i-th number to the i-th field of the layout. Values are not
 * range-checked; recognition order is assumed to follow the screen's layout.
 */
export function mapToLayout(numbers: readonly number[], layout: DisplayLayout): Partial<Record<ShotField, number | null>> {
  const fields: Partial<Record<ShotField, number | null>> = {};
  layout.fields.forEach((field, i) => {
    fields[field] = i < numbers.length ? numbers[i] : null;
  });
  return fields;
}

export function countPopulated(fields: Partial<Record<ShotField, number | null>>): number {
  return Object.values(fields).filter((value) => value !== null && value !== undefined).length;
}

// Coverage, not correctness: a full set of wrong numbers still scores 1.
export function scoreConfidence(populated: number, expected: number): number {
  if (expected <= 0 || populated <= 0) return 0;
  return Math.min(1, populated / expected);
}
