import { InvalidBoundsError } from "./errors";

const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/**
 * Converts a column number into its base-26 letter label (1 → `"A"`, 27 → `"AA"`).
 *
 * `0` maps to the empty label so that `alphabetToInt(intToAlphabet(0)) === 0`.
 */
export function intToAlphabet(value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidBoundsError(`Invalid column number: ${value}`);
  }

  let remaining = value;
  let label = "";
  while (remaining > 0) {
    const remainder = (remaining - 1) % LETTERS.length;
    label = LETTERS.charAt(remainder) + label;
    remaining = Math.floor((remaining - 1) / LETTERS.length);
  }
  return label;
}

export function alphabetToInt(letters: string): number {
  let value = 0;
  for (const char of letters) {
    const digit = LETTERS.indexOf(char);
    if (digit === -1) {
      throw new InvalidBoundsError(`Invalid column label: ${letters}`);
    }
    value = value * LETTERS.length + digit + 1;
  }
  return value;
}
