/**
 * Section ranking by catalogue name
 */

const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

/**
 * Size of a section read from its name
 *
 * Names like `RHS 100x50x6` rank by the number after the last `x`; any other
 * name ranks by the largest number it contains. -1 when the name has no
 * number at all.
 */
export function sectionSizeFromName(name: string): number {
  const parts = name.split('x');
  if (parts.length > 1) {
    const tail = parts[parts.length - 1].trim();
    if (tail !== '') {
      const value = Number(tail);
      if (Number.isFinite(value)) {
        return value;
      }
    }
  }

  const numbers = name.match(NUMBER_PATTERN);
  if (!numbers) {
    return -1;
  }
  return Math.max(...numbers.map(Number));
}
