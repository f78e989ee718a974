/**
 * Panel label formatting
 * @module layout/panel-label
 */

/**
 * Spreadsheet-style column letters: 0 -> "A", 25 -> "Z", 26 -> "AA"
 */
export function columnLetters(rank: number): string {
  if (!Number.isInteger(rank) || rank < 0) {
    throw new RangeError(`Column rank must be a non-negative integer, got ${rank}`);
  }

  let letters = '';
  let n = rank + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Label a panel from its zero-based column and row ranks, e.g. (7, 4) -> "H5"
 */
export function formatPanelLabel(columnRank: number, rowRank: number): string {
  return `${columnLetters(columnRank)}${rowRank + 1}`;
}

/**
 * Panel address after a product-id prefix, e.g. ("PROD_A01", "PROD_A") -> "01".
 * The prefix is removed by length, as the source ids are built by
 * concatenation.
 */
export function stripProductPrefix(panelId: string, productId: string): string {
  return panelId.slice(productId.length);
}
