/**
 * Panel layout types
 * @module types/panel
 */

/**
 * Axis-aligned rectangle in layout units
 */
export interface BoundingBox {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

/**
 * Panel as supplied by the dataset
 */
export interface PanelSpec {
  /** Unique panel label, e.g. "A1" */
  label: string;

  /** Column index in the panel layout */
  column: number;

  /** Row index in the panel layout */
  row: number;

  /** Physical bounding box */
  box: BoundingBox;
}

/**
 * Panel after gap removal
 */
export interface Panel extends PanelSpec {
  /** Zero-based position of the panel's column among all columns */
  columnRank: number;

  /** Zero-based position of the panel's row among all rows */
  rowRank: number;

  /** Bounding box with every gap before this panel removed */
  cleanBox: BoundingBox;
}

/**
 * Horizontal or vertical extent of one layout column or row
 */
export interface AxisExtent {
  /** Column or row index */
  index: number;

  /** Lower physical coordinate */
  min: number;

  /** Upper physical coordinate */
  max: number;
}

/**
 * Gap and cumulative shift for one column or row
 */
export interface AxisShift extends AxisExtent {
  /** Physical gap between the previous column/row and this one */
  gapBefore: number;

  /** Distance this column/row moves when the gaps before it are removed */
  shift: number;

  /** Lower gap-free coordinate; equals the previous cleanMax exactly */
  cleanMin: number;

  /** Upper gap-free coordinate */
  cleanMax: number;
}

/**
 * Width and height of a bounding box
 */
export function boxWidth(box: BoundingBox): number {
  return box.xMax - box.xMin;
}

export function boxHeight(box: BoundingBox): number {
  return box.yMax - box.yMin;
}

/**
 * True when two boxes share interior area (touching edges do not overlap)
 */
export function boxesOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return a.xMin < b.xMax && b.xMin < a.xMax && a.yMin < b.yMax && b.yMin < a.yMax;
}

/**
 * Smallest box covering all given boxes
 */
export function unionBoxes(boxes: readonly BoundingBox[]): BoundingBox | null {
  if (boxes.length === 0) return null;

  let xMin = Infinity;
  let xMax = -Infinity;
  let yMin = Infinity;
  let yMax = -Infinity;

  for (const box of boxes) {
    if (box.xMin < xMin) xMin = box.xMin;
    if (box.xMax > xMax) xMax = box.xMax;
    if (box.yMin < yMin) yMin = box.yMin;
    if (box.yMax > yMax) yMax = box.yMax;
  }

  return { xMin, xMax, yMin, yMax };
}
