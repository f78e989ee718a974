/**
 * Defect point types
 * @module types/defect
 */

/**
 * Defect as supplied by the dataset (physical coordinates)
 */
export interface DefectPoint {
  x: number;
  y: number;

  /** Optional identity, carried through but never used for analysis */
  id?: string;

  /** Optional defect classification from the source data */
  kind?: string;
}

/**
 * Defect that lies inside a panel, tagged with its owning panel
 */
export interface AssignedDefect extends DefectPoint {
  panelLabel: string;
  column: number;
  row: number;
}

/**
 * Defect after gap removal; keeps the physical coordinates
 */
export interface TransformedDefect {
  origX: number;
  origY: number;
  cleanX: number;
  cleanY: number;
  panelLabel: string;
  column: number;
  row: number;
  id?: string;
  kind?: string;
}
