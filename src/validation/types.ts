/**
 * Types for the validation module.
 */

/**
 * One instance property count outside its declared bounds.
 */
export interface CardinalityViolation {
  /** Entry that violates the restriction */
  entryId: string;
  /** Class whose restriction applies (the entry's class or an ancestor) */
  classId: string;
  propertyId: string;
  /** Restriction that was checked */
  restrictionId: string;
  /** Number of values the entry holds */
  actual: number;
  minCardinality: number;
  maxCardinality: number | undefined;
  /** Human-readable summary */
  message: string;
}

/**
 * Result of one validation pass; violations are accumulated, never thrown.
 */
export interface CardinalityReport {
  valid: boolean;
  violations: CardinalityViolation[];
  /** Entries whose class was known and checked */
  checkedEntries: number;
}
