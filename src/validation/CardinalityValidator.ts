/**
 * Explicit validation pass over entries.
 *
 * Counts each entry's values per restricted property, including the
 * restrictions its class inherits through known parents, and collects
 * every violation into one report. Graph building never calls this.
 */

import { CardinalityViolationError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { MetadataEntry, Restriction, TypeDefinition } from '../model/index.js';
import type { CardinalityReport, CardinalityViolation } from './types.js';

const log = createLogger('cardinality');

interface ApplicableRestriction {
  classId: string;
  restriction: Restriction;
}

function describeBounds(min: number, max: number | undefined): string {
  if (max === undefined) {
    return `at least ${min}`;
  }
  return min === max ? `exactly ${min}` : `${min} to ${max}`;
}

export class CardinalityValidator {
  private readonly types: Map<string, TypeDefinition>;
  private readonly applicable: Map<string, ApplicableRestriction[]> = new Map();

  constructor(types: readonly TypeDefinition[]) {
    this.types = new Map(types.map((t) => [t.id, t]));
  }

  validate(entries: readonly MetadataEntry[]): CardinalityReport {
    const violations: CardinalityViolation[] = [];
    let checkedEntries = 0;

    for (const entry of entries) {
      if (entry.isOpaque || !this.types.has(entry.classId)) {
        continue;
      }
      checkedEntries += 1;

      for (const { classId, restriction } of this.restrictionsOf(entry.classId)) {
        const actual = entry.valueCount(restriction.propertyId);
        if (restriction.accepts(actual)) {
          continue;
        }
        violations.push({
          entryId: entry.id,
          classId,
          propertyId: restriction.propertyId,
          restrictionId: restriction.id,
          actual,
          minCardinality: restriction.minCardinality,
          maxCardinality: restriction.maxCardinality,
          message:
            `${entry.id}: '${restriction.propertyId}' has ${actual} value(s), expected ` +
            describeBounds(restriction.minCardinality, restriction.maxCardinality),
        });
      }
    }

    if (violations.length > 0) {
      log.debug({ violations: violations.length }, 'Cardinality violations found');
    }
    return { valid: violations.length === 0, violations, checkedEntries };
  }

  /**
   * Own restrictions first, then each ancestor's, breadth-first.
   */
  private restrictionsOf(classId: string): ApplicableRestriction[] {
    const cached = this.applicable.get(classId);
    if (cached) {
      return cached;
    }

    const result: ApplicableRestriction[] = [];
    const visited = new Set<string>([classId]);
    const queue = [classId];
    while (queue.length > 0) {
      const current = queue.shift();
      const type = current === undefined ? undefined : this.types.get(current);
      if (type === undefined) {
        continue;
      }
      for (const restriction of type.restrictions) {
        result.push({ classId: type.id, restriction });
      }
      for (const parent of type.subClassOf) {
        if (!visited.has(parent)) {
          visited.add(parent);
          queue.push(parent);
        }
      }
    }

    this.applicable.set(classId, result);
    return result;
  }
}

/**
 * Validate entries against the restrictions of their types.
 */
export function validateCardinality(
  entries: readonly MetadataEntry[],
  types: readonly TypeDefinition[]
): CardinalityReport {
  return new CardinalityValidator(types).validate(entries);
}

/**
 * Throw when a report holds violations.
 */
export function assertCardinality(report: CardinalityReport): void {
  const [first] = report.violations;
  if (first === undefined) {
    return;
  }
  throw new CardinalityViolationError(
    `${report.violations.length} cardinality violation(s); first: ${first.message}`,
    report.violations.length
  );
}
