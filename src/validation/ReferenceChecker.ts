/**
 * Finds entry references that point at no entry.
 *
 * Only local ids and blank ids are expected to live in the graph; a
 * reference to an absolute or compact IRI points outside it and is
 * never reported.
 */

import { UnresolvedReferenceError } from '../core/errors.js';
import { isAbsoluteIri, isBlankId } from '../jsonld/IriMapper.js';
import type { MetadataEntry, UnresolvedReference } from '../model/index.js';

function isInGraphTarget(target: string): boolean {
  return isBlankId(target) || (!isAbsoluteIri(target) && !target.includes(':'));
}

/**
 * Collect references to ids that neither an entry nor `knownIds` carries.
 */
export function findUnresolvedReferences(
  entries: readonly MetadataEntry[],
  knownIds: Iterable<string> = []
): UnresolvedReference[] {
  const known = new Set<string>(knownIds);
  for (const entry of entries) {
    known.add(entry.id);
  }

  const unresolved: UnresolvedReference[] = [];
  for (const entry of entries) {
    for (const field of Object.keys(entry.references)) {
      for (const target of entry.referenceList(field)) {
        if (!known.has(target) && isInGraphTarget(target)) {
          unresolved.push({ entryId: entry.id, field, target });
        }
      }
    }
  }
  return unresolved;
}

/**
 * Throw when any reference is unresolved.
 */
export function assertNoUnresolvedReferences(unresolved: readonly UnresolvedReference[]): void {
  if (unresolved.length === 0) {
    return;
  }
  const targets = [...new Set(unresolved.map((u) => u.target))];
  const first = unresolved[0];
  const detail = first ? ` (first: ${first.entryId}.${first.field} -> ${first.target})` : '';
  throw new UnresolvedReferenceError(
    `${unresolved.length} unresolved reference(s)${detail}`,
    targets
  );
}
