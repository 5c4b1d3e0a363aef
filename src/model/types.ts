/**
 * Shared model types.
 */

/**
 * Class id of an opaque entry whose @type could not be resolved.
 */
export const UNKNOWN_CLASS_ID = 'unknown';

/**
 * A reference field holds one target id or an ordered list of them.
 */
export type EntryReference = string | readonly string[];

/**
 * A reference from an entry to an id no entry carries.
 */
export interface UnresolvedReference {
  /** Entry holding the reference */
  entryId: string;
  /** Field name on that entry */
  field: string;
  /** The dangling target id */
  target: string;
}
