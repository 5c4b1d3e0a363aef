/**
 * Flattens nested, possibly cyclic instance graphs
 * into one MetadataEntry per distinct identity.
 *
 * Every identity gets a slot on first sight, before its fields are
 * read, holding a placeholder id (`_:placeholder-<n>`). Neighbours that
 * reach the object while it is still being extracted reference the
 * placeholder; finishing the object rewrites those references to its
 * final id. An identity seen again reuses its slot, so extraction
 * terminates on cycles.
 */

import { IdentityMissingError, InvalidDefinitionError, NotFoundError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import {
  MetadataEntry,
  isLiteralValue,
  type EntryReference,
  type LiteralValue,
  type PropertyValue,
} from '../model/index.js';
import { findUnresolvedReferences } from '../validation/ReferenceChecker.js';
import { createPlainObjectExtractor, isInstance } from './extractors.js';
import type { InstanceExtractor, ResolveResult, ResolverOptions } from './types.js';

const log = createLogger('resolver');

const PLACEHOLDER_PREFIX = '_:placeholder-';

interface DraftReference {
  ids: string[];
  isList: boolean;
}

interface Slot {
  identity: string;
  placeholder: string;
  classId: string;
  finalized: boolean;
  /** Placeholder was handed to a neighbour */
  placeholderUsed: boolean;
  properties: Map<string, PropertyValue>;
  references: Map<string, DraftReference>;
  /** Entry seeded through addEntry */
  seeded?: MetadataEntry;
}

interface AddLog {
  identities: string[];
  objects: object[];
}

export function isPlaceholderId(id: string): boolean {
  return id.startsWith(PLACEHOLDER_PREFIX);
}

/**
 * One resolver per build session.
 */
export class InstanceResolver {
  private readonly extractor: InstanceExtractor;
  private readonly isKnownClass: ((classId: string) => boolean) | undefined;
  private readonly slots: Map<string, Slot> = new Map();
  private readonly identityByObject: WeakMap<object, string> = new WeakMap();
  private placeholderCount = 0;
  /** Slots and object identities created by the add() in progress */
  private created: AddLog | undefined;

  constructor(options: ResolverOptions = {}) {
    this.extractor = options.extractor ?? createPlainObjectExtractor();
    this.isKnownClass = options.isKnownClass;
  }

  /**
   * Add an instance and everything reachable from it.
   * A failed add leaves the resolver as it was.
   *
   * @returns The instance's entry id
   */
  add(instance: object, classId?: string): string {
    const created: AddLog = { identities: [], objects: [] };
    this.created = created;
    try {
      return this.visit(instance, classId, '');
    } catch (err) {
      created.identities.forEach((identity) => this.slots.delete(identity));
      created.objects.forEach((object) => this.identityByObject.delete(object));
      log.debug({ rolledBack: created.identities.length }, 'Rolled back failed add');
      throw err;
    } finally {
      this.created = undefined;
    }
  }

  /**
   * Seed an already-final entry.
   */
  addEntry(entry: MetadataEntry): void {
    if (this.slots.has(entry.id)) {
      throw new InvalidDefinitionError(`entry '${entry.id}' already exists`);
    }
    this.slots.set(entry.id, {
      identity: entry.id,
      placeholder: this.nextPlaceholder(),
      classId: entry.classId,
      finalized: true,
      placeholderUsed: false,
      properties: new Map(),
      references: new Map(),
      seeded: entry,
    });
  }

  has(id: string): boolean {
    return this.slots.has(id);
  }

  get size(): number {
    return this.slots.size;
  }

  /**
   * Entries in first-sight order plus references to ids no entry carries.
   */
  resolve(): ResolveResult {
    const entries = [...this.slots.values()].map((slot) => this.toEntry(slot));
    const unresolvedReferences = findUnresolvedReferences(entries);
    log.debug(
      { entries: entries.length, unresolved: unresolvedReferences.length },
      'Resolved instances'
    );
    return { entries, unresolvedReferences };
  }

  private visit(instance: object, hint: string | undefined, path: string): string {
    const known = this.identityByObject.get(instance);
    if (known !== undefined) {
      return this.entryIdFor(known);
    }

    const classId = this.extractor.classOf(instance, hint);
    if (this.isKnownClass && !this.isKnownClass(classId)) {
      throw new NotFoundError('type', classId, `instance at '${path || '<root>'}'`);
    }
    const identity = this.extractor.identityOf(instance, classId);
    if (identity === undefined) {
      throw new IdentityMissingError(classId, path);
    }
    this.identityByObject.set(instance, identity);
    this.created?.objects.push(instance);
    if (this.slots.has(identity)) {
      return this.entryIdFor(identity);
    }

    const slot: Slot = {
      identity,
      placeholder: this.nextPlaceholder(),
      classId,
      finalized: false,
      placeholderUsed: false,
      properties: new Map(),
      references: new Map(),
    };
    this.slots.set(identity, slot);
    this.created?.identities.push(identity);

    for (const field of this.extractor.fieldsOf(instance, classId)) {
      const fieldPath = path ? `${path}.${field.name}` : field.name;
      const { value } = field;
      if (value === undefined || value === null || (Array.isArray(value) && value.length === 0)) {
        continue;
      }

      if (field.isReference) {
        const isList = Array.isArray(value);
        const items: unknown[] = Array.isArray(value) ? value : [value];
        const ids = items.map((item, index) => {
          const itemPath = isList ? `${fieldPath}[${index}]` : fieldPath;
          if (typeof item === 'string') {
            return item;
          }
          if (isInstance(item)) {
            return this.visit(item, field.targetClass, itemPath);
          }
          throw new InvalidDefinitionError('reference must be an object or an id', itemPath);
        });
        slot.references.set(field.name, { ids, isList });
      } else {
        slot.properties.set(field.name, this.literalValue(value, fieldPath));
      }
    }

    this.finalize(slot);
    return identity;
  }

  private literalValue(value: unknown, path: string): PropertyValue {
    if (isLiteralValue(value)) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item, index): LiteralValue => {
        if (!isLiteralValue(item)) {
          throw new InvalidDefinitionError('list item is not a literal', `${path}[${index}]`);
        }
        return item;
      });
    }
    throw new InvalidDefinitionError('value is not a literal', path);
  }

  /**
   * Id to use for a reference to `identity` right now.
   */
  private entryIdFor(identity: string): string {
    const slot = this.slots.get(identity);
    if (slot === undefined || slot.finalized) {
      return identity;
    }
    slot.placeholderUsed = true;
    return slot.placeholder;
  }

  private finalize(slot: Slot): void {
    slot.finalized = true;
    if (!slot.placeholderUsed) {
      return;
    }
    for (const other of this.slots.values()) {
      for (const reference of other.references.values()) {
        reference.ids = reference.ids.map((id) => (id === slot.placeholder ? slot.identity : id));
      }
    }
  }

  private toEntry(slot: Slot): MetadataEntry {
    if (slot.seeded) {
      return slot.seeded;
    }
    const references: Record<string, EntryReference> = {};
    for (const [name, reference] of slot.references) {
      const leaked = reference.ids.find(isPlaceholderId);
      if (leaked !== undefined) {
        throw new InvalidDefinitionError(`unfinished reference ${leaked}`, `${slot.identity}.${name}`);
      }
      const [first] = reference.ids;
      references[name] = !reference.isList && first !== undefined ? first : reference.ids;
    }
    return new MetadataEntry({
      id: slot.identity,
      classId: slot.classId,
      properties: Object.fromEntries(slot.properties),
      references,
    });
  }

  private nextPlaceholder(): string {
    this.placeholderCount += 1;
    return `${PLACEHOLDER_PREFIX}${this.placeholderCount}`;
  }
}
