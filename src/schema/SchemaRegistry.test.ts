/**
 * Tests for SchemaRegistry module.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateTypeError, NotFoundError } from '../core/errors.js';
import { SchemaRegistry, createSchemaRegistry } from './SchemaRegistry.js';
import type { TypeTemplateInput } from './TemplateBuilder.js';

// Helper to create a template whose fields reference other types
function refTemplate(id: string, refs: Record<string, string> = {}): TypeTemplateInput {
  return {
    id,
    fields: Object.entries(refs).map(([name, target]) => ({ name, semanticType: { ref: target } })),
  };
}

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = createSchemaRegistry();
  });

  describe('basic operations', () => {
    it('starts empty', () => {
      expect(registry.size).toBe(0);
      expect(registry.list()).toEqual([]);
    });

    it('registers and retrieves a template', () => {
      const template = registry.define({ id: 'Person', fields: [{ name: 'name', semanticType: 'string' }] });

      expect(registry.size).toBe(1);
      expect(registry.has('Person')).toBe(true);
      expect(registry.get('Person')).toBe(template);
    });

    it('throws for an unknown id', () => {
      expect(() => registry.get('Nope')).toThrow(NotFoundError);
      expect(() => registry.get('Nope')).toThrow("Unknown type 'Nope'");
      expect(registry.find('Nope')).toBeUndefined();
    });

    it('lists templates in registration order', () => {
      registry.define({ id: 'B' });
      registry.define({ id: 'A' });
      registry.define({ id: 'C' });

      expect(registry.listIds()).toEqual(['B', 'A', 'C']);
    });

    it('removes a template', () => {
      registry.define({ id: 'A' });

      expect(registry.remove('A')).toBe(true);
      expect(registry.remove('A')).toBe(false);
      expect(registry.size).toBe(0);
    });

    it('clears all templates', () => {
      registry.define({ id: 'A' });
      registry.define({ id: 'B' });
      registry.clear();

      expect(registry.size).toBe(0);
      expect(registry.getDependencies('A')).toEqual([]);
    });
  });

  describe('duplicate policy', () => {
    it('overwrites by default and keeps the first slot', () => {
      registry.define({ id: 'A', label: 'first' });
      registry.define({ id: 'B' });
      registry.define({ id: 'A', label: 'second' });

      expect(registry.listIds()).toEqual(['A', 'B']);
      expect(registry.get('A').label).toBe('second');
    });

    it('rejects duplicates when configured', () => {
      const strict = createSchemaRegistry({ duplicatePolicy: 'reject' });
      strict.define({ id: 'A' });

      expect(() => strict.define({ id: 'A' })).toThrow(DuplicateTypeError);
      expect(() => strict.define({ id: 'A' })).toThrow("Type 'A' is already registered");
    });

    it('relinks dependencies on overwrite', () => {
      registry.define(refTemplate('A', { b: 'B' }));
      registry.define({ id: 'B' });
      registry.define(refTemplate('A', { c: 'C' }));
      registry.define({ id: 'C' });

      expect(registry.getDependencies('A')).toEqual(['C']);
      expect(registry.getDependents('B')).toEqual([]);
      expect(registry.getDependents('C')).toEqual(['A']);
    });
  });

  describe('dependency tracking', () => {
    beforeEach(() => {
      registry.define(
        refTemplate('Person', { knows: 'Person', employer: 'Organization', homepage: 'schema:URL' })
      );
      registry.define(refTemplate('Organization', { ceo: 'Person' }));
    });

    it('tracks local dependencies, excluding self-references', () => {
      expect(registry.getDependencies('Person')).toEqual(['Organization']);
      expect(registry.getDependencies('Organization')).toEqual(['Person']);
    });

    it('tracks dependents in both directions', () => {
      expect(registry.getDependents('Organization')).toEqual(['Person']);
      expect(registry.getDependents('Person')).toEqual(['Organization']);
    });

    it('reports cycles without treating them as errors', () => {
      const result = registry.checkResolution();

      expect(result.resolved).toBe(true);
      expect(result.unresolved).toEqual([]);
      expect(result.cycles).toEqual([['Person', 'Organization', 'Person']]);
    });

    it('reports dangling references after a removal', () => {
      registry.remove('Organization');

      expect(registry.checkResolution()).toEqual({
        resolved: false,
        unresolved: ['Person -> Organization'],
        cycles: [],
      });
    });
  });

  describe('getDependencyOrder', () => {
    it('walks dependencies breadth-first', () => {
      registry.define(refTemplate('A', { b: 'B', d: 'D' }));
      registry.define(refTemplate('B', { c: 'C' }));
      registry.define({ id: 'C' });
      registry.define({ id: 'D' });

      expect(registry.getDependencyOrder('A')).toEqual(['B', 'D', 'C']);
      expect(registry.getDependencyOrder('C')).toEqual([]);
    });

    it('throws for an unknown id', () => {
      expect(() => registry.getDependencyOrder('Nope')).toThrow(NotFoundError);
    });
  });

  describe('resolveTypes', () => {
    it('accepts references to types registered later', () => {
      registry.define(refTemplate('Person', { employer: 'Organization' }));
      registry.define({ id: 'Organization' });

      const types = registry.resolveTypes();
      expect(types.map((t) => t.id)).toEqual(['Person', 'Organization']);
      expect(types[0]?.getProperty('employer')?.rangeIncludes).toEqual(['Organization']);
    });

    it('fails on a reference to an undeclared type', () => {
      registry.define(refTemplate('X', { y: 'Missing' }));

      expect(() => registry.resolveTypes()).toThrow("Unknown type 'Missing': referenced by X.y");
    });

    it('checks parent types too', () => {
      registry.define({ id: 'Employee', subClassOf: ['Person'] });

      expect(() => registry.resolveTypes()).toThrow("Unknown type 'Person': referenced by Employee.subClassOf");
    });

    it('accepts ids declared outside the registry', () => {
      registry.define(refTemplate('X', { y: 'External' }));

      expect(registry.resolveTypes(['External']).map((t) => t.id)).toEqual(['X']);
    });

    it('resolves a single type', () => {
      registry.define(refTemplate('X', { y: 'Y' }));

      expect(() => registry.resolveType('X')).toThrow("Unknown type 'Y': referenced by X.y");
      registry.define({ id: 'Y' });
      expect(registry.resolveType('X').id).toBe('X');
    });
  });
});
