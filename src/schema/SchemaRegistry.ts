/**
 * Append-only store of type templates for one build session.
 *
 * This module handles:
 * - Indexing templates by id, in registration order
 * - Building the dependency graph between types
 * - Two-phase resolution of forward type references
 * - Detecting reference cycles (which are legal)
 *
 * Re-registering an id follows the configured duplicate policy.
 */

import { DuplicateTypeError, NotFoundError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { isAbsoluteIri, isBlankId } from '../jsonld/IriMapper.js';
import type { TypeDefinition } from '../model/index.js';
import { defineType, isTypeRef, templateToType, type TypeTemplateInput } from './TemplateBuilder.js';
import type {
  DuplicatePolicy,
  RegistryOptions,
  ResolutionResult,
  TypeDependencyGraph,
  TypeDependencyNode,
  TypeTemplate,
} from './types.js';

const log = createLogger('schema-registry');

/**
 * Local type ids live in this registry; compact and absolute IRIs
 * point at external vocabularies.
 */
function isLocalTypeId(id: string): boolean {
  return !id.includes(':') && !isAbsoluteIri(id) && !isBlankId(id);
}

/**
 * Type ids a template references, with the field that references each.
 */
function referencesOf(template: TypeTemplate): Array<{ target: string; via: string }> {
  const refs: Array<{ target: string; via: string }> = [];
  for (const parent of template.subClassOf) {
    refs.push({ target: parent, via: 'subClassOf' });
  }
  for (const field of template.fields) {
    if (isTypeRef(field.semanticType)) {
      refs.push({ target: field.semanticType.ref, via: field.name });
    }
  }
  return refs.filter((r) => isLocalTypeId(r.target));
}

/**
 * Manages registration, lookup and dependency
 * resolution of type templates.
 */
export class SchemaRegistry {
  private readonly templates: Map<string, TypeTemplate> = new Map();
  private readonly dependencyGraph: TypeDependencyGraph = new Map();
  readonly duplicatePolicy: DuplicatePolicy;

  constructor(options: RegistryOptions = {}) {
    this.duplicatePolicy = options.duplicatePolicy ?? 'overwrite';
  }

  /**
   * Store a template. An existing id is overwritten (keeping its
   * position in `list()`) or rejected, per the duplicate policy.
   */
  register(template: TypeTemplate): TypeTemplate {
    if (this.templates.has(template.id)) {
      if (this.duplicatePolicy === 'reject') {
        throw new DuplicateTypeError(template.id);
      }
      log.debug({ id: template.id }, 'Overwriting type template');
      this.unlink(template.id);
    }

    this.templates.set(template.id, template);
    this.link(template);
    return template;
  }

  /**
   * Validate a structural description and register it.
   */
  define(input: TypeTemplateInput): TypeTemplate {
    return this.register(defineType(input));
  }

  /**
   * Get a template by id.
   *
   * @throws NotFoundError when the id is not registered
   */
  get(id: string): TypeTemplate {
    const template = this.templates.get(id);
    if (template === undefined) {
      throw new NotFoundError('type', id);
    }
    return template;
  }

  find(id: string): TypeTemplate | undefined {
    return this.templates.get(id);
  }

  has(id: string): boolean {
    return this.templates.has(id);
  }

  get size(): number {
    return this.templates.size;
  }

  /**
   * All templates in registration order.
   */
  list(): TypeTemplate[] {
    return [...this.templates.values()];
  }

  listIds(): string[] {
    return [...this.templates.keys()];
  }

  /**
   * Remove a template. Types that referenced it become unresolved.
   */
  remove(id: string): boolean {
    if (!this.templates.has(id)) {
      return false;
    }
    this.unlink(id);
    this.templates.delete(id);
    // Keep incoming edges on the other nodes: those references now dangle
    return true;
  }

  clear(): void {
    this.templates.clear();
    this.dependencyGraph.clear();
  }

  /**
   * Type ids a type references directly.
   */
  getDependencies(id: string): string[] {
    const node = this.dependencyGraph.get(id);
    return node !== undefined ? [...node.dependsOn] : [];
  }

  /**
   * Type ids that reference a given type directly.
   */
  getDependents(id: string): string[] {
    const node = this.dependencyGraph.get(id);
    return node !== undefined ? [...node.dependedBy] : [];
  }

  /**
   * Registered types reachable from `id`, breadth-first, excluding `id`.
   */
  getDependencyOrder(id: string): string[] {
    this.get(id);
    const order: string[] = [];
    const visited = new Set<string>([id]);
    const queue: string[] = [id];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      for (const depId of this.getDependencies(current)) {
        if (!visited.has(depId) && this.templates.has(depId)) {
          visited.add(depId);
          order.push(depId);
          queue.push(depId);
        }
      }
    }
    return order;
  }

  /**
   * Check reference resolution status.
   * Returns information about unresolved refs and cycles.
   */
  checkResolution(): ResolutionResult {
    const unresolved: string[] = [];
    const cycles: string[][] = [];

    for (const [id, node] of this.dependencyGraph) {
      for (const depId of node.dependsOn) {
        if (!this.templates.has(depId)) {
          unresolved.push(`${id} -> ${depId}`);
        }
      }
    }

    // Detect cycles using DFS
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const path: string[] = [];

    const detectCycles = (id: string): void => {
      visited.add(id);
      recursionStack.add(id);
      path.push(id);

      for (const depId of this.getDependencies(id)) {
        if (!this.templates.has(depId)) {
          continue;
        }
        if (recursionStack.has(depId)) {
          cycles.push([...path.slice(path.indexOf(depId)), depId]);
        } else if (!visited.has(depId)) {
          detectCycles(depId);
        }
      }

      path.pop();
      recursionStack.delete(id);
    };

    for (const id of this.templates.keys()) {
      if (!visited.has(id)) {
        detectCycles(id);
      }
    }

    return {
      resolved: unresolved.length === 0,
      unresolved,
      cycles,
    };
  }

  /**
   * Resolve every template into a TypeDefinition, in registration order.
   *
   * Phase one takes the complete set of declared ids; phase two checks
   * every local reference against it.
   *
   * @param knownIds - Types declared outside the registry
   * @throws NotFoundError for the first reference to an undeclared type
   */
  resolveTypes(knownIds: Iterable<string> = []): TypeDefinition[] {
    const declared = new Set([...this.templates.keys(), ...knownIds]);

    for (const template of this.templates.values()) {
      for (const { target, via } of referencesOf(template)) {
        if (!declared.has(target)) {
          throw new NotFoundError('type', target, `referenced by ${template.id}.${via}`);
        }
      }
    }

    const types = this.list().map((template) => templateToType(template));
    log.debug({ count: types.length }, 'Resolved type templates');
    return types;
  }

  /**
   * Resolve a single template; its references must be registered.
   */
  resolveType(id: string): TypeDefinition {
    const template = this.get(id);
    for (const { target, via } of referencesOf(template)) {
      if (!this.templates.has(target)) {
        throw new NotFoundError('type', target, `referenced by ${template.id}.${via}`);
      }
    }
    return templateToType(template);
  }

  private link(template: TypeTemplate): void {
    const node: TypeDependencyNode = {
      id: template.id,
      dependsOn: new Set(),
      dependedBy: new Set(),
    };
    for (const { target } of referencesOf(template)) {
      // Self-references are legal and not a dependency
      if (target !== template.id) {
        node.dependsOn.add(target);
      }
    }
    this.dependencyGraph.set(template.id, node);

    for (const depId of node.dependsOn) {
      this.dependencyGraph.get(depId)?.dependedBy.add(template.id);
    }
    for (const [otherId, otherNode] of this.dependencyGraph) {
      if (otherId !== template.id && otherNode.dependsOn.has(template.id)) {
        node.dependedBy.add(otherId);
      }
    }
  }

  private unlink(id: string): void {
    const node = this.dependencyGraph.get(id);
    if (node === undefined) {
      return;
    }
    for (const depId of node.dependsOn) {
      this.dependencyGraph.get(depId)?.dependedBy.delete(id);
    }
    this.dependencyGraph.delete(id);
  }
}

/**
 * Create a new SchemaRegistry instance.
 */
export function createSchemaRegistry(options: RegistryOptions = {}): SchemaRegistry {
  return new SchemaRegistry(options);
}
