/**
 * Serialize a triple list as a flattened JSON-LD document.
 *
 * The output is deterministic: same triples in the same order, same bytes.
 * Nodes are grouped Types, Properties, Restrictions, then everything else,
 * each group in first-appearance order; predicates keep first-appearance
 * order within a node.
 */

import type { Quad } from 'n3';
import { OWL, RDF, RDFS, XSD } from '../core/vocabulary.js';
import { buildContext } from './ContextBuilder.js';
import { IriMapper } from './IriMapper.js';
import type { CodecOptions, JsonLdDocument, JsonLdNode, JsonLdValue } from './types.js';

/**
 * Node group rank by rdf:type; untyped and other nodes rank last.
 */
const OTHER_RANK = 3;

const RANK_BY_TYPE: ReadonlyMap<string, number> = new Map([
  [OWL.Class, 0],
  [RDFS.Class, 0],
  [RDF.Property, 1],
  [OWL.ObjectProperty, 1],
  [OWL.DatatypeProperty, 1],
  [OWL.Restriction, 2],
]);

interface NodeDraft {
  id: string;
  types: string[];
  rank: number;
  values: Map<string, JsonLdValue[]>;
}

/**
 * Compacts IRIs against a mapper and tracks which
 * prefixes the document needs.
 */
export class JsonLdGenerator {
  private readonly iris: IriMapper;
  private readonly usedPrefixes = new Set<string>();

  constructor(options: CodecOptions = {}) {
    this.iris = options.iris ?? new IriMapper();
  }

  generate(triples: readonly Quad[]): JsonLdDocument {
    this.usedPrefixes.clear();
    const drafts = new Map<string, NodeDraft>();

    for (const triple of triples) {
      const subjectId =
        triple.subject.termType === 'BlankNode'
          ? `_:${triple.subject.value}`
          : this.compact(triple.subject.value);

      let draft = drafts.get(subjectId);
      if (!draft) {
        draft = { id: subjectId, types: [], rank: OTHER_RANK, values: new Map() };
        drafts.set(subjectId, draft);
      }

      if (triple.predicate.value === RDF.type && triple.object.termType === 'NamedNode') {
        const rank = RANK_BY_TYPE.get(triple.object.value);
        if (rank !== undefined && rank < draft.rank) {
          draft.rank = rank;
        }
        draft.types.push(this.compact(triple.object.value));
        continue;
      }

      const key = this.compact(triple.predicate.value);
      const values = draft.values.get(key) ?? [];
      values.push(this.toValue(triple.object));
      draft.values.set(key, values);
    }

    // Array.prototype.sort is stable
    const ordered = [...drafts.values()].sort((a, b) => a.rank - b.rank);

    return {
      '@context': buildContext(this.iris, this.usedPrefixes),
      '@graph': ordered.map((draft) => this.toNode(draft)),
    };
  }

  private toNode(draft: NodeDraft): JsonLdNode {
    const node: JsonLdNode = { '@id': draft.id };
    if (draft.types.length === 1) {
      node['@type'] = draft.types[0];
    } else if (draft.types.length > 1) {
      node['@type'] = draft.types;
    }
    for (const [key, values] of draft.values) {
      node[key] = values.length === 1 ? values[0] : values;
    }
    return node;
  }

  private compact(iri: string): string {
    const result = this.iris.compact(iri);
    if (result.prefix !== undefined) {
      this.usedPrefixes.add(result.prefix);
    }
    return result.value;
  }

  private toValue(term: Quad['object']): JsonLdValue {
    switch (term.termType) {
      case 'NamedNode':
        return { '@id': this.compact(term.value) };
      case 'BlankNode':
        return { '@id': `_:${term.value}` };
      case 'Literal':
        return this.literalValue(term.value, term.datatype.value);
      default:
        return { '@id': term.value };
    }
  }

  /**
   * Strings, canonical integers and booleans become native JSON;
   * every other literal is a value object.
   */
  private literalValue(lexical: string, datatype: string): JsonLdValue {
    if (datatype === XSD.string) {
      return lexical;
    }
    if (datatype === XSD.integer) {
      const parsed = Number(lexical);
      if (Number.isSafeInteger(parsed) && String(parsed) === lexical) {
        return parsed;
      }
    }
    if (datatype === XSD.boolean && (lexical === 'true' || lexical === 'false')) {
      return lexical === 'true';
    }
    return { '@value': lexical, '@type': this.compact(datatype) };
  }
}

/**
 * Serialize triples as a JSON-LD document.
 */
export function toDocument(triples: readonly Quad[], options: CodecOptions = {}): JsonLdDocument {
  return new JsonLdGenerator(options).generate(triples);
}
