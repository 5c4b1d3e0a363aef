/**
 * N-Triples serialization through n3's Writer.
 */

import { Writer, type Quad } from 'n3';

/**
 * Serialize triples as N-Triples, one statement per line, in input order.
 */
export function toNTriples(triples: readonly Quad[]): string {
  const writer = new Writer({ format: 'N-Triples' });
  return writer.quadsToString([...triples]);
}

/**
 * N-Triples with lines sorted; equal graphs with equal blank node
 * labels give equal strings.
 */
export function canonicalNTriples(triples: readonly Quad[]): string {
  const lines = toNTriples(triples)
    .split('\n')
    .filter((line) => line.length > 0)
    .sort();
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
