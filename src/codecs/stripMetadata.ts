import type { Value } from '../Value';
import type { DecodedNode } from './DecodedNode';

/**
 * Walk a DecodedNode tree and reconstruct the plain value
 * identical to decode() output.
 */
export function stripMetadata(node: DecodedNode): Value {
  switch (node.kind) {
    case 'byteString':
      return { kind: 'byteString', bytes: node.value };
    case 'integer':
      return { kind: 'integer', value: node.value };
    case 'list':
      return { kind: 'list', items: node.value.map(item => stripMetadata(item)) };
    case 'dictionary':
      return {
        kind: 'dictionary',
        entries: node.value.map(entry => ({ key: entry.key.value, value: stripMetadata(entry.value) })),
      };
  }
}
