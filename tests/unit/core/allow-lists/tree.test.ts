import { describe, it, expect } from 'vitest';
import { collectStrings, toTreeNode } from '../../../../src/core/allow-lists/tree.js';

describe('toTreeNode', () => {
  it('should tag each shape', () => {
    expect(toTreeNode('a')).toEqual({ kind: 'string', value: 'a' });
    expect(toTreeNode(['a'])).toEqual({ kind: 'sequence', items: ['a'] });
    expect(toTreeNode({ a: 1 })).toEqual({ kind: 'mapping', entries: [['a', 1]] });
    expect(toTreeNode(5)).toEqual({ kind: 'other', value: 5 });
    expect(toTreeNode(null)).toEqual({ kind: 'other', value: null });
  });
});

describe('collectStrings', () => {
  it('should collect keys, values and list entries in document order', () => {
    const tree = {
      compute: ['vm-scale-set', 'aks-cluster'],
      storage: { blob: ['storage-account'], queue: 'queue-service' },
    };

    expect(collectStrings(tree)).toEqual([
      'compute',
      'vm-scale-set',
      'aks-cluster',
      'storage',
      'blob',
      'storage-account',
      'queue',
      'queue-service',
    ]);
  });

  it('should skip numbers, booleans and nulls', () => {
    expect(collectStrings(['a', 1, true, null, ['b', [false, 'c']]])).toEqual(['a', 'b', 'c']);
  });

  it('should return a lone string', () => {
    expect(collectStrings('only')).toEqual(['only']);
  });
});
