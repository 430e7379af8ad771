import TwoFourTree, { defaultComparator, simpleComparator, MaxKeys } from './two-four-tree';
import SortedArray from './sorted-array';
import { addToBoth, compareNumbers, deleteFromBoth, expectTreeEqualTo, randInt } from './test/shared';

var test: (name:string,f:()=>void)=>void = it;

describe('defaultComparator', () =>
{
  const dateA = new Date(Date.UTC(96, 1, 2, 3, 4, 5));
  const dateA2 = new Date(Date.UTC(96, 1, 2, 3, 4, 5));
  const dateB = new Date(Date.UTC(96, 1, 2, 3, 4, 6));
  const values = [
    dateA,
    dateA2,
    dateB,
    '24x',
    '0',
    '1',
    'String',
    "NaN",
    NaN,
    Infinity,
    -0,
    -Infinity,
    1,
    10,
    2,
    true,
    false,
    null,
  ];
  const sorted = [NaN, -Infinity, -10, -1, 0, 1, 2, 10, Infinity];
  testComparison(defaultComparator, sorted, values, [[dateA, dateA2]]);

  test('Date compares by time', () => {
    expect(defaultComparator(dateA, dateB)).toBeLessThan(0);
    expect(defaultComparator(dateB, dateA)).toBeGreaterThan(0);
  });
  test('+0 and -0 are equal', () => {
    expect(defaultComparator(0, -0)).toBe(0);
  });
  test('numbers sort before strings', () => {
    expect(defaultComparator<number | string>(99, '1')).toBeLessThan(0);
  });
});

describe('simpleComparator with strings', () =>
{
  testComparison<string>(simpleComparator, ['0', '1', '10', '3', 'String', 'a'], ['24x', '0', '1', '3', 'String', '10'], []);
});

/**
 * Tests a comparison function, ensuring it produces a strict ordering over the provided values.
 * Additionally confirms that the comparison function has the correct definition of equality via expectedDuplicates.
 */
function testComparison<T>(comparison: (a: T, b: T) => number, inOrder: T[], values: T[], expectedDuplicates: [T, T][] = []) {
  function compare(a: T, b: T): number {
    const v = comparison(a, b);
    expect(v === v).toEqual(true); // Not NaN
    return Math.sign(v);
  }

  test('comparison has correct order', () => {
    expect([...inOrder].sort(comparison)).toEqual(inOrder);
  });

  test('comparison differentiates values', () => {
    const duplicates: [T, T][] = [];
    for (let i = 0; i < values.length; i++)
      for (let j = i + 1; j < values.length; j++)
        if (compare(values[i], values[j]) === 0)
          duplicates.push([values[i], values[j]]);
    expect(duplicates).toEqual(expectedDuplicates);
  });

  test('comparison is irreflexive, transitive and asymmetric', () => {
    const irreflexive: T[] = [], transitive: T[][] = [], asymmetric: T[][] = [];
    for (const a of values) {
      if (compare(a, a) !== 0) irreflexive.push(a);
      for (const b of values) {
        for (const c of values)
          if (compare(a, b) < 0 && compare(b, c) < 0 && compare(a, c) !== -1)
            transitive.push([a, b, c]);
        if (compare(a, b) !== -compare(b, a)) asymmetric.push([a, b]);
      }
    }
    expect(irreflexive).toEqual([]);
    expect(transitive).toEqual([]);
    expect(asymmetric).toEqual([]);
  });
}

describe('Simple tests', () =>
{
  test('A few insertions', () => {
    const keys = [6, 7, 5, 2, 4, 1, 3, 8];
    const tree = new TwoFourTree<number>(keys);
    const list = new SortedArray(keys, compareNumbers);
    expect(tree.toArray()).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expectTreeEqualTo(tree, list);
  });

  test('Empty tree', () => {
    const tree = new TwoFourTree<number>();
    expect(tree.size).toBe(0);
    expect(tree.isEmpty).toBe(true);
    expect(tree.root).toBeUndefined();
    expect(tree.minKey()).toBeUndefined();
    expect(tree.maxKey()).toBeUndefined();
    expect(tree.toArray()).toEqual([]);
    expect(tree.delete(1)).toBe(false);
    expect(tree.validate(jest.fn())).toBe(true);
  });

  test('Duplicate insert is rejected', () => {
    const tree = new TwoFourTree([1, 2, 3]);
    expect(tree.add(2)).toBe(false);
    expect(tree.size).toBe(3);
  });

  test('Root splits when it overflows', () => {
    const tree = new TwoFourTree<number>();
    for (let i = 1; i <= MaxKeys; i++)
      tree.add(i);
    expect(tree.root?.isLeaf).toBe(true);
    tree.add(MaxKeys + 1);
    expect(tree.root?.keys).toEqual([2]);
    expect(tree.root?.children.map(c => c.keys)).toEqual([[1], [3, 4]]);
    expect(tree.render()).toBe('   [2]    \n[1] [3, 4] \n');
  });

  test('Deleting from an internal node uses the predecessor', () => {
    const tree = new TwoFourTree([7, 10, 12, 15, 3]);
    expect(tree.delete(10)).toBe(true);
    expect(tree.root?.keys).toEqual([7]);
    expect(tree.root?.children.map(c => c.keys)).toEqual([[3], [12, 15]]);
    tree.checkValid();
  });

  test('Deletion borrows from a sibling with a spare key', () => {
    const tree = new TwoFourTree([7, 10, 12, 15, 3]);
    tree.delete(12);
    tree.delete(15);
    expect(tree.root?.keys).toEqual([7]);
    expect(tree.root?.children.map(c => c.keys)).toEqual([[3], [10]]);
    tree.checkValid();
  });

  test('Deletion merges and shrinks the root', () => {
    const tree = new TwoFourTree([1, 2, 3, 4]);
    tree.delete(4);
    tree.delete(3);
    expect(tree.root?.isLeaf).toBe(true);
    expect(tree.root?.keys).toEqual([1, 2]);
    expect(tree.root?.parent).toBeUndefined();
    tree.checkValid();
  });

  test('Deleting every key empties the tree', () => {
    const tree = new TwoFourTree([5, 3, 8]);
    for (const k of [3, 5, 8])
      expect(tree.delete(k)).toBe(true);
    expect(tree.root).toBeUndefined();
    expect(tree.size).toBe(0);
    expect(tree.render()).toBe('');
  });

  test('Custom comparator', () => {
    const tree = new TwoFourTree(['b', 'C', 'a', 'D'], (a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
    expect(tree.toArray()).toEqual(['a', 'b', 'C', 'D']);
    expect(tree.has('c')).toBe(true);
    expect(tree.add('d')).toBe(false);
    tree.checkValid();
  });

  test('NaN key is rejected by a comparator that cannot order it', () => {
    const tree = new TwoFourTree<number>([1], (a, b) => a - b);
    expect(() => tree.add(NaN)).toThrow('2-4 tree: NaN was used as a key');
  });

  test('Iteration and forEach', () => {
    const tree = new TwoFourTree([4, 2, 9, 1]);
    expect([...tree]).toEqual([1, 2, 4, 9]);
    expect(Array.from(tree.keysReversed())).toEqual([9, 4, 2, 1]);
    const seen: number[] = [];
    tree.forEach(k => seen.push(k));
    expect(seen).toEqual([1, 2, 4, 9]);
    expect(tree.toString()).toBe('1,2,4,9');
    expect(tree.minKey()).toBe(1);
    expect(tree.maxKey()).toBe(9);
  });

  test('clear', () => {
    const tree = new TwoFourTree([1, 2, 3, 4, 5]);
    tree.clear();
    expect(tree.size).toBe(0);
    expect(tree.toArray()).toEqual([]);
  });
});

describe('Random insertions and deletions', () =>
{
  for (const size of [8, 64, 512]) {
    const tree = new TwoFourTree<number>();
    const list = new SortedArray<number>(undefined, compareNumbers);

    test(`Insert randomly [size ${size}]`, () => {
      while (tree.size < size) {
        addToBoth(tree, list, randInt(size * 2));
        expect(tree.size).toEqual(list.size);
      }
      expectTreeEqualTo(tree, list);
      expect(tree.validate(jest.fn())).toBe(true);
    });

    test(`Delete randomly [size ${size}]`, () => {
      while (tree.size > size / 2) {
        deleteFromBoth(tree, list, randInt(size * 2));
        expect(tree.size).toEqual(list.size);
      }
      expectTreeEqualTo(tree, list);
    });

    test(`Mixed operations keep the tree valid [size ${size}]`, () => {
      for (let i = 0; i < size * 2; i++) {
        const key = randInt(size * 2);
        if (randInt(2) === 0)
          addToBoth(tree, list, key);
        else
          deleteFromBoth(tree, list, key);
        if (i % 16 === 0)
          expectTreeEqualTo(tree, list);
      }
      expectTreeEqualTo(tree, list);
      expect(tree.validate(jest.fn())).toBe(true);
    });

    test(`Render and has after random operations [size ${size}]`, () => {
      const diagram = tree.render();
      expect(diagram).toBe(tree.render());
      expect(diagram === '').toBe(tree.size === 0);
      for (const key of list.getArray())
        expect(tree.has(key)).toBe(true);
    });
  }
});
