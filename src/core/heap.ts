
import { naturalOrder, type Comparator } from './compare.js';
import { TreeNode } from './node.js';
import { invariant } from '../utils/invariant.js';

export interface HeapOptions<T> {
  /** Total ordering on values. Defaults to natural order for numbers, strings and bigints. */
  compare?: Comparator<T>;
}

export interface HeapStats {
  size: number;
  trees: number;
  maxRootDegree: number;
  pushes: number;
  pops: number;
  merges: number;
  consolidations: number;
  links: number;
}

const PHI = 1.61803;

/** Slots needed to bucket roots by degree for a heap of `n` elements. */
export function degreeBucketCount(n: number): number {
  if (n <= 1) return 1;
  return Math.ceil(Math.log(n) / Math.log(PHI)) + 1;
}

/**
 * Compare-and-promote rule shared by push and the consolidation sweep: the
 * smaller-or-equal tree becomes the min, the loser is appended to `roots`.
 * Returns the new min.
 */
function foldRoot<T>(
  min: TreeNode<T> | undefined,
  roots: TreeNode<T>[],
  tree: TreeNode<T>,
  compare: Comparator<T>,
): TreeNode<T> {
  if (!min) return tree;
  if (TreeNode.isSmallerOrEqual(tree, min, compare)) {
    roots.push(min);
    return tree;
  }
  roots.push(tree);
  return min;
}

/**
 * Fibonacci heap (min). push and merge are O(1); pop is O(log n) amortized.
 * The tree holding the minimum is kept apart from the root list.
 */
export class FibonacciHeap<T> {
  private roots: TreeNode<T>[] = [];
  private min?: TreeNode<T>;
  private _size = 0;
  private readonly compare: Comparator<T>;
  private _pushes = 0;
  private _pops = 0;
  private _merges = 0;
  private _consolidations = 0;
  private _links = 0;

  constructor(opts: HeapOptions<T> = {}) {
    this.compare = opts.compare ?? naturalOrder;
  }

  get size(): number { return this._size; }

  isEmpty(): boolean { return this._size === 0; }

  /** Smallest value without removing it. */
  peek(): T | undefined { return this.min?.payload; }

  push(value: T): void {
    this.insertTree(new TreeNode(value));
    this._size++;
    this._pushes++;
  }

  /**
   * Melds two heaps. Both operands are consumed: the returned heap owns every
   * tree, and the other operand is left empty.
   */
  static merge<T>(a: FibonacciHeap<T>, b: FibonacciHeap<T>): FibonacciHeap<T> {
    invariant(a !== b, 'cannot merge a heap with itself');
    if (b.isEmpty()) { b.reset(); return a; }
    if (a.isEmpty()) { a.reset(); return b; }
    const aMin = a.min;
    const bMin = b.min;
    invariant(aMin && bMin, 'non-empty heap without a min tree');

    // every comparison runs before either heap is touched
    const rightWins = TreeNode.isSmallerOrEqual(bMin, aMin, a.compare);
    if (rightWins) {
      for (const r of b.roots) a.roots.push(r);
      a.roots.push(aMin);
      a.min = bMin;
    } else {
      // b's min goes back in under push's rule; its subtree joins the roots
      const moved = new TreeNode(bMin.payload);
      const movedFirst = TreeNode.isSmallerOrEqual(moved, aMin, a.compare);
      for (const r of b.roots) a.roots.push(r);
      if (movedFirst) {
        a.roots.push(aMin);
        a.min = moved;
      } else {
        a.roots.push(moved);
      }
      for (const c of bMin.extract().children) a.roots.push(c);
    }
    a._size += b._size;
    a._merges++;
    b.reset();
    return a;
  }

  /** Removes and returns the smallest value, or undefined when empty. */
  pop(): T | undefined {
    const top = this.min;
    if (!top) return undefined;
    this.min = undefined;
    this._size--;
    this._pops++;

    const { payload, children } = top.extract();
    this.roots.push(...children);

    if (!this.isEmpty()) {
      this.min = this.roots.shift();
      this.consolidate();
    }
    return payload;
  }

  /**
   * Links roots of equal degree until every root degree is distinct, then
   * rebuilds the root list and finds the minimum in one sweep.
   */
  consolidate(): void {
    const first = this.min;
    if (this.isEmpty() || !first) return;
    this._consolidations++;

    const buckets = new Array<TreeNode<T> | undefined>(degreeBucketCount(this._size)).fill(undefined);
    const pending = [first, ...this.roots];
    let next = 0;
    let carry: TreeNode<T> | undefined;

    try {
      while (next < pending.length) {
        carry = pending[next++];
        let d = carry.degree;
        let y = buckets[d];
        while (y) {
          carry = TreeNode.merge(carry, y, this.compare);
          buckets[d] = undefined;
          this._links++;
          d = carry.degree;
          y = buckets[d];
        }
        buckets[d] = carry;
        carry = undefined;
      }

      let min: TreeNode<T> | undefined;
      const roots: TreeNode<T>[] = [];
      for (const tree of buckets) {
        if (tree) min = foldRoot(min, roots, tree, this.compare);
      }
      this.min = min;
      this.roots = roots;
    } catch (err) {
      // comparator failed: keep every tree that is still a root so size stays true
      const survivors: TreeNode<T>[] = carry ? [carry] : [];
      for (const tree of buckets) if (tree) survivors.push(tree);
      for (const tree of pending.slice(next)) survivors.push(tree);
      const min = survivors.find((t) => t === first) ?? survivors[0];
      this.min = min;
      this.roots = survivors.filter((t) => t !== min);
      throw err;
    }
  }

  /** One line per tree, min first: `Min: 0 1`, then `Tree 1: 2 3`, ... */
  preorder(): string {
    let out = '';
    if (this.min) out += `Min: ${[...TreeNode.preorder(this.min)].join(' ')}\n`;
    this.roots.forEach((tree, i) => {
      out += `Tree ${i + 1}: ${[...TreeNode.preorder(tree)].join(' ')}\n`;
    });
    return out;
  }

  stats(): HeapStats {
    let maxRootDegree = this.min?.degree ?? 0;
    for (const r of this.roots) if (r.degree > maxRootDegree) maxRootDegree = r.degree;
    return {
      size: this._size,
      trees: this.roots.length + (this.min ? 1 : 0),
      maxRootDegree,
      pushes: this._pushes,
      pops: this._pops,
      merges: this._merges,
      consolidations: this._consolidations,
      links: this._links,
    };
  }

  private insertTree(tree: TreeNode<T>): void {
    this.min = foldRoot(this.min, this.roots, tree, this.compare);
  }

  private reset(): void {
    this.roots = [];
    this.min = undefined;
    this._size = 0;
  }
}
