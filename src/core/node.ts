
import type { Comparator } from './compare.js';
import { invariant } from '../utils/invariant.js';

/** What is left of a node once its payload has been taken. */
export interface Extracted<T> {
  payload: T;
  children: TreeNode<T>[];
}

/**
 * Heap-ordered multi-way tree node. Children are owned exclusively by
 * their parent, in the order they were linked.
 */
export class TreeNode<T> {
  private _payload: T;
  private _children: TreeNode<T>[] = [];
  private _extracted = false;

  constructor(payload: T) {
    this._payload = payload;
  }

  get degree(): number { return this._children.length; }

  get payload(): T {
    invariant(!this._extracted, 'payload read after extraction');
    return this._payload;
  }

  get children(): readonly TreeNode<T>[] { return this._children; }

  get extracted(): boolean { return this._extracted; }

  static isSmallerOrEqual<T>(a: TreeNode<T>, b: TreeNode<T>, compare: Comparator<T>): boolean {
    invariant(!a._extracted && !b._extracted, 'cannot compare an extracted node');
    return compare(a._payload, b._payload) <= 0;
  }

  /** Links two trees. The smaller-or-equal root wins; ties go to `a`. */
  static merge<T>(a: TreeNode<T>, b: TreeNode<T>, compare: Comparator<T>): TreeNode<T> {
    if (TreeNode.isSmallerOrEqual(a, b, compare)) {
      a.addChild(b);
      return a;
    }
    b.addChild(a);
    return b;
  }

  /**
   * Consumes the node: hands back the payload and the orphaned children.
   * The node must not be used afterwards.
   */
  extract(): Extracted<T> {
    invariant(!this._extracted, 'payload already extracted');
    this._extracted = true;
    const children = this._children;
    this._children = [];
    return { payload: this._payload, children };
  }

  /** Depth-first pre-order walk. Iterative, so deep trees are fine. */
  static preorder<T>(node: TreeNode<T>): Iterable<T> {
    return {
      *[Symbol.iterator]() {
        const stack: TreeNode<T>[] = [node];
        while (stack.length > 0) {
          const n = stack.pop();
          if (!n) break;
          invariant(!n._extracted, 'cannot traverse an extracted node');
          yield n._payload;
          for (let i = n._children.length - 1; i >= 0; i--) stack.push(n._children[i]);
        }
      },
    };
  }

  private addChild(child: TreeNode<T>): void {
    this._children.push(child);
  }
}
