/**
 * Persistent AVL tree.
 *
 * https://en.wikipedia.org/wiki/AVL_tree
 *
 * Every update returns a new tree that shares all untouched nodes with the
 * old one, so a tree can serve as an immutable scope snapshot: inserting a
 * binding for an inner scope never disturbs the outer scope's view.
 *
 * @module
 */

export interface AVLNode<TKey, TValue> {
  readonly key: TKey;
  readonly value: TValue;
  readonly height: number;
  readonly left: AVLNode<TKey, TValue> | null;
  readonly right: AVLNode<TKey, TValue> | null;
}

/**
 * An AVL tree is just a reference to the root node (or null if empty).
 */
export interface AVLTree<TKey, TValue> {
  readonly root: AVLNode<TKey, TValue> | null;
}

/** Return <0 if a<b, 0 if a==b, >0 if a>b. */
export type Comparator<TKey> = (a: TKey, b: TKey) => number;

export function createEmptyAVL<TKey, TValue>(): AVLTree<TKey, TValue> {
  return { root: null };
}

function nodeHeight<TKey, TValue>(node: AVLNode<TKey, TValue> | null): number {
  return node ? node.height : 0;
}

function mkNode<TKey, TValue>(
  key: TKey,
  value: TValue,
  left: AVLNode<TKey, TValue> | null,
  right: AVLNode<TKey, TValue> | null,
): AVLNode<TKey, TValue> {
  return {
    key,
    value,
    height: 1 + Math.max(nodeHeight(left), nodeHeight(right)),
    left,
    right,
  };
}

function rotateRight<TKey, TValue>(
  node: AVLNode<TKey, TValue>,
): AVLNode<TKey, TValue> {
  const pivot = node.left;
  if (!pivot) return node;
  return mkNode(
    pivot.key,
    pivot.value,
    pivot.left,
    mkNode(node.key, node.value, pivot.right, node.right),
  );
}

function rotateLeft<TKey, TValue>(
  node: AVLNode<TKey, TValue>,
): AVLNode<TKey, TValue> {
  const pivot = node.right;
  if (!pivot) return node;
  return mkNode(
    pivot.key,
    pivot.value,
    mkNode(node.key, node.value, node.left, pivot.left),
    pivot.right,
  );
}

function rebalance<TKey, TValue>(
  node: AVLNode<TKey, TValue>,
): AVLNode<TKey, TValue> {
  const balance = nodeHeight(node.left) - nodeHeight(node.right);
  if (balance > 1 && node.left) {
    const left = nodeHeight(node.left.left) >= nodeHeight(node.left.right)
      ? node.left
      : rotateLeft(node.left);
    return rotateRight(mkNode(node.key, node.value, left, node.right));
  }
  if (balance < -1 && node.right) {
    const right = nodeHeight(node.right.right) >= nodeHeight(node.right.left)
      ? node.right
      : rotateRight(node.right);
    return rotateLeft(mkNode(node.key, node.value, node.left, right));
  }
  return node;
}

function insertNode<TKey, TValue>(
  node: AVLNode<TKey, TValue> | null,
  key: TKey,
  value: TValue,
  compareKeys: Comparator<TKey>,
): AVLNode<TKey, TValue> {
  if (node === null) {
    return mkNode(key, value, null, null);
  }
  const cmp = compareKeys(key, node.key);
  if (cmp === 0) {
    return mkNode(key, value, node.left, node.right);
  }
  if (cmp < 0) {
    return rebalance(
      mkNode(
        node.key,
        node.value,
        insertNode(node.left, key, value, compareKeys),
        node.right,
      ),
    );
  }
  return rebalance(
    mkNode(
      node.key,
      node.value,
      node.left,
      insertNode(node.right, key, value, compareKeys),
    ),
  );
}

/**
 * Insert `(key, value)`, replacing any existing value for `key`.
 *
 * @returns a new tree; `tree` is left as it was
 */
export function insertAVL<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
  key: TKey,
  value: TValue,
  compareKeys: Comparator<TKey>,
): AVLTree<TKey, TValue> {
  return { root: insertNode(tree.root, key, value, compareKeys) };
}

export function searchAVL<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
  key: TKey,
  compareKeys: Comparator<TKey>,
): TValue | undefined {
  let current = tree.root;
  while (current) {
    const cmp = compareKeys(key, current.key);
    if (cmp === 0) {
      return current.value;
    }
    current = cmp < 0 ? current.left : current.right;
  }
  return undefined;
}

export const compareBigints: Comparator<bigint> = (a, b) =>
  a < b ? -1 : a > b ? 1 : 0;
