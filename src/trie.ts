/**
 * A generic trie keyed on integer sequences (symbol indices or code
 * points).  Every node may carry a value; nodes are created on demand
 * by `ensure` and removed by `prune` once they hold neither a value nor
 * children.
 */

export interface TrieNode<V> {
  readonly children: Map<number, TrieNode<V>>;
  value?: V;
}

export interface Trie<V> {
  readonly root: TrieNode<V>;
  /** Node at `key`, or undefined if the path does not exist. */
  find(key: readonly number[]): TrieNode<V> | undefined;
  /** Node at `key`, creating missing nodes along the way. */
  ensure(key: readonly number[]): TrieNode<V>;
  /** Value at `key`, computing and storing it on a miss. */
  getOrSet(key: readonly number[], compute: () => V): V;
  /**
   * Remove empty nodes along `key`, deepest first.  `isEmpty` decides
   * whether a stored value still counts.
   */
  prune(key: readonly number[], isEmpty: (value: V) => boolean): void;
  /** Number of nodes, root included. */
  size(): number;
}

export function createTrie<V>(): Trie<V> {
  const root: TrieNode<V> = { children: new Map() };

  function find(key: readonly number[]): TrieNode<V> | undefined {
    let node = root;
    for (const k of key) {
      const child = node.children.get(k);
      if (!child) return undefined;
      node = child;
    }
    return node;
  }

  function ensure(key: readonly number[]): TrieNode<V> {
    let node = root;
    for (const k of key) {
      let child = node.children.get(k);
      if (!child) {
        child = { children: new Map() };
        node.children.set(k, child);
      }
      node = child;
    }
    return node;
  }

  function subtreeSize(node: TrieNode<V>): number {
    let count = 1;
    for (const child of node.children.values()) {
      count += subtreeSize(child);
    }
    return count;
  }

  return {
    root,
    find,
    ensure,

    getOrSet(key, compute) {
      const node = ensure(key);
      if (node.value !== undefined) return node.value;
      const value = compute();
      node.value = value;
      return value;
    },

    prune(key, isEmpty) {
      const path: TrieNode<V>[] = [root];
      for (const k of key) {
        const child = path[path.length - 1].children.get(k);
        if (!child) return;
        path.push(child);
      }
      for (let i = key.length; i > 0; i--) {
        const node = path[i];
        const hasValue = node.value !== undefined && !isEmpty(node.value);
        if (hasValue || node.children.size > 0) return;
        path[i - 1].children.delete(key[i - 1]);
      }
    },

    size() {
      return subtreeSize(root);
    },
  };
}
