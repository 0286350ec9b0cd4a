/**
 * Many-to-many relation kept as two mirrored indexes, so both directions
 * can be read without scanning.
 */
export class JoinSet<L, R> {
  private forward: Map<L, Set<R>> = new Map();
  private backward: Map<R, Set<L>> = new Map();

  /** Returns false when the pair was already present. */
  add(left: L, right: R): boolean {
    if (this.has(left, right)) {
      return false;
    }
    this.bucket(this.forward, left).add(right);
    this.bucket(this.backward, right).add(left);
    return true;
  }

  /** Returns false when the pair was absent. */
  remove(left: L, right: R): boolean {
    if (!this.has(left, right)) {
      return false;
    }
    this.forward.get(left)?.delete(right);
    this.backward.get(right)?.delete(left);
    return true;
  }

  has(left: L, right: R): boolean {
    return this.forward.get(left)?.has(right) ?? false;
  }

  rightsOf(left: L): R[] {
    return Array.from(this.forward.get(left) ?? []);
  }

  leftsOf(right: R): L[] {
    return Array.from(this.backward.get(right) ?? []);
  }

  private bucket<K, V>(index: Map<K, Set<V>>, key: K): Set<V> {
    let values = index.get(key);
    if (!values) {
      values = new Set();
      index.set(key, values);
    }
    return values;
  }
}
