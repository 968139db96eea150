/**
 * Link Resolution Cache
 *
 * Remembers which handles a listing traversal has already resolved so that
 * each one is fetched at most once. Scoped to a single traversal.
 */
export class LinkResolutionCache {
  private readonly fetched: Set<string>;

  /**
   * @param preseeded - Handles the caller already holds; never fetched
   */
  constructor(preseeded: Iterable<string> = []) {
    this.fetched = new Set(preseeded);
  }

  shouldFetch(key: string): boolean {
    return !this.fetched.has(key);
  }

  markFetched(key: string): void {
    this.fetched.add(key);
  }

  get size(): number {
    return this.fetched.size;
  }
}
