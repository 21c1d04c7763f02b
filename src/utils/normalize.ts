import * as fuzz from 'fuzzball';

// Memoized lowercase+trim. Grows for the lifetime of the run; bounded by catalog size.
export class NormalizedStringCache {
  private cache: Map<string, string> = new Map();

  normalize(s: string): string {
    let hit = this.cache.get(s);
    if (hit === undefined) {
      hit = s.toLowerCase().trim();
      this.cache.set(s, hit);
    }
    return hit;
  }

  get size(): number {
    return this.cache.size;
  }

  // Token-order-insensitive similarity, 0..100
  similarity(a: string, b: string): number {
    return fuzz.token_sort_ratio(this.normalize(a), this.normalize(b));
  }
}
