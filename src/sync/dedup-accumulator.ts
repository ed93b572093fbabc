/**
 * Id-keyed collection that absorbs records across batches.
 * A record whose id is already present is rejected, never overwritten.
 */
export class DedupAccumulator<T> {
  private readonly records = new Map<string, T>();

  add(id: string, record: T): boolean {
    if (this.records.has(id)) {
      return false;
    }
    this.records.set(id, record);
    return true;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }

  values(): T[] {
    return Array.from(this.records.values());
  }

  entries(): Array<[string, T]> {
    return Array.from(this.records.entries());
  }

  toMap(): Map<string, T> {
    return new Map(this.records);
  }
}
