import { NO_TAGS } from '../types/task';

export interface TagCount {
  tag: string;
  count: number;
}

const naturalOrder = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

/**
 * Counts tasks per tag. Tags differing only in case share one bucket, shown
 * in the form that was seen first.
 */
export class TagIndex {
  private buckets = new Map<string, TagCount>();

  public add(tag: string, count = 1): void {
    const key = tag.toLowerCase();
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.count += count;
    } else {
      this.buckets.set(key, { tag, count });
    }
  }

  public addUntagged(): void {
    this.add(NO_TAGS);
  }

  public count(tag: string): number {
    return this.buckets.get(tag.toLowerCase())?.count ?? 0;
  }

  public get untagged(): number {
    return this.count(NO_TAGS);
  }

  /** Real tags in natural order, without the untagged bucket. */
  public entries(): TagCount[] {
    return Array.from(this.buckets.entries())
      .filter(([key]) => key !== NO_TAGS)
      .map(([, bucket]) => ({ ...bucket }))
      .sort((a, b) => naturalOrder.compare(a.tag, b.tag));
  }

  public clear(): void {
    this.buckets.clear();
  }
}
