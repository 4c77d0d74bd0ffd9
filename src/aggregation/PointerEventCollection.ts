import type { PointerEventArgs } from "../model/PointerEventArgs";

/**
 * Live events in insertion order, indexed by pointer id.
 *
 * Every event in the per-pointer index is also in the insertion-ordered list.
 */
export class PointerEventCollection {
  private list: PointerEventArgs[] = [];
  private readonly byPointerId = new Map<number, PointerEventArgs[]>();

  get size(): number {
    return this.list.length;
  }

  get empty(): boolean {
    return this.list.length === 0;
  }

  clear(): void {
    this.list = [];
    this.byPointerId.clear();
  }

  /** Number of distinct pointer ids currently held. */
  numPointers(): number {
    return this.byPointerId.size;
  }

  hasPointerId(pointerId: number): boolean {
    return this.byPointerId.has(pointerId);
  }

  add(e: PointerEventArgs): void {
    this.list.push(e);
    const bucket = this.byPointerId.get(e.pointerId);
    if (bucket) {
      bucket.push(e);
    } else {
      this.byPointerId.set(e.pointerId, [e]);
    }
  }

  removeEventsForPointerId(pointerId: number): void {
    if (!this.byPointerId.delete(pointerId)) return;
    this.list = this.list.filter((e) => e.pointerId !== pointerId);
  }

  events(): readonly PointerEventArgs[] {
    return [...this.list];
  }

  /** Empty when the pointer id is unknown. */
  eventsForPointerId(pointerId: number): readonly PointerEventArgs[] {
    return [...(this.byPointerId.get(pointerId) ?? [])];
  }

  firstEventForPointerId(pointerId: number): PointerEventArgs | undefined {
    return this.byPointerId.get(pointerId)?.[0];
  }

  lastEventForPointerId(pointerId: number): PointerEventArgs | undefined {
    const bucket = this.byPointerId.get(pointerId);
    return bucket ? bucket[bucket.length - 1] : undefined;
  }
}
