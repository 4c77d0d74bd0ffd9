import { describe, expect, it } from "vitest";
import { PointerEventArgs } from "../../model/PointerEventArgs";
import { PointerEventCollection } from "../PointerEventCollection";

function makeEvent(pointerId: number, sequenceIndex: number): PointerEventArgs {
  return new PointerEventArgs({ eventType: "pointermove", pointerId, sequenceIndex });
}

describe("PointerEventCollection", () => {
  it("indexes events by pointer and keeps insertion order", () => {
    const collection = new PointerEventCollection();
    const a = makeEvent(1, 1);
    const b = makeEvent(2, 1);
    const c = makeEvent(3, 1);
    const d = makeEvent(1, 2);
    const e = makeEvent(2, 2);
    for (const event of [a, b, c, d, e]) collection.add(event);

    expect(collection.size).toBe(5);
    expect(collection.numPointers()).toBe(3);
    expect(collection.firstEventForPointerId(1)).toBe(a);
    expect(collection.lastEventForPointerId(1)).toBe(d);
    expect(collection.eventsForPointerId(2)).toEqual([b, e]);

    collection.removeEventsForPointerId(2);
    expect(collection.size).toBe(3);
    expect(collection.numPointers()).toBe(2);
    expect(collection.hasPointerId(2)).toBe(false);
    expect(collection.events()).toEqual([a, c, d]);
    expect(collection.eventsForPointerId(2)).toEqual([]);
    expect(collection.firstEventForPointerId(2)).toBeUndefined();
  });

  it("returns nothing for unknown pointers", () => {
    const collection = new PointerEventCollection();
    expect(collection.firstEventForPointerId(9)).toBeUndefined();
    expect(collection.lastEventForPointerId(9)).toBeUndefined();
    collection.removeEventsForPointerId(9);
    expect(collection.empty).toBe(true);
  });

  it("clears everything", () => {
    const collection = new PointerEventCollection();
    collection.add(makeEvent(1, 1));
    collection.clear();
    expect(collection.empty).toBe(true);
    expect(collection.numPointers()).toBe(0);
  });
});
