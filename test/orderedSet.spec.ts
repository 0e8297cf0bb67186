import { OrderedSet } from "../src/internals/orderedSet";

describe("OrderedSet", () => {
  it("should keep insertion order and ignore duplicates", () => {
    const set = OrderedSet.from(["c", "a", "b", "a"]);
    expect(set.toArray()).toEqual(["c", "a", "b"]);
    expect(set.size).toBe(3);
    expect(set.add("a")).toBe(false);
    expect(set.add("d")).toBe(true);
    expect([...set]).toEqual(["c", "a", "b", "d"]);
  });

  it("should report whether discard changed the set", () => {
    const set = OrderedSet.from([1, 2, 3]);
    expect(set.discard(2)).toBe(true);
    expect(set.discard(2)).toBe(false);
    expect(set.has(2)).toBe(false);
    expect(set.toArray()).toEqual([1, 3]);
  });

  it("should move a re-added element to the end", () => {
    const set = OrderedSet.from([1, 2, 3]);
    set.discard(1);
    set.add(1);
    expect(set.toArray()).toEqual([2, 3, 1]);
  });

  it("should pop from either end", () => {
    const set = OrderedSet.from(["a", "b", "c"]);
    expect(set.pop()).toBe("c");
    expect(set.pop(false)).toBe("a");
    expect(set.toArray()).toEqual(["b"]);
  });

  it("should throw when popping from an empty set", () => {
    const set = OrderedSet.from<number>();
    expect(() => set.pop()).toThrow("pop from an empty set");
  });

  it("should iterate in reverse", () => {
    const set = OrderedSet.from([1, 2, 3]);
    expect([...set.reversed()]).toEqual([3, 2, 1]);
  });

  it("should compare order in equals", () => {
    const lhs = OrderedSet.from([1, 2]);
    expect(lhs.equals(OrderedSet.from([1, 2]))).toBe(true);
    expect(lhs.equals(OrderedSet.from([2, 1]))).toBe(false);
    expect(lhs.equals(OrderedSet.from([1]))).toBe(false);
  });

  it("should use the key function for membership", () => {
    const set = OrderedSet.keyed((value: { id: number }) => value.id, [
      { id: 1 },
    ]);
    expect(set.has({ id: 1 })).toBe(true);
    expect(set.add({ id: 1 })).toBe(false);
    expect(set.discard({ id: 1 })).toBe(true);
    expect(set.size).toBe(0);
  });

  it("should clear the set", () => {
    const set = OrderedSet.from(["x", "y"]);
    set.clear();
    expect(set.size).toBe(0);
    expect(set.toString()).toBe("OrderedSet()");
  });

  it("should format its contents", () => {
    expect(OrderedSet.from(["a", "b"]).toString()).toBe("OrderedSet([a, b])");
  });
});
