import { describe, test, expect } from "@jest/globals";
import { createMessageId, MonotonicIdGenerator } from "./ids";

describe("MonotonicIdGenerator", () => {
  test("uses the clock while it moves forward", () => {
    const times = [1000, 2000];
    const ids = new MonotonicIdGenerator(() => times.shift() ?? 0);
    expect(ids.next()).toBe("1000");
    expect(ids.next()).toBe("2000");
  });

  test("never repeats within one millisecond or after the clock steps back", () => {
    const times = [5000, 5000, 4000];
    const ids = new MonotonicIdGenerator(() => times.shift() ?? 0);
    expect([ids.next(), ids.next(), ids.next()]).toEqual(["5000", "5001", "5002"]);
  });

  test("seeding keeps new ids above existing ones", () => {
    const ids = new MonotonicIdGenerator(() => 100);
    ids.seed(["250", "not-a-number", "90"]);
    expect(ids.next()).toBe("251");
  });

  test("message ids carry the ordered prefix and a random suffix", () => {
    const ids = new MonotonicIdGenerator(() => 42);
    expect(createMessageId(ids)).toMatch(/^42-[0-9a-f]{8}$/);
  });
});
