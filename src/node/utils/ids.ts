import { randomBytes } from "crypto";

/**
 * Generation-ordered id source.
 *
 * Ids are decimal millisecond timestamps that never repeat and never go
 * backwards within a process: a second id in the same millisecond (or after a
 * clock step back) takes the previous value + 1. Seed with the largest id already
 * on disk so ids stay ordered across restarts.
 */
export class MonotonicIdGenerator {
  private last: number;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.last = 0;
  }

  /** Never move below ids that already exist. Non-numeric ids are ignored. */
  seed(existingIds: Iterable<string>): void {
    for (const id of existingIds) {
      const value = Number(id);
      if (Number.isSafeInteger(value) && value > this.last) {
        this.last = value;
      }
    }
  }

  next(): string {
    const candidate = this.now();
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last.toString();
  }
}

/** Id unique within a chat: ordered prefix plus a random suffix. */
export function createMessageId(generator: MonotonicIdGenerator): string {
  return `${generator.next()}-${randomBytes(4).toString("hex")}`;
}
