// Sequence number allocator.

import { MAX_SEQUENCE } from "@smpplink/smpp-wire";

/**
 * Allocates request sequence numbers.
 *
 * Numbers run from 1 to 0x7FFFFFFF and then wrap back to 1. The session
 * refuses to reuse a number that still has a request outstanding.
 */
export class SequenceAllocator {
  private nextSequence: number;

  constructor(start: number = 1) {
    if (!Number.isInteger(start) || start < 1 || start > MAX_SEQUENCE) {
      throw new RangeError(`Invalid starting sequence: ${start}`);
    }
    this.nextSequence = start;
  }

  /** Allocate the next sequence number. */
  next(): number {
    const sequence = this.nextSequence;
    this.nextSequence = sequence === MAX_SEQUENCE ? 1 : sequence + 1;
    return sequence;
  }
}
