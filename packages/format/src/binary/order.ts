/**
 * Required chunk ordering
 */

import { FormatError } from "@actorx/shared";

/**
 * Tracks required chunks as they are met during a single pass.
 *
 * Each slot lists the ids that may fill it. Required chunks must arrive in
 * slot order. Known optional chunks go through `visitOptional`; anything
 * else is left to the caller.
 */
export class RequiredChunks {
  private next = 0;

  constructor(
    private readonly format: string,
    private readonly slots: readonly (readonly string[])[],
  ) {}

  /**
   * @returns true when `id` fills the next required slot
   */
  visit(id: string): boolean {
    const slot = this.slots.findIndex((ids) => ids.includes(id));
    if (slot === -1) return false;
    if (slot !== this.next) throw this.unexpected(id);
    this.next++;
    return true;
  }

  /**
   * Optional chunk `id` may only follow the complete required block.
   */
  visitOptional(id: string): void {
    if (!this.complete) throw this.unexpected(id);
  }

  /** Every required slot has been filled */
  get complete(): boolean {
    return this.next === this.slots.length;
  }

  finish(): void {
    if (this.complete) return;
    const missing = this.slots
      .slice(this.next)
      .map((ids) => ids.join(" or "));
    throw new FormatError(
      "missing-chunk",
      `${this.format}: missing required chunk(s) ${missing.join(", ")}`,
    );
  }

  private unexpected(id: string): FormatError {
    const expected =
      this.next < this.slots.length
        ? this.slots[this.next].join(" or ")
        : "no further required chunk";
    return new FormatError(
      "missing-chunk",
      `${this.format}: expected ${expected}, found ${id}`,
      id,
    );
  }
}
