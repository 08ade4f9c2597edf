import type { ProgressCallback } from "../types.js";

/**
 * Counts visited paragraphs against the total from the pre-pass and reports
 * each step to the optional callback.
 */
export class ProgressCounter {
  private value = 0;

  constructor(
    readonly total: number,
    private readonly onProgress?: ProgressCallback
  ) {}

  get current(): number {
    return this.value;
  }

  advance(): void {
    if (this.value >= this.total) {
      throw new Error(
        `Progress overflow: visited more paragraphs than the ${this.total} counted up front.`
      );
    }
    this.value++;
    this.onProgress?.(this.value, this.total);
  }
}
