/**
 * Explicit stack of pending [first, last) ranges.
 * Replaces the call stack in the iterative mergesort and quicksort forms.
 */

export interface Range {
  first: number;
  last: number;
}

export class RangeStack {
  private ranges: Range[] = [];
  private maxDepth = 0;

  /**
   * Number of pending ranges.
   */
  get size(): number {
    return this.ranges.length;
  }

  /**
   * Deepest the stack has been since construction.
   */
  get peakSize(): number {
    return this.maxDepth;
  }

  isEmpty(): boolean {
    return this.ranges.length === 0;
  }

  push(first: number, last: number): void {
    this.ranges.push({ first, last });
    if (this.ranges.length > this.maxDepth) {
      this.maxDepth = this.ranges.length;
    }
  }

  /**
   * Top range without removing it.
   */
  peek(): Range | undefined {
    return this.ranges[this.ranges.length - 1];
  }

  pop(): Range | undefined {
    return this.ranges.pop();
  }
}
