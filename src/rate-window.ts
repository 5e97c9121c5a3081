/**
 * Fixed-size ring of event timestamps used to report the current rate of
 * completions. Old entries are overwritten once the ring is full, so memory
 * stays constant however long the run lasts.
 */
export class RateWindow {
  private readonly timestamps: Float64Array;
  private next = 0;
  private size = 0;

  /**
   * @param capacity How many recent events to remember. Rates above
   *   `capacity` events per window are under-reported.
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('Capacity must be a positive integer');
    }
    this.timestamps = new Float64Array(capacity);
  }

  /** Records an event at `timestamp` (ms). Timestamps must not decrease. */
  add(timestamp: number): void {
    this.timestamps[this.next] = timestamp;
    this.next = (this.next + 1) % this.timestamps.length;
    this.size = Math.min(this.size + 1, this.timestamps.length);
  }

  /** Number of remembered events strictly after `since` (ms). */
  countSince(since: number): number {
    const capacity = this.timestamps.length;
    let count = 0;
    // Walk backwards from the newest entry; entries are in insertion order.
    for (let i = 1; i <= this.size; i++) {
      const timestamp = this.timestamps[(this.next - i + capacity) % capacity];
      if (timestamp <= since) break;
      count++;
    }
    return count;
  }

  get length(): number {
    return this.size;
  }
}
