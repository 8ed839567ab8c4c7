import { LOUDNESS_SAMPLER_CONFIG } from "../../shared/audio/audioTuning";

/**
 * Bounded single-producer/single-consumer handoff. When full, the oldest
 * value is overwritten; the consumer only ever wants the newest one.
 */
export class SampleChannel {
  private readonly buffer: Float64Array;
  private head: number;
  private size: number;

  constructor(capacity: number = LOUDNESS_SAMPLER_CONFIG.channelCapacity) {
    const cap = Number.isInteger(capacity) && capacity > 0 ? capacity : 1;
    this.buffer = new Float64Array(cap);
    this.head = 0;
    this.size = 0;
  }

  get capacity() {
    return this.buffer.length;
  }

  get pending() {
    return this.size;
  }

  publish(value: number) {
    const cap = this.buffer.length;
    const tail = (this.head + this.size) % cap;
    this.buffer[tail] = value;
    if (this.size < cap) {
      this.size += 1;
    } else {
      this.head = (this.head + 1) % cap;
    }
  }

  /** Empties the channel and returns the most recent value, if any. */
  drainLatest(): number | undefined {
    if (this.size === 0) return undefined;
    const cap = this.buffer.length;
    const latest = this.buffer[(this.head + this.size - 1) % cap];
    this.head = 0;
    this.size = 0;
    return latest;
  }
}
