import { LOUDNESS_SAMPLER_CONFIG } from "../../shared/audio/audioTuning";
import logger from "../../shared/utils/logger";
import { AudioDeviceError } from "../errors";
import { SampleChannel } from "./sampleChannel";
import type { AudioFrames, AudioInputStream, AudioSource } from "../../types/audio";

/**
 * Root-mean-square of one buffer plus a small epsilon so silence never reads
 * as a hard zero. Empty buffers yield `null`.
 */
export function computeRms(frames: AudioFrames): number | null {
  const n = frames.length;
  if (!n) return null;
  let sumSquares = 0;
  for (let i = 0; i < n; i++) {
    const v = frames[i];
    if (Number.isFinite(v)) sumSquares += v * v;
  }
  return Math.sqrt(sumSquares / n) + LOUDNESS_SAMPLER_CONFIG.rmsEpsilon;
}

export class LoudnessSampler {
  private readonly channel: SampleChannel;
  private readonly stream: AudioInputStream;
  private fault: Error | null;
  private stopped: boolean;
  private closed: boolean;

  /** Throws AudioDeviceError when the source cannot open a stream. */
  constructor(source: AudioSource, channel: SampleChannel = new SampleChannel()) {
    this.channel = channel;
    this.fault = null;
    this.stopped = false;
    this.closed = false;
    try {
      this.stream = source.openInputStream(
        (frames) => this.handleFrames(frames),
        (error) => this.handleFault(error)
      );
    } catch (error) {
      throw new AudioDeviceError(error);
    }
  }

  private handleFrames(frames: AudioFrames) {
    if (this.closed) return;
    const rms = computeRms(frames);
    if (rms == null) return;
    this.channel.publish(rms);
  }

  private handleFault(error: Error) {
    if (this.fault) return;
    logger.warn("[LoudnessSampler] stream fault:", error);
    this.fault = error;
  }

  /**
   * Most recent pending loudness, discarding older ones; 0 when nothing
   * arrived since the last read. Re-throws a stream fault.
   */
  read(): number {
    if (this.fault) throw this.fault;
    return this.channel.drainLatest() ?? 0;
  }

  stop() {
    if (this.stopped) return;
    this.stopped = true;
    this.stream.stop();
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.stream.close();
  }
}
