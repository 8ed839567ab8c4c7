export type AudioFrames = Float32Array | readonly number[];

export type AudioFrameCallback = (frames: AudioFrames) => void;

export type AudioFaultCallback = (error: Error) => void;

export interface AudioInputStream {
  stop(): void;
  close(): void;
}

/**
 * Anything that can deliver mono audio buffers. `openInputStream` must throw
 * when the device cannot be opened; faults after that go to `onFault`.
 */
export interface AudioSource {
  openInputStream(onFrames: AudioFrameCallback, onFault?: AudioFaultCallback): AudioInputStream;
}

export type PcmFormat = "f32le" | "s16le";
