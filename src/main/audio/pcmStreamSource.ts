import type { Readable } from "node:stream";

import logger from "../../shared/utils/logger";
import type { AudioInputStream, AudioSource, PcmFormat } from "../../types/audio";

const BYTES_PER_SAMPLE: Record<PcmFormat, number> = {
  f32le: 4,
  s16le: 2,
};

/** Decodes whole samples from `buf`; the caller keeps the remainder. */
export function decodePcm(buf: Buffer, format: PcmFormat): Float32Array {
  const width = BYTES_PER_SAMPLE[format];
  const count = Math.floor(buf.length / width);
  const out = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = format === "f32le" ? buf.readFloatLE(i * width) : buf.readInt16LE(i * width) / 32768;
  }
  return out;
}

/**
 * Mono PCM from any readable byte stream: stdin piped from a recorder
 * (`arecord -f S16_LE -c 1 -r 16000 | ...`) or a spawned process.
 */
export function createPcmStreamSource(readable: Readable, format: PcmFormat): AudioSource {
  const width = BYTES_PER_SAMPLE[format];

  return {
    openInputStream(onFrames, onFault) {
      if (readable.destroyed || !readable.readable) {
        throw new Error("PCM input stream is not readable");
      }

      let remainder: Buffer = Buffer.alloc(0);
      let delivering = true;

      const onData = (chunk: Buffer | string) => {
        const bytes = typeof chunk === "string" ? Buffer.from(chunk, "binary") : chunk;
        const buf = remainder.length ? Buffer.concat([remainder, bytes]) : bytes;
        const whole = buf.length - (buf.length % width);
        remainder = Buffer.from(buf.subarray(whole));
        if (!delivering || whole === 0) return;
        onFrames(decodePcm(buf.subarray(0, whole), format));
      };
      const onError = (err: Error) => {
        logger.error("[PcmStreamSource] stream error:", err);
        onFault?.(err);
      };
      const onEnd = () => {
        onFault?.(new Error("PCM input stream ended"));
      };

      readable.on("data", onData);
      readable.on("error", onError);
      readable.on("end", onEnd);

      const stream: AudioInputStream = {
        stop: () => {
          delivering = false;
          readable.pause();
        },
        close: () => {
          delivering = false;
          readable.off("data", onData);
          readable.off("error", onError);
          readable.off("end", onEnd);
          readable.destroy();
        },
      };
      return stream;
    },
  };
}
