export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/**
 * The audio input could not be opened. Fatal to the reactive feature: there
 * is no retry.
 */
export class AudioDeviceError extends Error {
  constructor(cause: unknown) {
    super(`Failed to open audio input stream: ${errorMessage(cause)}`, { cause });
    this.name = "AudioDeviceError";
  }
}
