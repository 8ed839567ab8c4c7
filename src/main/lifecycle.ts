import logger from "../shared/utils/logger";

type ShutdownStep = () => void | Promise<void>;

type ProcessLike = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  exit(code?: number): unknown;
  exitCode?: number | string | null | undefined;
};

/**
 * Runs `cleanup` once on the first SIGINT/SIGTERM, then exits. A second
 * signal exits without waiting. Returns the guarded cleanup so the caller
 * can trigger the same path itself.
 */
export function registerShutdownHandlers(
  cleanup: ShutdownStep,
  proc: ProcessLike = process,
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"]
) {
  let didRunShutdownCleanup = false;

  const runOnce = async () => {
    if (didRunShutdownCleanup) return;
    didRunShutdownCleanup = true;
    try {
      await cleanup();
    } catch (e) {
      logger.error("[Main] Shutdown cleanup failed:", e);
      proc.exitCode = 1;
    }
  };

  for (const signal of signals) {
    proc.once(signal, () => {
      logger.log(`[Main] ${signal} received, shutting down`);
      runOnce()
        .catch((e: unknown) => logger.error("[Main] Unexpected shutdown error:", e))
        .finally(() => {
          proc.exit();
        });
    });
  }

  return runOnce;
}
