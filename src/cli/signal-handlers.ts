/*
Purpose: turn SIGINT/SIGTERM into a cooperative stop request for the run.
Assumptions: the first signal stops after the current plugin; a second one exits.
Usage: const stop = createRunStopSignalHandler(); ... stop.cleanup();
*/

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup(): void;
  isStopped(): boolean;
};

export type RunStopSignalOptions = {
  onSignal?: (signal: NodeJS.Signals) => void;
  /** Exit code used when a second signal arrives while stopping. */
  forceExitCode?: number;
  exit?: (code: number) => void;
};

export type RunStopController = {
  signal: AbortSignal;
  handle(signal: NodeJS.Signals): void;
  isStopped(): boolean;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createRunStopController(options: RunStopSignalOptions = {}): RunStopController {
  const controller = new AbortController();
  const forceExitCode = options.forceExitCode ?? 130;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  return {
    signal: controller.signal,
    handle(signal) {
      if (controller.signal.aborted) {
        exit(forceExitCode);
        return;
      }
      options.onSignal?.(signal);
      controller.abort({ signal });
    },
    isStopped: () => controller.signal.aborted,
  };
}

export function createRunStopSignalHandler(
  options: RunStopSignalOptions = {},
): RunStopSignalHandler {
  const stop = createRunStopController(options);
  const handle = (signal: NodeJS.Signals): void => stop.handle(signal);

  for (const signal of STOP_SIGNALS) {
    process.on(signal, handle);
  }

  return {
    signal: stop.signal,
    cleanup() {
      for (const signal of STOP_SIGNALS) {
        process.off(signal, handle);
      }
    },
    isStopped: stop.isStopped,
  };
}
