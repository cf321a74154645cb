// Stop handling for long history walks.
// SIGINT/SIGTERM abort the returned signal once; the walker checks it between files and revisions.

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  stoppedBy: () => NodeJS.Signals | null;
};

export type StopSignalOptions = {
  signals?: NodeJS.Signals[];
  onSignal?: (signal: NodeJS.Signals) => void;
};

const DEFAULT_STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createStopSignalHandler(opts: StopSignalOptions = {}): StopSignalHandler {
  const controller = new AbortController();
  const signals = opts.signals ?? DEFAULT_STOP_SIGNALS;
  let received: NodeJS.Signals | null = null;
  let cleaned = false;

  const listeners = new Map<NodeJS.Signals, () => void>();

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    for (const [signal, listener] of listeners) {
      process.off(signal, listener);
    }
    listeners.clear();
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    try {
      opts.onSignal?.(signal);
    } finally {
      if (!controller.signal.aborted) {
        received = signal;
        controller.abort(signal);
      }
      cleanup();
    }
  };

  for (const signal of signals) {
    const listener = (): void => handleSignal(signal);
    listeners.set(signal, listener);
    process.once(signal, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
    stoppedBy: () => received,
  };
}
