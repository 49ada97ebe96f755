/**
 * Ctrl+C handling for long-running commands
 */

export interface Interrupt {
  /** Aborted on the first SIGINT */
  signal: AbortSignal;
  dispose(): void;
}

export function onInterrupt(): Interrupt {
  const controller = new AbortController();
  const handler = () => controller.abort();
  process.once('SIGINT', handler);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', handler);
    },
  };
}
