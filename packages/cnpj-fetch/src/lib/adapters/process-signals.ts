import type { SignalHandler } from "../ports/signal-handler.js";

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Create a signal handler for SIGINT/SIGTERM.
 * The first signal runs the callbacks; a second one exits immediately with 130.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => void> = [];
  let received = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (received) {
      process.exit(130);
    }
    received = true;
    for (const handler of handlers) handler(signal);
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        for (const signal of SHUTDOWN_SIGNALS) process.on(signal, handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      for (const signal of SHUTDOWN_SIGNALS) process.off(signal, handleSignal);
    },
  };
}
