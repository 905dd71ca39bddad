import { SIGNAL_EXIT_CODES } from '../../constants/index.js';
import { InterruptedError, RestoreFailureError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type DeferredSignal = keyof typeof SIGNAL_EXIT_CODES;

const DEFERRED_SIGNALS: readonly DeferredSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Hold SIGINT and SIGTERM until `body` has settled.
 *
 * The first signal aborts the AbortSignal handed to `body` (which stops the
 * configure child) and is remembered. Once `body` has finished, its own
 * cleanup included, the process exits with 130 or 143, unless the source tree
 * could not be restored. Further signals while waiting are only logged.
 */
export async function withDeferredInterrupts<T>(
  body: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const state: { received: DeferredSignal | null } = { received: null };

  const listeners = DEFERRED_SIGNALS.map(signal => {
    const listener = (): void => {
      if (state.received) {
        logger.warn(`Received ${signal} again; still restoring the source tree`);
        return;
      }
      state.received = signal;
      logger.warn(`Received ${signal}; restoring the source tree before exiting`);
      controller.abort(new InterruptedError(signal));
    };
    process.on(signal, listener);
    return { signal, listener };
  });

  const settle = (error?: unknown): void => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
    // A restore failure is reported as such, signal or not
    if (!state.received || error instanceof RestoreFailureError) {
      return;
    }
    if (error !== undefined) {
      logger.debug(`Run ended after ${state.received}`, error);
    }
    process.exit(SIGNAL_EXIT_CODES[state.received]);
  };

  let value: T;
  try {
    value = await body(controller.signal);
  } catch (error) {
    settle(error);
    throw error;
  }
  settle();
  return value;
}
