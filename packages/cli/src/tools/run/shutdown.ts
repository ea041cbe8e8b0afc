import { MAX_TIMER_DELAY_MS } from '@tickwork/scheduler';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export type ShutdownReason = ShutdownSignal | 'timeout';

/**
 * Minimal event source the run command listens on; `process` satisfies it.
 */
export interface SignalSource {
  once(signal: ShutdownSignal, listener: () => void): unknown;
  off(signal: ShutdownSignal, listener: () => void): unknown;
}

export interface WaitForShutdownOptions {
  readonly signals: SignalSource;
  readonly durationMs?: number;
}

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Resolves with the first shutdown trigger: a termination signal or the optional deadline.
 * Every listener and timer is released once it settles.
 */
export const waitForShutdown = ({
  signals,
  durationMs,
}: WaitForShutdownOptions): Promise<ShutdownReason> =>
  new Promise<ShutdownReason>((resolve) => {
    const listeners = new Map<ShutdownSignal, () => void>();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const settle = (reason: ShutdownReason) => {
      for (const [signal, listener] of listeners) {
        signals.off(signal, listener);
      }
      listeners.clear();
      clearTimeout(timer);
      resolve(reason);
    };

    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = () => {
        settle(signal);
      };
      listeners.set(signal, listener);
      signals.once(signal, listener);
    }

    // Deadlines beyond the largest timer delay are waited out in clamped steps.
    const armDeadline = (remainingMs: number) => {
      const delayMs = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remainingMs > delayMs) {
          armDeadline(remainingMs - delayMs);
          return;
        }
        settle('timeout');
      }, delayMs);
    };

    if (durationMs !== undefined) {
      armDeadline(durationMs);
    }
  });
