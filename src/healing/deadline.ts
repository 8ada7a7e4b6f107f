import type { StrategyName } from '../types/index.js';
import { StrategyTimeoutError } from '../exception/errors.js';

export interface DeadlineOptions {
  strategy: StrategyName;
  timeoutMs: number;
  /** Caller's signal; aborting it aborts the task too. */
  signal?: AbortSignal;
}

/**
 * Run `task` with its own AbortSignal, linked to the caller's and aborted with
 * a StrategyTimeoutError once `timeoutMs` elapses. Settles as soon as either
 * happens, without waiting for the task to notice.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { signal: parent, strategy, timeoutMs } = options;
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    throw parent.reason;
  }
  parent?.addEventListener('abort', forwardAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });
  const timer = setTimeout(
    () => controller.abort(new StrategyTimeoutError(strategy, timeoutMs)),
    timeoutMs,
  );

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}
