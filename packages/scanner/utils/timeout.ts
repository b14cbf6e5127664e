// Per-attempt deadline for provider calls

import { systemClock, type Clock } from './clock.js';
import { CancelledError, TimeoutError, type ProviderKind } from './errors.js';

/**
 * Run `task` with a child AbortSignal that fires when either the parent aborts
 * or `timeoutMs` elapses on `clock`. A timeout rejects with TimeoutError, a
 * parent abort with CancelledError; either settles before the child signal fires.
 * `timeoutMs <= 0` disables the deadline.
 */
export async function withTimeout<T>(
  provider: ProviderKind,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
  clock: Clock = systemClock,
): Promise<T> {
  if (parent?.aborted) throw new CancelledError();

  const controller = new AbortController();
  const deadline = new AbortController();
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      void clock.sleep(timeoutMs, deadline.signal).then(
        () => {
          reject(new TimeoutError(provider, timeoutMs));
          controller.abort();
        },
        (err: unknown) => {
          // Cleared once the task settles
          if (!deadline.signal.aborted) reject(err);
        },
      );
    }
    if (parent) {
      onParentAbort = () => {
        reject(new CancelledError());
        controller.abort();
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    deadline.abort();
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}
