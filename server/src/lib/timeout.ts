import { ToolTimeoutError } from './errors.js';

/**
 * Race `task` against a timer. The timer is unref'd so a pending timeout never
 * keeps the process alive; `onTimeout` lets the caller abort the losing work.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  ms: number,
  label: string,
  onTimeout?: () => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | null = null;
  try {
    return await Promise.race([
      task,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          onTimeout?.();
          reject(new ToolTimeoutError(label, ms));
        }, ms);
        timer.unref?.();
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Combine an optional caller signal with a local controller. The returned
 * `abort` cancels only the combined signal, never the caller's.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
): { signal: AbortSignal; abort: (reason?: unknown) => void; cleanup: () => void } {
  const combined = new AbortController();

  const abort = (reason?: unknown) => {
    if (combined.signal.aborted) return;
    combined.abort(reason);
  };
  const onCallerAbort = () => abort(callerSignal?.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combined.signal, abort, cleanup };
}
