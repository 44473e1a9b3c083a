import { performance } from 'node:perf_hooks';

/** How a deadline-bound task ended. `elapsedMs` is wall-clock time. */
export type DeadlineOutcome<T> =
  | { readonly kind: 'settled'; readonly value: T; readonly elapsedMs: number }
  | { readonly kind: 'failed'; readonly error: unknown; readonly elapsedMs: number }
  | { readonly kind: 'timedOut'; readonly elapsedMs: number }
  | { readonly kind: 'aborted'; readonly elapsedMs: number };

export interface DeadlineOptions {
  readonly timeoutMs: number;
  /** Aborting resolves the race at once as `aborted`. */
  readonly signal?: AbortSignal;
  /** Called if the task settles after the race was already decided. */
  readonly onLateSettle?: (state: 'fulfilled' | 'rejected', error?: unknown) => void;
}

/**
 * Race `task` against a timer and an optional abort signal.
 *
 * Whichever finishes first decides the outcome. The loser is abandoned: a
 * task that settles late only reaches `onLateSettle`, and its rejection is
 * always observed so it never surfaces as unhandled. The returned promise
 * never rejects.
 */
export function runWithDeadline<T>(
  task: () => Promise<T>,
  options: DeadlineOptions,
): Promise<DeadlineOutcome<T>> {
  const { timeoutMs, signal, onLateSettle } = options;
  const startedAt = performance.now();
  const elapsed = (): number => performance.now() - startedAt;

  return new Promise<DeadlineOutcome<T>>((resolve) => {
    let decided = false;
    let timer: NodeJS.Timeout | undefined;

    const decide = (outcome: DeadlineOutcome<T>): void => {
      if (decided) return;
      decided = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    const onAbort = (): void => {
      decide({ kind: 'aborted', elapsedMs: elapsed() });
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }

    timer = setTimeout(() => {
      // Timer resolution can land a fraction under the deadline.
      decide({ kind: 'timedOut', elapsedMs: Math.max(elapsed(), timeoutMs) });
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task();
    } catch (error) {
      decide({ kind: 'failed', error, elapsedMs: elapsed() });
      return;
    }

    void pending.then(
      (value) => {
        if (decided) {
          onLateSettle?.('fulfilled');
          return;
        }
        decide({ kind: 'settled', value, elapsedMs: elapsed() });
      },
      (error: unknown) => {
        if (decided) {
          onLateSettle?.('rejected', error);
          return;
        }
        decide({ kind: 'failed', error, elapsedMs: elapsed() });
      },
    );
  });
}
