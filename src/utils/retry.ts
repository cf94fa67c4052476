/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * retry.ts: Backoff and timeout helpers for Camsnap.
 */

/* Reconnecting to a consumer camera uses exponential backoff with jitter. The first attempt waits the base delay, each subsequent attempt doubles it, and the result
 * is capped so that a flapping camera is retried promptly rather than after minutes. Jitter keeps several instances pointed at the same camera from reconnecting
 * in lockstep.
 */

/**
 * Options for computing a backoff delay.
 */
export interface BackoffOptions {

  // Base delay for the first attempt, in milliseconds.
  baseDelay: number;

  // Maximum random jitter added on top of the capped delay, in milliseconds.
  jitter: number;

  // Upper bound for the exponential component, in milliseconds.
  maxDelay: number;
}

/**
 * Computes the delay before a retry attempt.
 * @param attempt - The 1-based attempt number.
 * @param options - Backoff parameters.
 * @param random - Source of randomness in [0, 1). Defaults to Math.random.
 * @returns The delay in milliseconds.
 */
export function getBackoffDelay(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {

  const exponent = Math.max(0, attempt - 1);
  const baseDelay = Math.min(options.baseDelay * Math.pow(2, exponent), options.maxDelay);
  const jitter = random() * options.jitter;

  return Math.round(baseDelay + jitter);
}

/**
 * Races an operation against a timeout. The timer is cleared as soon as either side settles so that it never keeps the process alive.
 * @param operation - The promise to race.
 * @param timeoutMs - Timeout in milliseconds.
 * @param description - Human-readable description used in the timeout error message.
 * @param abort - Aborted with the timeout error when the timeout elapses, so the operation can stop its own work.
 * @returns The result of the operation.
 * @throws An Error if the timeout elapses first, or the operation's own error.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, description: string, abort?: AbortController): Promise<T> {

  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {

    timer = setTimeout(() => {

      const error = new Error([ description, " timed out after ", String(timeoutMs), "ms." ].join(""));

      abort?.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {

    return await Promise.race([ operation, timeoutPromise ]);
  } finally {

    clearTimeout(timer);
  }
}
