/**
 * Run two fetches together and fail as one
 */

import { DomainErrors, upstreamFailure, type DomainError } from "../errors.js";

export type Fetch<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Start both fetches on a shared signal linked to `outer`.
 * The first rejection aborts the sibling and becomes the result.
 * An outer abort rejects straight away, even if a fetch ignores its signal.
 */
export async function fetchBoth<A, B>(
  first: Fetch<A>,
  second: Fetch<B>,
  outer?: AbortSignal
): Promise<[A, B]> {
  outer?.throwIfAborted();

  const controller = new AbortController();
  const onOuterAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", onOuterAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
      once: true,
    });
  });

  const run = async <T>(fetch: Fetch<T>): Promise<T> => {
    try {
      return await fetch(controller.signal);
    } catch (error: unknown) {
      controller.abort(error);
      throw error;
    }
  };

  try {
    return await Promise.race([Promise.all([run(first), run(second)]), aborted]);
  } finally {
    outer?.removeEventListener("abort", onOuterAbort);
  }
}

/**
 * Map a thrown collaborator error to the error a query returns.
 * Only the caller's own signal means Cancelled; a source's abort or timeout
 * is an upstream failure like any other.
 */
export function toQueryError(error: unknown, signal?: AbortSignal): DomainError {
  if (signal?.aborted) {
    return DomainErrors.cancelled;
  }
  return upstreamFailure(error);
}
