import { CancelTimeoutError } from "../errors";

/**
 * Resolves with `pending`, or rejects with CancelTimeoutError once
 * `timeoutMs` passes first.
 */
export async function withTimeout<T>(runId: string, pending: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      pending,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          reject(new CancelTimeoutError(runId, timeoutMs));
        }, timeoutMs);
      })
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
