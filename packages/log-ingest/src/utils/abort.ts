import { SubmissionTimeoutError } from "../errors.js";

/**
 * Settles like `promise`, or rejects with SubmissionTimeoutError as soon as
 * `signal` aborts. The underlying work is not cancelled; its late result is
 * dropped.
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new SubmissionTimeoutError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new SubmissionTimeoutError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
