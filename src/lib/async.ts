import type { LinkError } from "./errors";

/**
 * Races `task` against a timer. On timeout the returned promise rejects with
 * `onTimeout()` and `cleanup` receives the late result, if any, so a
 * resource that arrives after the deadline can still be closed.
 */
export function withTimeout<T>(
  task: Promise<T>,
  ms: number,
  onTimeout: () => LinkError,
  cleanup?: (late: T) => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      reject(onTimeout());
    }, ms);

    task.then(
      (value) => {
        if (timedOut) {
          cleanup?.(value);
          return;
        }
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (timedOut) return;
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
