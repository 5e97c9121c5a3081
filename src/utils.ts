/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Suspends for `ms` milliseconds. When `signal` aborts first, the promise
 * resolves early instead of rejecting, so callers can treat an abort as
 * "stop waiting" and check the signal themselves. Delays past
 * {@link MAX_TIMER_DELAY_MS} are waited out in chunks.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    let remaining = ms;
    let timer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const schedule = (): void => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, chunk);
    };
    schedule();
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Lets pending timers and I/O callbacks run before continuing.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const WINDOWS_RESERVED = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

/**
 * Turns an arbitrary label (typically `<export>-<ISO date>`) into a directory
 * name that is valid on Windows, macOS and Linux. Path separators are kept so
 * nested export paths still work.
 *
 * @example
 * getSafeDirectoryName('nightly:2024-01-01T10:00:00.000Z')
 * // => 'nightly_2024_01_01T10_00_00.000Z'
 */
export function getSafeDirectoryName(input: string): string {
  let safeName = input
    .replace(/[<>:"|?*\x00-\x1f]/g, '-')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-zA-Z0-9._/\\]/g, '_')
    .replace(/_+/g, '_')
    .slice(0, 200)
    .replace(/[. ]+$/, '');

  if (WINDOWS_RESERVED.has(safeName.toUpperCase())) {
    safeName = `_${safeName}`;
  }

  if (!safeName || safeName === '_') {
    return '_unnamed';
  }
  return safeName;
}

/**
 * Message of a caught value, which need not be an `Error`.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
