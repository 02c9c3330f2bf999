import once from 'call-once-fn';

export type CodecCallback<T = Buffer> = (error: Error | null, result?: T) => void;

const schedule = typeof setImmediate === 'function' ? setImmediate : (fn: () => void) => process.nextTick(fn);

/**
 * Normalize the async contract: callbacks fire once, Promises optional for callers.
 */
export function runCodec<T>(executor: (callback: CodecCallback<T>) => void, callback?: CodecCallback<T>): Promise<T> | void {
  if (typeof callback === 'function') return executor(once(callback));
  return new Promise<T>((resolve, reject) =>
    executor((err, value) => {
      if (err) reject(err);
      else if (value === undefined) reject(new Error('Codec returned no data'));
      else resolve(value);
    })
  );
}

/**
 * Execute a synchronous codec without blocking the current stack frame.
 */
export function runSync<T>(fn: () => T, callback: CodecCallback<T>): void {
  schedule(() => {
    let value: T;
    try {
      value = fn();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    callback(null, value);
  });
}
