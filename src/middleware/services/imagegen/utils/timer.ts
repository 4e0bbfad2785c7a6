/**
 * Waits between status polls. Injected so tests do not sleep.
 */
export interface Timer {
  wait(ms: number, signal?: AbortSignal): Promise<void>;
}

export class AbortedWaitError extends Error {
  constructor() {
    super('Wait aborted');
    this.name = 'AbortedWaitError';
  }
}

export const realTimer: Timer = {
  wait(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedWaitError());
        return;
      }

      const onAbort = () => {
        clearTimeout(handle);
        reject(new AbortedWaitError());
      };

      const handle = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};
