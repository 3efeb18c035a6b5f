export type PollWaitOutcome = 'elapsed' | 'stopped';

/**
 * Wait out one poll interval. Settles early with 'stopped' when the
 * signal aborts; never rejects.
 */
export function waitForNextPoll(intervalMs: number, signal: AbortSignal): Promise<PollWaitOutcome> {
  if (signal.aborted) return Promise.resolve('stopped');

  return new Promise((resolve) => {
    const onStop = () => {
      clearTimeout(timer);
      resolve('stopped');
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onStop);
      resolve('elapsed');
    }, intervalMs);

    signal.addEventListener('abort', onStop, { once: true });
  });
}
