/**
 * Sleep for `ms` milliseconds. Timers cannot fire sooner than 1ms, so
 * shorter pauses only yield to the event loop.
 */
export const delay = (ms: number) =>
  new Promise<void>(resolve => {
    if (ms < 1) {
      setImmediate(resolve);
    } else {
      setTimeout(resolve, ms);
    }
  });
