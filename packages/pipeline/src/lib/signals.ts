/**
 * Abort as soon as any of the given signals aborts.
 */
export function anySignal(signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);

  const onAbort = () => {
    controller.abort();
    for (const signal of present) {
      signal.removeEventListener('abort', onAbort);
    }
  };

  for (const signal of present) {
    if (signal.aborted) {
      onAbort();
      break;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  }

  return controller.signal;
}
