export interface TimeoutSignal {
  signal?: AbortSignal;
  didTimeout: () => boolean;
  cleanup: () => void;
}

/**
 * Derives a signal that aborts when the caller's signal does or when
 * `timeoutMs` elapses. A non-positive timeout passes the caller's signal through.
 */
export function withTimeoutSignal(options: { signal?: AbortSignal; timeoutMs: number }): TimeoutSignal {
  const { signal: parent, timeoutMs } = options;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return { signal: parent, didTimeout: () => false, cleanup: () => undefined };
  }

  const controller = new AbortController();
  let timedOut = false;
  const forward = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    forward();
  } else {
    parent?.addEventListener('abort', forward, { once: true });
  }

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    didTimeout: () => timedOut,
    cleanup: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', forward);
    },
  };
}
