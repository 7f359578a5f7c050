export interface RequestSignal {
  signal: AbortSignal;
  /** true once the timeout (not the caller) aborted the request */
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Abort signal that fires after `timeoutMs` or when `parent` aborts,
 * whichever comes first. Always call dispose() when the request settles.
 */
export function createRequestSignal(timeoutMs: number, parent?: AbortSignal): RequestSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  if (parent) {
    if (parent.aborted) {
      controller.abort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
