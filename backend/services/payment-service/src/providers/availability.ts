import { PaymentProvider } from './provider.interface';

/**
 * Ask a provider whether it is up, giving it at most timeoutMs.
 *
 * Resolves false on timeout, on error, or when the parent signal aborts.
 * Never rejects.
 */
export async function probeAvailability(
  provider: PaymentProvider,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(false);
    }, timeoutMs);

    if (signal) {
      onParentAbort = () => {
        controller.abort();
        resolve(false);
      };
      signal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  const probe = provider.isAvailable(controller.signal).then(
    (available) => available === true,
    () => false
  );

  try {
    return await Promise.race([probe, deadline]);
  } finally {
    clearTimeout(timer);
    if (signal && onParentAbort) {
      signal.removeEventListener('abort', onParentAbort);
    }
  }
}
