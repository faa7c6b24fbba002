import { randomBytes } from 'crypto';
import { isIPv6 } from 'net';

/**
 * Generate a random ID using crypto random bytes
 */
export function createId(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Delay utility for async operations. Rejects with the signal's reason
 * as soon as the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with the promise, or reject with the signal's reason as soon as the
 * signal aborts, whichever comes first.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * True when the error is the rejection of an aborted operation
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && error === signal.reason) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Validate if a string is a valid address (IPv4, IPv6 or hostname)
 */
export function isValidAddress(address: string): boolean {
  if (isIPv6(address)) {
    return true;
  }

  // IPv4 pattern
  const ipv4Pattern = /^(\d{1,3}\.){3}\d{1,3}$/;
  // Basic hostname pattern
  const hostnamePattern = /^[a-zA-Z0-9.-]+$/;

  if (ipv4Pattern.test(address)) {
    // Validate IPv4 ranges
    const parts = address.split('.').map(Number);
    return parts.every(part => part >= 0 && part <= 255);
  }

  return hostnamePattern.test(address) && address.length > 0;
}

/**
 * Error code carried by a Node.js system error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
