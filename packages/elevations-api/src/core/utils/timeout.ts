/**
 * Bounded waits for external collaborators
 */

import { OperationTimeoutError } from '../errors.js';

/**
 * Race an operation against a timer.
 *
 * The timer is always cleared so nothing keeps the process alive after the
 * operation settles. The underlying operation is not cancelled; callers that
 * can abort (fetch) should pass the signal through themselves.
 *
 * @throws {OperationTimeoutError} If the operation has not settled within timeoutMs
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
