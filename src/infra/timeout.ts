import { InfrastructureError } from '../errors.js';

/**
 * Reject with an InfrastructureError once `ms` elapse. The underlying work is
 * not cancelled; its eventual result is discarded.
 */
export const withTimeout = async <T>(work: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new InfrastructureError(`${label} exceeded ${ms}ms budget`)), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
};
