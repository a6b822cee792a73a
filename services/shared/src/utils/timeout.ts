import { StepTimeoutError } from './errors';

/**
 * Race `work` against a timer. The timer is always cleared so nothing keeps
 * the process alive after the race settles.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, step: string): Promise<T> {
     let timer: NodeJS.Timeout | undefined;

     const timeout = new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => reject(new StepTimeoutError(step, timeoutMs)), timeoutMs);
     });

     try {
          return await Promise.race([work, timeout]);
     } finally {
          if (timer) clearTimeout(timer);
     }
}
