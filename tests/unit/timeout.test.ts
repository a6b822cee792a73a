import { StepTimeoutError } from '@storefront/shared/src/utils/errors';
import { withTimeout } from '@storefront/shared/src/utils/timeout';

describe('withTimeout', () => {
     afterEach(() => {
          jest.useRealTimers();
     });

     it('should resolve with the work result when it finishes first', async () => {
          await expect(withTimeout(Promise.resolve(42), 100, 'RESERVE')).resolves.toBe(42);
     });

     it('should pass through the work rejection', async () => {
          await expect(
               withTimeout(Promise.reject(new Error('collaborator down')), 100, 'RESERVE')
          ).rejects.toThrow('collaborator down');
     });

     it('should reject with StepTimeoutError when the work is too slow', async () => {
          jest.useFakeTimers();
          const never = new Promise<number>(() => undefined);

          const raced = withTimeout(never, 250, 'AUTHORIZE_PAYMENT');
          jest.advanceTimersByTime(250);

          await expect(raced).rejects.toBeInstanceOf(StepTimeoutError);
          await expect(raced).rejects.toThrow('AUTHORIZE_PAYMENT timed out after 250ms');
     });

     it('should clear its timer once the race settles', async () => {
          jest.useFakeTimers();
          await withTimeout(Promise.resolve('done'), 1000, 'CAPTURE_PAYMENT');
          expect(jest.getTimerCount()).toBe(0);
     });
});
