import { Mutex } from '@storefront/shared/src/utils/mutex';

describe('Mutex', () => {
     it('should run holders one at a time in call order', async () => {
          const mutex = new Mutex();
          const trace: string[] = [];

          const hold = (name: string, ticks: number) =>
               mutex.runExclusive(async () => {
                    trace.push(`${name}:start`);
                    for (let i = 0; i < ticks; i++) {
                         await Promise.resolve();
                    }
                    trace.push(`${name}:end`);
                    return name;
               });

          const results = await Promise.all([hold('a', 3), hold('b', 1), hold('c', 0)]);

          expect(results).toEqual(['a', 'b', 'c']);
          expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
     });

     it('should report whether it is held', async () => {
          const mutex = new Mutex();
          expect(mutex.isLocked).toBe(false);

          let observed = false;
          await mutex.runExclusive(() => {
               observed = mutex.isLocked;
          });

          expect(observed).toBe(true);
          expect(mutex.isLocked).toBe(false);
     });

     it('should release the lock when the holder throws', async () => {
          const mutex = new Mutex();

          await expect(
               mutex.runExclusive(() => {
                    throw new Error('holder failed');
               })
          ).rejects.toThrow('holder failed');

          await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
          expect(mutex.isLocked).toBe(false);
     });
});
