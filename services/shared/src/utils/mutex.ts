/**
 * FIFO async mutex. Holders run one at a time in the order they called
 * `runExclusive`, including across `await` points inside the callback.
 */
export class Mutex {
     private tail: Promise<void> = Promise.resolve();
     private pending = 0;

     get isLocked(): boolean {
          return this.pending > 0;
     }

     async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
          const previous = this.tail;
          let unlock: () => void = () => undefined;
          this.tail = new Promise<void>((resolve) => {
               unlock = resolve;
          });
          this.pending++;

          await previous;
          try {
               return await fn();
          } finally {
               this.pending--;
               unlock();
          }
     }
}
