/**
 * FIFO async mutex. Critical sections queued behind a held lock run in
 * arrival order once it is released.
 */
export class Mutex {
  private queue: (() => void)[] = [];
  private locked = false;

  async lock<T>(fn: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = async () => {
        this.locked = true;
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        } finally {
          this.locked = false;
          const next = this.queue.shift();
          if (next) next();
        }
      };

      if (this.locked) {
        this.queue.push(() => void run());
      } else {
        void run();
      }
    });
  }
}
