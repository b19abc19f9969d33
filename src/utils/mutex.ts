/**
 * @file utils/mutex.ts
 * @description Verrou asynchrone (FIFO) pour sérialiser les sections critiques
 *
 * Usage:
 *   const mutex = new Mutex();
 *   const result = await mutex.runExclusive(async () => { ... });
 */

export type Release = () => void;

export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Attend le verrou. La fonction retournée le libère (appel unique).
   */
  acquire(): Promise<Release> {
    return new Promise((resolve) => {
      const grant = () => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (!this.locked) {
        grant();
      } else {
        this.waiters.push(grant);
      }
    });
  }

  /**
   * Exécute fn en section critique; le verrou est libéré même en cas d'erreur
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Nombre d'appelants en attente */
  get pending(): number {
    return this.waiters.length;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
