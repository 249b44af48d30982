export interface LockGuard<V> {
  /** Throws once the guard has been released. */
  readonly value: V;
  release(): void;
}

/**
 * Mutual exclusion with a non-blocking acquire only.
 *
 * There is no waiting path: callers that lose the race decide for themselves
 * whether to defer their work or drop it.
 */
export class TryLock<V> {
  private held = false;
  private readonly guarded: V;

  constructor(value: V) {
    this.guarded = value;
  }

  get isLocked(): boolean {
    return this.held;
  }

  tryAcquire(): LockGuard<V> | undefined {
    if (this.held) return undefined;
    this.held = true;

    let released = false;
    const guarded = this.guarded;
    const unlock = () => {
      this.held = false;
    };

    return {
      get value(): V {
        if (released) throw new Error('Lock guard used after release');
        return guarded;
      },
      release() {
        if (released) return;
        released = true;
        unlock();
      },
    };
  }
}
