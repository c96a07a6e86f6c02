/**
 * A value computed on first access and remembered afterwards.
 *
 * The initializer runs at most once per cell. Callers arriving while it runs
 * share the same promise, and a failure is remembered like a value: every
 * later `get` rejects with the same error.
 */

type CellState<T> =
  | { status: 'unresolved' }
  | { status: 'resolving'; promise: Promise<T> }
  | { status: 'resolved'; value: T }
  | { status: 'failed'; error: unknown };

export class LazyCell<T> {
  private state: CellState<T> = { status: 'unresolved' };

  get(init: () => Promise<T>): Promise<T> {
    switch (this.state.status) {
      case 'resolved':
        return Promise.resolve(this.state.value);
      case 'failed':
        return Promise.reject(this.state.error);
      case 'resolving':
        return this.state.promise;
      case 'unresolved': {
        const promise = this.run(init);
        // an initializer that throws synchronously has already settled the state
        if (this.state.status === 'unresolved') {
          this.state = { status: 'resolving', promise };
        }
        return promise;
      }
    }
  }

  isResolved(): boolean {
    return this.state.status === 'resolved' || this.state.status === 'failed';
  }

  private async run(init: () => Promise<T>): Promise<T> {
    try {
      const value = await init();
      this.state = { status: 'resolved', value };
      return value;
    } catch (error: unknown) {
      this.state = { status: 'failed', error };
      throw error;
    }
  }
}
