import { describe, it, expect, vi } from 'vitest';
import { LazyCell } from '../../../src/main/utils/lazyCell';

describe('LazyCell', () => {
  it('should compute the value on first access', async () => {
    const cell = new LazyCell<number>();
    const init = vi.fn(async () => 42);

    expect(cell.isResolved()).toBe(false);
    await expect(cell.get(init)).resolves.toBe(42);
    expect(cell.isResolved()).toBe(true);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('should not run the initializer again once resolved', async () => {
    const cell = new LazyCell<string | null>();
    const init = vi.fn(async () => null);

    await cell.get(init);
    await cell.get(init);
    await cell.get(async () => 'other');

    await expect(cell.get(init)).resolves.toBeNull();
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('should share the pending computation between concurrent callers', async () => {
    const cell = new LazyCell<number>();
    let release: (value: number) => void = () => undefined;
    const init = vi.fn(
      () =>
        new Promise<number>((resolve) => {
          release = resolve;
        }),
    );

    const first = cell.get(init);
    const second = cell.get(init);
    release(7);

    await expect(Promise.all([first, second])).resolves.toEqual([7, 7]);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('should remember a failure', async () => {
    const cell = new LazyCell<number>();
    const error = new Error('disk on fire');
    const init = vi.fn(async (): Promise<number> => {
      throw error;
    });

    await expect(cell.get(init)).rejects.toBe(error);
    await expect(cell.get(async () => 1)).rejects.toBe(error);
    expect(init).toHaveBeenCalledTimes(1);
    expect(cell.isResolved()).toBe(true);
  });

  it('should remember an initializer that throws synchronously', async () => {
    const cell = new LazyCell<number>();
    const error = new Error('sync failure');

    await expect(
      cell.get(() => {
        throw error;
      }),
    ).rejects.toBe(error);
    expect(cell.isResolved()).toBe(true);
    await expect(cell.get(async () => 1)).rejects.toBe(error);
  });
});
