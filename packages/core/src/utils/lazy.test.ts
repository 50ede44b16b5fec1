import { Lazy } from './lazy.js';

describe('Lazy', () => {
  it('runs the factory once, on first read', () => {
    const factory = vi.fn(() => ({ opened: true }));
    const lazy = new Lazy(factory);

    expect(lazy.isValueCreated).toBe(false);
    expect(factory).not.toHaveBeenCalled();

    const first = lazy.value;
    const second = lazy.value;

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(lazy.isValueCreated).toBe(true);
  });

  it('retries the factory after a failure', () => {
    const factory = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw new Error('store missing');
      })
      .mockReturnValueOnce('handle');
    const lazy = new Lazy(factory);

    expect(() => lazy.value).toThrow('store missing');
    expect(lazy.isValueCreated).toBe(false);
    expect(lazy.value).toBe('handle');
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
