import {
  IllegalTransitionError,
  MemoryError,
  NotFoundError,
  StoreUnavailableError,
  toResult
} from '../../core/errors';

describe('toResult', () => {
  it('wraps values in a successful result', async () => {
    await expect(toResult(async () => 42)).resolves.toEqual({ ok: true, value: 42 });
  });

  it('turns caller-facing errors into failures', async () => {
    const result = await toResult(async () => {
      throw new NotFoundError(7);
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.code).toBe('not_found');
      expect(result.error.message).toBe('Memory #7 not found');
    }
  });

  it('rethrows store outages and unexpected errors', async () => {
    const outage = new StoreUnavailableError('down', new Error('ECONNREFUSED'));

    await expect(toResult(async () => { throw outage; })).rejects.toBe(outage);
    await expect(toResult(async () => { throw new TypeError('bug'); })).rejects.toThrow(TypeError);
  });

  it('keeps the error hierarchy intact', () => {
    const error = new IllegalTransitionError('nope');

    expect(error).toBeInstanceOf(MemoryError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('IllegalTransitionError');
    expect(new StoreUnavailableError('down', 'cause').cause).toBe('cause');
  });
});
