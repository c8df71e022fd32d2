import { ProviderError } from '../errors';
import { FetchCache } from '../fetch-cache';

describe('FetchCache', () => {
  const window = { start: '2024-06-15', end: '2025-06-15' };
  let cache: FetchCache;

  beforeEach(() => {
    cache = new FetchCache();
  });

  it('should invoke the fetch function once for concurrent callers of the same key', async () => {
    let release: (value: unknown) => void = () => undefined;
    const fetchFn = jest.fn(() => new Promise<unknown>((resolve) => (release = resolve)));

    const first = cache.getOrFetch('lloyds.sanctions', '9876543', window, fetchFn);
    const second = cache.getOrFetch('lloyds.sanctions', '9876543', window, fetchFn);
    release({ ok: true });

    const outcomes = await Promise.all([first, second]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(outcomes[0]).toBe(outcomes[1]);
    expect(outcomes[0]).toEqual({ status: 'fulfilled', payload: { ok: true } });
    expect(cache.invocations).toBe(1);
  });

  it('should keep separate entries per subject and window', async () => {
    const fetchFn = jest.fn(() => Promise.resolve('payload'));

    await cache.getOrFetch('kpler.vesselRisks', '1111111', window, fetchFn);
    await cache.getOrFetch('kpler.vesselRisks', '2222222', window, fetchFn);
    await cache.getOrFetch('kpler.vesselRisks', '1111111', { start: '2025-01-01', end: '2025-06-15' }, fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(cache.size).toBe(3);
    expect(cache.has('kpler.vesselRisks', '2222222', window)).toBe(true);
  });

  it('should store a failure as an outcome and not retry it', async () => {
    const fetchFn = jest.fn(() => Promise.reject(new Error('socket hang up')));

    const first = await cache.getOrFetch('lloyds.riskScore', '9876543', window, fetchFn);
    const second = await cache.getOrFetch('lloyds.riskScore', '9876543', window, fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    if (first.status !== 'failed') {
      throw new Error('expected a failed outcome');
    }
    expect(first.error).toBeInstanceOf(ProviderError);
    expect(first.error.message).toBe('lloyds.riskScore request failed: socket hang up');
    expect(first.error.providerId).toBe('lloyds.riskScore');
    expect(first.error.subjectId).toBe('9876543');
  });

  it('should pass provider errors through unchanged', async () => {
    const timeout = ProviderError.timeout('kpler.vesselRisks', '9876543', 50);
    const outcome = await cache.getOrFetch('kpler.vesselRisks', '9876543', window, () => Promise.reject(timeout));

    expect(outcome).toEqual({ status: 'failed', error: timeout });
  });
});
