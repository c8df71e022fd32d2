import { ProviderError } from '../../screening/errors';
import { KplerAdapter } from '../kpler.adapter';
import { stubHttp } from './http.stub';

const WINDOW = { start: '2024-06-15', end: '2025-06-15' };

describe('KplerAdapter', () => {
  it('should post the numeric IMO with the date window', async () => {
    const payload = [{ vessel: { imo: 9123456 }, compliance: {} }];
    const { http, requests } = stubHttp(() => payload);
    const adapter = new KplerAdapter('/compliance/vessel-risks', http, 0);

    await expect(adapter.fetch('9123456', WINDOW)).resolves.toEqual(payload);
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/compliance/vessel-risks');
    expect(requests[0].data).toBe('[9123456]');
    expect(requests[0].params).toEqual({ startDate: '2024-06-15', endDate: '2025-06-15', accept: 'application/json' });
  });

  it('should refuse a non-numeric IMO without calling the API', async () => {
    const { http, requests } = stubHttp(() => []);
    const adapter = new KplerAdapter('/compliance/vessel-risks', http, 0);

    const failure = adapter.fetch('IMO-ABC', WINDOW);
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('Kpler expects a numeric IMO, got IMO-ABC');
    expect(requests).toHaveLength(0);
  });
});
