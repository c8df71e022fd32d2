import { ProviderError } from '../../screening/errors';
import { ProviderIds } from '../../screening/probes/provider-ids';
import { LLOYDS_ENDPOINTS, LloydsAdapter } from '../lloyds.adapter';
import { stubHttp } from './http.stub';

const WINDOW = { start: '2024-06-15', end: '2025-06-15' };

function endpoint(providerId: string) {
  const found = LLOYDS_ENDPOINTS.find((candidate) => candidate.providerId === providerId);
  if (!found) throw new Error(`unknown endpoint ${providerId}`);
  return found;
}

describe('LloydsAdapter', () => {
  it('should send the voyage date range to dated endpoints', async () => {
    const envelope = { IsSuccess: true, Data: { Items: [] }, Errors: [] };
    const { http, requests } = stubHttp(() => envelope);
    const adapter = new LloydsAdapter(endpoint(ProviderIds.LLOYDS_RISK_SCORE), http, 0);

    await expect(adapter.fetch('9123456', WINDOW)).resolves.toEqual(envelope);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('/vesselriskscore');
    expect(requests[0].params).toEqual({ vesselImo: '9123456', voyageDateRange: '2024-06-15-2025-06-15' });
  });

  it('should send only the IMO to undated endpoints', async () => {
    const { http, requests } = stubHttp(() => ({ IsSuccess: true, Data: { Items: [] }, Errors: [] }));
    const adapter = new LloydsAdapter(endpoint(ProviderIds.LLOYDS_SANCTIONS), http, 0);

    await adapter.fetch('9123456', WINDOW);

    expect(requests[0].url).toBe('/vesselsanctions_v2');
    expect(requests[0].params).toEqual({ vesselImo: '9123456' });
  });

  it('should reject an unsuccessful envelope', async () => {
    const { http } = stubHttp(() => ({ IsSuccess: false, Data: null, Errors: ['Invalid IMO'] }));
    const adapter = new LloydsAdapter(endpoint(ProviderIds.LLOYDS_SANCTIONS), http, 0);

    const failure = adapter.fetch('1', WINDOW);
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('/vesselsanctions_v2 reported failure: ["Invalid IMO"]');
  });

  it('should wrap transport failures in a provider error', async () => {
    const { http } = stubHttp(() => {
      throw new Error('socket hang up');
    });
    const adapter = new LloydsAdapter(endpoint(ProviderIds.LLOYDS_SANCTIONS), http, 0);

    await expect(adapter.fetch('9123456', WINDOW)).rejects.toThrow('lloyds.sanctions request failed: socket hang up');
  });

  it('should retry a failed request before giving up', async () => {
    let calls = 0;
    const { http } = stubHttp(() => {
      calls += 1;
      if (calls === 1) throw new Error('ECONNRESET');
      return { IsSuccess: true, Data: { Items: [] }, Errors: [] };
    });
    const adapter = new LloydsAdapter(endpoint(ProviderIds.LLOYDS_SANCTIONS), http, 1);

    await expect(adapter.fetch('9123456', WINDOW)).resolves.toEqual({ IsSuccess: true, Data: { Items: [] }, Errors: [] });
    expect(calls).toBe(2);
  });
});
