import { AxiosInstance } from 'axios';
import { DateWindow } from '../screening/dates';
import { describeError, ProviderError } from '../screening/errors';
import { ProviderIds } from '../screening/probes/provider-ids';
import { BaseProviderAdapter } from './provider.adapter';

/**
 * Adapter for the Kpler vessel compliance API. The endpoint takes a JSON
 * array of IMO numbers and answers with one risk record per vessel.
 */
export class KplerAdapter extends BaseProviderAdapter {
  constructor(
    private readonly path: string,
    http: AxiosInstance,
    maxRetries?: number,
  ) {
    super(ProviderIds.KPLER_VESSEL_RISKS, http, maxRetries);
  }

  async fetch(vesselImo: string, window: DateWindow): Promise<unknown> {
    const imo = Number(vesselImo);
    if (!Number.isInteger(imo)) {
      throw new ProviderError(`Kpler expects a numeric IMO, got ${vesselImo}`, this.id, vesselImo);
    }

    try {
      const response = await this.withRetry(() =>
        this.http.post<unknown>(this.path, [imo], {
          params: { startDate: window.start, endDate: window.end, accept: 'application/json' },
        }),
      );
      this.logger.debug(`Received Kpler vessel risks for ${vesselImo}`);
      return response.data;
    } catch (error) {
      this.logger.error(`Error fetching Kpler vessel risks: ${describeError(error)}`);
      throw ProviderError.from(error, this.id, vesselImo);
    }
  }
}
