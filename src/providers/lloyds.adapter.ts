import { AxiosInstance } from 'axios';
import { DateWindow } from '../screening/dates';
import { describeError, ProviderError } from '../screening/errors';
import { isPlainRecord } from '../screening/probes/payload';
import { ProviderIds } from '../screening/probes/provider-ids';
import { BaseProviderAdapter } from './provider.adapter';

interface LloydsEndpoint {
  providerId: string;
  path: string;
  /** Whether the endpoint takes the `voyageDateRange` query parameter. */
  dated: boolean;
}

export const LLOYDS_ENDPOINTS: readonly LloydsEndpoint[] = [
  { providerId: ProviderIds.LLOYDS_SANCTIONS, path: '/vesselsanctions_v2', dated: false },
  { providerId: ProviderIds.LLOYDS_RISK_SCORE, path: '/vesselriskscore', dated: true },
  { providerId: ProviderIds.LLOYDS_COMPLIANCE, path: '/vesselcompliancescreening_v3', dated: true },
  { providerId: ProviderIds.LLOYDS_ADVANCED_COMPLIANCE, path: '/vesseladvancedcompliancerisk_v3', dated: false },
  { providerId: ProviderIds.LLOYDS_VOYAGE_EVENTS, path: '/vesselvoyageevents', dated: true },
];

/**
 * Adapter for one Lloyd's List Intelligence endpoint.
 * Every endpoint answers `{ IsSuccess, Data, Errors }`; an unsuccessful
 * envelope is treated as a provider failure.
 */
export class LloydsAdapter extends BaseProviderAdapter {
  constructor(
    private readonly endpoint: LloydsEndpoint,
    http: AxiosInstance,
    maxRetries?: number,
  ) {
    super(endpoint.providerId, http, maxRetries);
  }

  async fetch(vesselImo: string, window: DateWindow): Promise<unknown> {
    this.logger.log(`Fetching ${this.endpoint.path} for vessel ${vesselImo}`);

    const params: Record<string, string> = { vesselImo };
    if (this.endpoint.dated) {
      params.voyageDateRange = `${window.start}-${window.end}`;
    }

    let body: unknown;
    try {
      const response = await this.withRetry(() => this.http.get<unknown>(this.endpoint.path, { params }));
      body = response.data;
    } catch (error) {
      this.logger.error(`Error fetching ${this.endpoint.path}: ${describeError(error)}`);
      throw ProviderError.from(error, this.id, vesselImo);
    }

    if (!isPlainRecord(body) || body.IsSuccess !== true) {
      const errors = isPlainRecord(body) ? JSON.stringify(body.Errors ?? null) : typeof body;
      throw new ProviderError(`${this.endpoint.path} reported failure: ${errors}`, this.id, vesselImo);
    }
    return body;
  }
}
