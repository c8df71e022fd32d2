import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { Repository } from 'typeorm';
import { EntityVerdict } from '../entity-risk/entities/entity-verdict.entity';
import { ProviderClient } from '../screening/probes/probe.interface';
import { ProviderIds } from '../screening/probes/provider-ids';
import { BreakerOptions, CircuitBreakerClient } from './circuit-breaker.client';
import { ReferenceListEntry, ReferenceListName } from './entities/reference-list-entry.entity';
import { EntityVerdictClient } from './entity-verdict.client';
import { KplerAdapter } from './kpler.adapter';
import { LLOYDS_ENDPOINTS, LloydsAdapter } from './lloyds.adapter';
import { ReferenceListClient } from './reference-list.client';

const USER_AGENT = 'VesselScreening/1.0';
const MAX_RATE_LIMIT_RETRIES = 3;

/**
 * Builds every provider client the screening engine needs. Remote APIs go
 * through a shared axios setup and a circuit breaker each; local lists and
 * verdicts are read straight from the database.
 */
@Injectable()
export class ProviderGatewayService implements OnModuleDestroy {
  private readonly logger = new Logger(ProviderGatewayService.name);
  private readonly remoteClients: CircuitBreakerClient[];
  private readonly localClients: ProviderClient[];

  constructor(
    private configService: ConfigService,
    @InjectRepository(ReferenceListEntry)
    referenceListRepository: Repository<ReferenceListEntry>,
    @InjectRepository(EntityVerdict)
    entityVerdictRepository: Repository<EntityVerdict>,
  ) {
    const breakerOptions: BreakerOptions = {
      timeout: this.configService.get<number>('providers.circuitBreaker.timeout', 10000),
      errorThresholdPercentage: this.configService.get<number>('providers.circuitBreaker.errorThresholdPercentage', 50),
      resetTimeout: this.configService.get<number>('providers.circuitBreaker.resetTimeout', 30000),
    };

    const lloydsHttp = this.createHttpClient('lloyds');
    const lloydsRetries = this.configService.get<number>('providers.lloyds.maxRetries');
    const kplerHttp = this.createHttpClient('kpler');
    const kplerPath = this.configService.get<string>('providers.kpler.vesselRisksPath', '/compliance/vessel-risks');

    this.remoteClients = [
      ...LLOYDS_ENDPOINTS.map((endpoint) => new LloydsAdapter(endpoint, lloydsHttp, lloydsRetries)),
      new KplerAdapter(kplerPath, kplerHttp, this.configService.get<number>('providers.kpler.maxRetries')),
    ].map((client) => new CircuitBreakerClient(client, breakerOptions));

    this.localClients = [
      new ReferenceListClient(
        { id: ProviderIds.REFERENCE_UANI, listName: ReferenceListName.UANI, keyField: 'imo', matchOnSubject: true },
        referenceListRepository,
      ),
      new ReferenceListClient(
        {
          id: ProviderIds.REFERENCE_CARGO_COUNTRIES,
          listName: ReferenceListName.CARGO_COUNTRIES,
          keyField: 'countryName',
          matchOnSubject: false,
        },
        referenceListRepository,
      ),
      new ReferenceListClient(
        {
          id: ProviderIds.REFERENCE_PORT_COUNTRIES,
          listName: ReferenceListName.PORT_COUNTRIES,
          keyField: 'countryName',
          matchOnSubject: false,
        },
        referenceListRepository,
      ),
      new EntityVerdictClient(entityVerdictRepository),
    ];
  }

  clients(): ProviderClient[] {
    return [...this.remoteClients, ...this.localClients];
  }

  /** Ids of remote providers whose circuit is currently open. */
  unavailableProviders(): string[] {
    return this.remoteClients.filter((client) => client.opened).map((client) => client.id);
  }

  onModuleDestroy(): void {
    for (const client of this.remoteClients) {
      client.shutdown();
    }
  }

  /**
   * Creates a provider-specific axios instance with auth, common headers and
   * rate limit handling.
   */
  private createHttpClient(provider: 'lloyds' | 'kpler'): AxiosInstance {
    const apiKey = this.configService.get<string>(`providers.${provider}.apiKey`, '');
    if (!apiKey) {
      this.logger.warn(`No API key configured for ${provider}; its checks will report no data`);
    }

    const instance = axios.create({
      baseURL: this.configService.get<string>(`providers.${provider}.baseUrl`),
      headers: {
        'User-Agent': USER_AGENT,
        'Content-Type': 'application/json',
        Authorization: apiKey,
      },
    });

    const rateLimitRetries = new WeakMap<InternalAxiosRequestConfig, number>();
    instance.interceptors.response.use(
      (response) => response,
      async (error: unknown) => {
        if (axios.isAxiosError(error) && error.response?.status === 429 && error.config) {
          const attempt = rateLimitRetries.get(error.config) ?? 0;
          if (attempt < MAX_RATE_LIMIT_RETRIES) {
            rateLimitRetries.set(error.config, attempt + 1);
            const retryAfter = Number(error.response.headers['retry-after']) || 1;
            this.logger.warn(`${provider} rate limited the request, retrying in ${retryAfter}s`);
            await new Promise((resolve) => setTimeout(resolve, retryAfter * 1000));
            return instance(error.config);
          }
        }
        return Promise.reject(error);
      },
    );

    return instance;
  }
}
