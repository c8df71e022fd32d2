import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DescriptionLookupService } from '../../descriptions/description-lookup.service';
import { ProviderGatewayService } from '../../providers/provider-gateway.service';
import { ScreenRequestDto } from '../dto/screen-request.dto';
import { ScreeningLog, ScreeningStatus } from '../entities/screening-log.entity';
import { ConfigurationError, describeError, ScreeningCancelledError } from '../errors';
import { ProbeRegistry } from '../probe-registry';
import { registerDefaultProbes } from '../probes/default-probes';
import { ProbeParameter, ScreeningParams } from '../probes/probe.interface';
import { RiskLevel } from '../risk-level';
import { SerializedRiskRecord } from '../risk-record';
import { ScreeningOrchestrator, ScreeningSummary } from '../screening-orchestrator';

export interface CheckDescriptor {
  checkId: string;
  kind: 'probe' | 'aggregate';
  businessModule: string;
  riskDescription: string;
  requiredParameters: readonly ProbeParameter[];
  validLevels: readonly RiskLevel[];
  components: readonly string[];
}

export interface ScreeningResponse {
  screeningId: string;
  subjectId: string;
  evaluatedAt: string;
  summary: ScreeningSummary;
  records: SerializedRiskRecord[];
}

@Injectable()
export class ScreeningService {
  private readonly logger = new Logger(ScreeningService.name);
  private readonly orchestrator: ScreeningOrchestrator;

  constructor(
    configService: ConfigService,
    providerGateway: ProviderGatewayService,
    private descriptionLookup: DescriptionLookupService,
    @InjectRepository(ScreeningLog)
    private screeningLogRepository: Repository<ScreeningLog>,
  ) {
    const registry = registerDefaultProbes(new ProbeRegistry());
    registry.seal();

    this.orchestrator = new ScreeningOrchestrator(registry, {
      providerTimeoutMs: configService.get<number>('screening.providerTimeoutMs'),
      windowDays: configService.get<number>('screening.windowDays'),
    });
    for (const client of providerGateway.clients()) {
      this.orchestrator.registerProvider(client);
    }
    this.logger.log(`Screening engine ready with ${registry.ids().length} checks`);
  }

  listChecks(): CheckDescriptor[] {
    return this.orchestrator.registry.entries().map((registration) => {
      const { probe } = registration;
      return {
        checkId: probe.id,
        kind: probe.kind,
        businessModule: registration.businessModule,
        riskDescription: probe.riskDescription,
        requiredParameters: registration.requiredParameters,
        validLevels: registration.validLevels,
        components: probe.kind === 'aggregate' ? probe.componentProbeIds() : [],
      };
    });
  }

  async screen(request: ScreenRequestDto, signal?: AbortSignal): Promise<ScreeningResponse> {
    const startedAt = Date.now();
    const params = this.toParams(request);

    try {
      const descriptions = await this.descriptionLookup.snapshot();
      const records = await this.orchestrator.execute(request.checkIds, request.subjectId, params, { signal });
      const summary = this.orchestrator.summarize(records);
      const serialized = records.map((record) => descriptions.decorate(record));

      const log = await this.saveLog(request, params, {
        status: ScreeningStatus.COMPLETED,
        overallLevel: summary.overall,
        records: serialized,
        durationMs: Date.now() - startedAt,
      });
      this.logger.log(`Screened ${request.subjectId}: ${records.length} checks, overall ${summary.overall}`);

      return {
        screeningId: log.id,
        subjectId: request.subjectId,
        evaluatedAt: params.evaluatedAt.toISOString(),
        summary,
        records: serialized,
      };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        await this.saveLog(request, params, {
          status: ScreeningStatus.REJECTED,
          errorMessage: error.message,
          durationMs: Date.now() - startedAt,
        });
        throw new BadRequestException(error.message);
      }
      if (error instanceof ScreeningCancelledError) {
        await this.saveLog(request, params, {
          status: ScreeningStatus.CANCELLED,
          errorMessage: error.message,
          durationMs: Date.now() - startedAt,
        });
      } else {
        this.logger.error(`Screening ${request.subjectId} failed: ${describeError(error)}`);
      }
      throw error;
    }
  }

  async getScreening(id: string): Promise<ScreeningLog> {
    const log = await this.screeningLogRepository.findOne({ where: { id } });
    if (!log) {
      throw new NotFoundException(`Screening with ID ${id} not found`);
    }
    return log;
  }

  async getHistory(subjectId: string, limit = 20): Promise<ScreeningLog[]> {
    return this.screeningLogRepository.find({
      where: { subjectId },
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }

  private toParams(request: ScreenRequestDto): ScreeningParams {
    const parties: Record<string, string> = {};
    for (const [role, partyId] of Object.entries(request.parties ?? {})) {
      if (typeof partyId !== 'string') {
        throw new BadRequestException(`parties.${role} must be a string`);
      }
      parties[role] = partyId;
    }
    return {
      evaluatedAt: request.evaluatedAt ?? new Date(),
      startDate: request.startDate,
      endDate: request.endDate,
      countryName: request.countryName,
      parties,
    };
  }

  private async saveLog(
    request: ScreenRequestDto,
    params: ScreeningParams,
    outcome: Pick<ScreeningLog, 'status' | 'durationMs'> & Partial<Pick<ScreeningLog, 'overallLevel' | 'records' | 'errorMessage'>>,
  ): Promise<ScreeningLog> {
    const log = this.screeningLogRepository.create({
      subjectId: request.subjectId,
      checkIds: request.checkIds,
      params: {
        evaluatedAt: params.evaluatedAt.toISOString(),
        startDate: params.startDate ?? null,
        endDate: params.endDate ?? null,
        countryName: params.countryName ?? null,
        parties: params.parties ?? {},
      },
      overallLevel: null,
      records: [],
      errorMessage: null,
      ...outcome,
    });
    return this.screeningLogRepository.save(log);
  }
}
