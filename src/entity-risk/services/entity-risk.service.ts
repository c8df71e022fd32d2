import { InjectQueue } from '@nestjs/bull';
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Queue } from 'bull';
import { DataSource, Repository } from 'typeorm';
import { DescriptionLookupService } from '../../descriptions/description-lookup.service';
import { describeError } from '../../screening/errors';
import { parseRiskLevel, RiskLevel } from '../../screening/risk-level';
import { AssociatedPartyRecord } from '../entities/associated-party.entity';
import { EntityRiskRun, EntityRiskRunStatus } from '../entities/entity-risk-run.entity';
import { EntitySignal } from '../entities/entity-signal.entity';
import { EntityVerdict } from '../entities/entity-verdict.entity';
import { SanctionedCountry } from '../entities/sanctioned-country.entity';
import { resolveEntityRisk } from '../entity-risk-resolver';
import { AssociatedParty, BucketLevel, isBucketLevel, ResolvedEntityRisk, SignalRow } from '../signal-row';

export const ENTITY_RISK_QUEUE = 'entity-risk-queue';
export const RESOLVE_ENTITIES_JOB = 'resolve-entities';

export interface ResolveEntitiesJob {
  runId: string;
}

/**
 * Reads an upstream flag column. Case and padding are ignored; a non-blank
 * value outside the bucket vocabulary is undetermined rather than dropped.
 */
export function toFlagLevel(value: string | null): BucketLevel | null {
  if (value === null || value.trim() === '') return null;
  const level = parseRiskLevel(value);
  return isBucketLevel(level) ? level : RiskLevel.UNDETERMINED;
}

export function toSignalRow(signal: EntitySignal): SignalRow {
  return {
    entityId: signal.entityId,
    entityDate: signal.entityDate,
    activeStatus: signal.activeStatus,
    primaryName: signal.primaryName,
    secondaryName: signal.secondaryName,
    primaryCountry: signal.primaryCountry,
    secondaryCountry: signal.secondaryCountry,
    dateValue: signal.dateValue,
    sanctionsName: signal.sanctionsName,
    sanctionDescription: signal.sanctionDescription,
    scopeDescription: signal.scopeDescription,
    startTime: signal.startTime,
    endTime: signal.endTime,
    flags: { is_san: toFlagLevel(signal.isSan), is_sco: toFlagLevel(signal.isSco), is_ool: toFlagLevel(signal.isOol) },
  };
}

function toAssociatedParty(record: AssociatedPartyRecord): AssociatedParty {
  return {
    entityId: record.entityId,
    partyId: record.partyId,
    partyName: record.partyName,
    level: toFlagLevel(record.level),
    sourceType: record.sourceType,
    relation: record.relation,
  };
}

/**
 * Bulk entity risk: resolves every entity in the signal table into one
 * verdict and replaces the verdict table with the result.
 */
@Injectable()
export class EntityRiskService {
  private readonly logger = new Logger(EntityRiskService.name);

  constructor(
    @InjectRepository(EntitySignal)
    private entitySignalRepository: Repository<EntitySignal>,
    @InjectRepository(SanctionedCountry)
    private sanctionedCountryRepository: Repository<SanctionedCountry>,
    @InjectRepository(AssociatedPartyRecord)
    private associatedPartyRepository: Repository<AssociatedPartyRecord>,
    @InjectRepository(EntityVerdict)
    private entityVerdictRepository: Repository<EntityVerdict>,
    @InjectRepository(EntityRiskRun)
    private entityRiskRunRepository: Repository<EntityRiskRun>,
    private descriptionLookup: DescriptionLookupService,
    private dataSource: DataSource,
    @InjectQueue(ENTITY_RISK_QUEUE) private entityRiskQueue: Queue<ResolveEntitiesJob>,
  ) {}

  async scheduleRun(evaluatedAt: Date = new Date()): Promise<EntityRiskRun> {
    const run = await this.entityRiskRunRepository.save(
      this.entityRiskRunRepository.create({ status: EntityRiskRunStatus.PENDING, evaluatedAt }),
    );
    await this.entityRiskQueue.add(RESOLVE_ENTITIES_JOB, { runId: run.id });
    this.logger.log(`Queued entity risk run ${run.id}`);
    return run;
  }

  async executeRun(runId: string): Promise<EntityRiskRun> {
    const run = await this.getRun(runId);
    run.status = EntityRiskRunStatus.PROCESSING;
    await this.entityRiskRunRepository.save(run);

    try {
      const verdicts = await this.resolve(run.evaluatedAt);
      await this.replaceVerdicts(run.id, verdicts);
      run.status = EntityRiskRunStatus.COMPLETED;
      run.entityCount = verdicts.length;
      this.logger.log(`Entity risk run ${run.id} resolved ${verdicts.length} entities`);
    } catch (error) {
      run.status = EntityRiskRunStatus.FAILED;
      run.errorMessage = describeError(error);
      await this.entityRiskRunRepository.save(run);
      throw error;
    }
    return this.entityRiskRunRepository.save(run);
  }

  /** Loads the current signal and reference tables and resolves them. Writes nothing. */
  async resolve(evaluatedAt: Date): Promise<ResolvedEntityRisk[]> {
    const [signals, countries, parties, descriptions] = await Promise.all([
      this.entitySignalRepository.find({ order: { entityId: 'ASC' } }),
      this.sanctionedCountryRepository.find(),
      this.associatedPartyRepository.find(),
      this.descriptionLookup.snapshot(),
    ]);

    return resolveEntityRisk(
      signals.map(toSignalRow),
      {
        evaluatedAt,
        sanctionedCountries: countries.map((country) => country.countryName),
        descriptions,
      },
      parties.map(toAssociatedParty),
    );
  }

  async getRun(id: string): Promise<EntityRiskRun> {
    const run = await this.entityRiskRunRepository.findOne({ where: { id } });
    if (!run) {
      throw new NotFoundException(`Entity risk run with ID ${id} not found`);
    }
    return run;
  }

  async getVerdict(entityId: string): Promise<EntityVerdict> {
    const verdict = await this.entityVerdictRepository.findOne({ where: { entityId } });
    if (!verdict) {
      throw new NotFoundException(`No verdict for entity ${entityId}`);
    }
    return verdict;
  }

  private async replaceVerdicts(runId: string, verdicts: ResolvedEntityRisk[]): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.createQueryBuilder().delete().from(EntityVerdict).execute();
      const rows = verdicts.map((verdict) => manager.create(EntityVerdict, { ...verdict, runId }));
      await manager.save(EntityVerdict, rows, { chunk: 500 });
    });
  }
}
