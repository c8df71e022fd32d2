import { Process, Processor } from '@nestjs/bull';
import { Logger } from '@nestjs/common';
import { Job } from 'bull';
import { EntityRiskRun } from '../entities/entity-risk-run.entity';
import {
  ENTITY_RISK_QUEUE,
  EntityRiskService,
  RESOLVE_ENTITIES_JOB,
  ResolveEntitiesJob,
} from '../services/entity-risk.service';

@Processor(ENTITY_RISK_QUEUE)
export class EntityRiskProcessor {
  private readonly logger = new Logger(EntityRiskProcessor.name);

  constructor(private entityRiskService: EntityRiskService) {}

  @Process(RESOLVE_ENTITIES_JOB)
  async handleRun(job: Pick<Job<ResolveEntitiesJob>, 'data'>): Promise<EntityRiskRun> {
    const { runId } = job.data;

    try {
      const run = await this.entityRiskService.executeRun(runId);
      this.logger.log(`Entity risk run ${runId} completed: ${run.entityCount} verdicts`);
      return run;
    } catch (error) {
      this.logger.error(`Entity risk run ${runId} failed`, error instanceof Error ? error.stack : String(error));
      throw error;
    }
  }
}
