import { Repository } from 'typeorm';
import { EntityVerdict } from '../entity-risk/entities/entity-verdict.entity';
import { DateWindow } from '../screening/dates';
import { ProviderClient } from '../screening/probes/probe.interface';
import { ProviderIds } from '../screening/probes/provider-ids';

export interface EntityVerdictPayload {
  entityId: string;
  entityName: string | null;
  sanctionsLevel: string;
}

/**
 * Looks a party up in the latest bulk verdicts, by entity id first and then
 * by primary name. Resolves to null for a party that was never assessed.
 */
export class EntityVerdictClient implements ProviderClient {
  readonly id = ProviderIds.ENTITY_VERDICTS;

  constructor(private readonly repository: Pick<Repository<EntityVerdict>, 'findOne'>) {}

  async fetch(subjectId: string, _window: DateWindow): Promise<EntityVerdictPayload | null> {
    const verdict =
      (await this.repository.findOne({ where: { entityId: subjectId } })) ??
      (await this.repository.findOne({ where: { primaryName: subjectId }, order: { entityId: 'ASC' } }));
    if (!verdict) {
      return null;
    }
    return {
      entityId: verdict.entityId,
      entityName: verdict.primaryName,
      sanctionsLevel: verdict.sanctionsLevel,
    };
  }
}
