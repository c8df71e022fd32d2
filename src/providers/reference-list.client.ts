import { FindOptionsWhere, Repository } from 'typeorm';
import { DateWindow } from '../screening/dates';
import { ProviderClient } from '../screening/probes/probe.interface';
import { ReferenceListEntry, ReferenceListName } from './entities/reference-list-entry.entity';

export interface ReferenceListClientOptions {
  id: string;
  listName: ReferenceListName;
  /** Field name the entry's key is exposed under. */
  keyField: string;
  /** Return only entries keyed by the subject, instead of the whole list. */
  matchOnSubject: boolean;
}

/** Serves a locally maintained reference list as a provider payload. */
export class ReferenceListClient implements ProviderClient {
  readonly id: string;

  constructor(
    private readonly options: ReferenceListClientOptions,
    private readonly repository: Pick<Repository<ReferenceListEntry>, 'find'>,
  ) {
    this.id = options.id;
  }

  async fetch(subjectId: string, _window: DateWindow): Promise<unknown> {
    const where: FindOptionsWhere<ReferenceListEntry> = this.options.matchOnSubject
      ? { listName: this.options.listName, key: subjectId }
      : { listName: this.options.listName };
    const entries = await this.repository.find({ where, order: { key: 'ASC' } });

    return entries.map((entry) => ({
      ...entry.details,
      [this.options.keyField]: entry.key,
      name: entry.name,
    }));
  }
}
