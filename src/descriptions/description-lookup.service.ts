import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DescriptionTable } from './description-table';
import { RiskDescription } from './entities/risk-description.entity';

@Injectable()
export class DescriptionLookupService {
  private readonly logger = new Logger(DescriptionLookupService.name);

  constructor(
    @InjectRepository(RiskDescription)
    private riskDescriptionRepository: Repository<RiskDescription>,
  ) {}

  /**
   * Loads the description table as it stands now. Callers take one snapshot
   * per request or run so a concurrent edit cannot mix two versions.
   */
  async snapshot(): Promise<DescriptionTable> {
    const rows = await this.riskDescriptionRepository.find();
    this.logger.debug(`Loaded ${rows.length} risk descriptions`);
    return new DescriptionTable(rows);
  }
}
