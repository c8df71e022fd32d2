import { BullModule } from '@nestjs/bull';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DescriptionsModule } from '../descriptions/descriptions.module';
import { EntityRiskController } from './controllers/entity-risk.controller';
import { AssociatedPartyRecord } from './entities/associated-party.entity';
import { EntityRiskRun } from './entities/entity-risk-run.entity';
import { EntitySignal } from './entities/entity-signal.entity';
import { EntityVerdict } from './entities/entity-verdict.entity';
import { SanctionedCountry } from './entities/sanctioned-country.entity';
import { EntityRiskProcessor } from './processors/entity-risk.processor';
import { ENTITY_RISK_QUEUE, EntityRiskService } from './services/entity-risk.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([EntitySignal, SanctionedCountry, AssociatedPartyRecord, EntityVerdict, EntityRiskRun]),
    BullModule.registerQueue({
      name: ENTITY_RISK_QUEUE,
    }),
    DescriptionsModule,
  ],
  providers: [EntityRiskService, EntityRiskProcessor],
  controllers: [EntityRiskController],
  exports: [EntityRiskService],
})
export class EntityRiskModule {}
