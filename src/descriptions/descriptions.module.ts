import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DescriptionLookupService } from './description-lookup.service';
import { RiskDescription } from './entities/risk-description.entity';

@Module({
  imports: [TypeOrmModule.forFeature([RiskDescription])],
  providers: [DescriptionLookupService],
  exports: [DescriptionLookupService],
})
export class DescriptionsModule {}
