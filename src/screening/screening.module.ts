import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DescriptionsModule } from '../descriptions/descriptions.module';
import { ProvidersModule } from '../providers/providers.module';
import { ScreeningController } from './controllers/screening.controller';
import { ScreeningLog } from './entities/screening-log.entity';
import { ScreeningService } from './services/screening.service';

@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([ScreeningLog]), ProvidersModule, DescriptionsModule],
  providers: [ScreeningService],
  controllers: [ScreeningController],
  exports: [ScreeningService],
})
export class ScreeningModule {}
