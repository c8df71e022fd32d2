import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EntityVerdict } from '../entity-risk/entities/entity-verdict.entity';
import { ReferenceListEntry } from './entities/reference-list-entry.entity';
import { ProviderGatewayService } from './provider-gateway.service';

@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([ReferenceListEntry, EntityVerdict])],
  providers: [ProviderGatewayService],
  exports: [ProviderGatewayService],
})
export class ProvidersModule {}
