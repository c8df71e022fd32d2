import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ScheduleRunDto } from '../dto/schedule-run.dto';
import { EntityRiskRun } from '../entities/entity-risk-run.entity';
import { EntityVerdict } from '../entities/entity-verdict.entity';
import { EntityRiskService } from '../services/entity-risk.service';

@ApiTags('entity-risk')
@Controller('entity-risk')
export class EntityRiskController {
  constructor(private entityRiskService: EntityRiskService) {}

  @Post('runs')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Queue a bulk entity risk run' })
  @ApiResponse({ status: 202, description: 'Entity risk run queued' })
  async scheduleRun(@Body() scheduleRunDto: ScheduleRunDto): Promise<{ runId: string; message: string }> {
    const run = await this.entityRiskService.scheduleRun(scheduleRunDto.evaluatedAt);
    return { runId: run.id, message: 'Entity risk run queued successfully' };
  }

  @Get('runs/:id')
  @ApiOperation({ summary: 'Get the status of a run' })
  @ApiResponse({ status: 404, description: 'Run not found' })
  async getRun(@Param('id', ParseUUIDPipe) id: string): Promise<EntityRiskRun> {
    return this.entityRiskService.getRun(id);
  }

  @Get('verdicts/:entityId')
  @ApiOperation({ summary: 'Get the latest verdict for an entity' })
  @ApiResponse({ status: 404, description: 'No verdict for the entity' })
  async getVerdict(@Param('entityId') entityId: string): Promise<EntityVerdict> {
    return this.entityRiskService.getVerdict(entityId);
  }
}
