import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, Query, Res } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ScreeningHistoryQueryDto, ScreenRequestDto } from '../dto/screen-request.dto';
import { ScreeningLog } from '../entities/screening-log.entity';
import { CheckDescriptor, ScreeningResponse, ScreeningService } from '../services/screening.service';

/** The part of the HTTP response watched for a client that hangs up early. */
export interface ClosableResponse {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

@ApiTags('screening')
@Controller('screening')
export class ScreeningController {
  constructor(private screeningService: ScreeningService) {}

  @Get('checks')
  @ApiOperation({ summary: 'List registered checks' })
  listChecks(): CheckDescriptor[] {
    return this.screeningService.listChecks();
  }

  @Post('checks')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run checks against a subject' })
  @ApiResponse({ status: 200, description: 'One record per requested check' })
  @ApiResponse({ status: 400, description: 'Unknown check id or invalid request' })
  async runChecks(
    @Body() screenRequestDto: ScreenRequestDto,
    @Res({ passthrough: true }) response: ClosableResponse,
  ): Promise<ScreeningResponse> {
    const cancellation = new AbortController();
    const onClose = () => {
      if (!response.writableFinished) {
        cancellation.abort();
      }
    };
    response.once('close', onClose);
    try {
      return await this.screeningService.screen(screenRequestDto, cancellation.signal);
    } finally {
      response.off('close', onClose);
    }
  }

  @Get('history/:subjectId')
  @ApiOperation({ summary: 'Get screening history for a subject' })
  @ApiQuery({ name: 'limit', required: false, type: Number, description: 'Number of screenings to retrieve' })
  async getHistory(
    @Param('subjectId') subjectId: string,
    @Query() query: ScreeningHistoryQueryDto,
  ): Promise<ScreeningLog[]> {
    return this.screeningService.getHistory(subjectId, query.limit);
  }

  @Get('result/:id')
  @ApiOperation({ summary: 'Get a stored screening' })
  @ApiResponse({ status: 404, description: 'Screening not found' })
  async getScreening(@Param('id', ParseUUIDPipe) id: string): Promise<ScreeningLog> {
    return this.screeningService.getScreening(id);
  }
}
