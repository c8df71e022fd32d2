import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDate,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class ScreenRequestDto {
  @ApiProperty({ example: '9123456' })
  @IsString()
  @IsNotEmpty()
  subjectId!: string;

  @ApiProperty({ type: [String], example: ['Vessel_is_sanction'] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  checkIds!: string[];

  @ApiPropertyOptional({ example: '2024-06-15' })
  @IsOptional()
  @Matches(CALENDAR_DATE, { message: 'startDate must be YYYY-MM-DD' })
  startDate?: string;

  @ApiPropertyOptional({ example: '2025-06-15' })
  @IsOptional()
  @Matches(CALENDAR_DATE, { message: 'endDate must be YYYY-MM-DD' })
  endDate?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  countryName?: string;

  /** Subject ids of the other parties, keyed by role (vessel, counterparty, charterer, owner). */
  @ApiPropertyOptional({ type: 'object', additionalProperties: { type: 'string' } })
  @IsOptional()
  @IsObject()
  parties?: Record<string, string>;

  /** Pins the evaluation time; defaults to now. */
  @ApiPropertyOptional({ type: String, format: 'date-time' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  evaluatedAt?: Date;
}

export class ScreeningHistoryQueryDto {
  @ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;
}
