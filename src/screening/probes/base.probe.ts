import { Logger } from '@nestjs/common';
import { parseCalendarDay } from '../dates';
import { ProviderError, ValidationError } from '../errors';
import { RiskLevel } from '../risk-level';
import { createRiskRecord, DetailRow, RiskRecord } from '../risk-record';
import { PayloadShapeError } from './payload';
import { Probe, ProbeParameter, ProviderDataMap, ScreeningParams } from './probe.interface';

export interface Classification {
  level: RiskLevel;
  rows: DetailRow[];
}

export interface ProbeOptions {
  id: string;
  riskDescription: string;
  /** Format the subject id must match, e.g. a seven-digit IMO number. */
  subjectPattern?: RegExp;
}

export const IMO_NUMBER = /^\d{7}$/;

/**
 * Base class for leaf probes with the shared validate / read / classify
 * pipeline. Subclasses only say which providers they read and how a payload
 * maps to a level and detail rows.
 */
export abstract class BaseProbe implements Probe {
  readonly kind = 'probe' as const;
  readonly id: string;
  readonly riskDescription: string;
  protected readonly logger: Logger;
  private readonly subjectPattern?: RegExp;

  abstract readonly levels: readonly RiskLevel[];

  constructor(options: ProbeOptions) {
    this.id = options.id;
    this.riskDescription = options.riskDescription;
    this.subjectPattern = options.subjectPattern;
    this.logger = new Logger(`${new.target.name}:${options.id}`);
  }

  abstract requiredParameters(): readonly ProbeParameter[];

  abstract providers(): readonly string[];

  /**
   * Maps the payloads of `providers()`, in the same order, to a verdict.
   * May throw PayloadShapeError when the payload is not what it expects.
   */
  protected abstract classify(
    subjectId: string,
    params: ScreeningParams,
    payloads: readonly unknown[],
  ): Classification;

  evaluate(subjectId: string, params: ScreeningParams, providerData: ProviderDataMap): RiskRecord {
    const invalid = this.validateParams(subjectId, params);
    if (invalid) {
      this.logger.warn(`Skipping ${subjectId || '<empty>'}: ${invalid.message}`);
      return this.noData(subjectId);
    }

    const payloads: unknown[] = [];
    for (const providerId of this.providers()) {
      const outcome = providerData.get(providerId);
      if (!outcome) {
        this.logger.warn(`No ${providerId} data was fetched for ${subjectId}`);
        return this.noData(subjectId);
      }
      if (outcome.status === 'failed') {
        this.logger.warn(
          `Provider ${outcome.error.providerId} failed for subject ${outcome.error.subjectId}: ${outcome.error.message}`,
        );
        return this.noData(subjectId);
      }
      payloads.push(outcome.payload);
    }

    try {
      const { level, rows } = this.classify(subjectId, params, payloads);
      return this.createRecord(level, rows, subjectId);
    } catch (error) {
      if (error instanceof PayloadShapeError) {
        const mismatch = new ProviderError(
          `Unexpected payload shape: ${error.message}`,
          this.providers().join(','),
          subjectId,
          error,
        );
        this.logger.warn(`Provider ${mismatch.providerId} failed for subject ${subjectId}: ${mismatch.message}`);
        return this.noData(subjectId);
      }
      throw error;
    }
  }

  /** Returns the first problem with the inputs, or undefined when they are usable. */
  validateParams(subjectId: string, params: ScreeningParams): ValidationError | undefined {
    for (const parameter of this.requiredParameters()) {
      switch (parameter) {
        case 'subjectId':
          if (!subjectId || !subjectId.trim()) {
            return new ValidationError('Missing required parameter: subjectId', parameter);
          }
          if (this.subjectPattern && !this.subjectPattern.test(subjectId)) {
            return new ValidationError(`Malformed subjectId: ${subjectId}`, parameter);
          }
          break;
        case 'startDate':
        case 'endDate': {
          const value = params[parameter];
          if (value === undefined || !value.trim()) {
            return new ValidationError(`Missing required parameter: ${parameter}`, parameter);
          }
          if (parseCalendarDay(value) === undefined) {
            return new ValidationError(`Malformed ${parameter}: ${value}`, parameter);
          }
          break;
        }
        case 'countryName':
          if (!params.countryName || !params.countryName.trim()) {
            return new ValidationError('Missing required parameter: countryName', parameter);
          }
          break;
      }
    }
    return undefined;
  }

  protected createRecord(level: RiskLevel, rows: readonly DetailRow[], subjectId: string): RiskRecord {
    return createRiskRecord({
      riskType: this.id,
      riskDescription: this.riskDescription,
      riskLevel: level,
      detailRows: rows,
      subjectRef: subjectId,
    });
  }

  protected noData(subjectId: string): RiskRecord {
    return this.createRecord(RiskLevel.NO_DATA, [], subjectId);
  }
}
