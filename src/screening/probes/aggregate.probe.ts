import { Logger } from '@nestjs/common';
import { AggregationError, ConfigurationError, describeError } from '../errors';
import { foldRiskLevels, isDeterminate, RiskLevel } from '../risk-level';
import { createRiskRecord, DetailRow, RiskRecord, SubjectRef } from '../risk-record';
import { AggregateProbe, ComponentBinding } from './probe.interface';

export const SOURCE_FIELD = 'source';

export interface CompositeProbeOptions {
  id: string;
  riskDescription: string;
  /** Probe ids, or role bindings for multi-party composites, in combination order. */
  components: readonly (string | ComponentBinding)[];
  levels?: readonly RiskLevel[];
}

export function componentIdOf(binding: ComponentBinding): string {
  return binding.role ? `${binding.role}:${binding.probeId}` : binding.probeId;
}

/**
 * Combines the records of its components: the level is the fold-merge of the
 * component levels and the detail rows are concatenated in component order,
 * each tagged with the component it came from.
 */
export class CompositeProbe implements AggregateProbe {
  readonly kind = 'aggregate' as const;
  readonly id: string;
  readonly riskDescription: string;
  readonly levels: readonly RiskLevel[];
  private readonly logger: Logger;
  private readonly bindings: readonly ComponentBinding[];

  constructor(options: CompositeProbeOptions) {
    this.id = options.id;
    this.riskDescription = options.riskDescription;
    this.levels = options.levels ?? [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.LOW, RiskLevel.MEDIUM, RiskLevel.HIGH];
    this.logger = new Logger(`${CompositeProbe.name}:${options.id}`);
    this.bindings = options.components.map((component) =>
      typeof component === 'string' ? { probeId: component } : { ...component },
    );

    if (this.bindings.length < 2) {
      throw new ConfigurationError(`Aggregate ${this.id} needs at least two components`);
    }
    const ids = this.componentProbeIds();
    const duplicate = ids.find((id, index) => ids.indexOf(id) !== index);
    if (duplicate) {
      throw new ConfigurationError(`Aggregate ${this.id} lists component ${duplicate} twice`);
    }
  }

  components(): readonly ComponentBinding[] {
    return this.bindings;
  }

  componentProbeIds(): readonly string[] {
    return this.bindings.map(componentIdOf);
  }

  combine(records: readonly RiskRecord[]): RiskRecord {
    const ids = this.componentProbeIds();
    if (records.length !== ids.length) {
      throw new AggregationError(
        `Aggregate ${this.id} expected ${ids.length} component records, got ${records.length}`,
        this.id,
        ids.join(','),
      );
    }

    const rows: DetailRow[] = [];
    records.forEach((record, index) => {
      for (const row of record.detailRows) {
        rows.push({ ...row, [SOURCE_FIELD]: ids[index] });
      }
    });

    const level = foldRiskLevels(records.map((record) => record.riskLevel));
    return createRiskRecord({
      riskType: this.id,
      riskDescription: this.riskDescription,
      // an aggregate never reports UNDETERMINED on the live path
      riskLevel: isDeterminate(level) ? level : RiskLevel.NO_DATA,
      detailRows: rows,
      subjectRef: this.subjectRefOf(records),
    });
  }

  /** Stand-in record for a component that faulted, so the aggregate can still combine. */
  recoverComponent(componentId: string, subjectRef: SubjectRef, error: unknown): RiskRecord {
    const failure =
      error instanceof AggregationError
        ? error
        : new AggregationError(describeError(error), this.id, componentId, error);
    this.logger.error(
      `Component ${componentId} of ${this.id} failed, treating it as no data: ${failure.message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return createRiskRecord({
      riskType: componentId,
      riskDescription: '',
      riskLevel: RiskLevel.NO_DATA,
      subjectRef,
    });
  }

  private subjectRefOf(records: readonly RiskRecord[]): SubjectRef {
    if (!this.bindings.some((binding) => binding.role)) {
      return records[0].subjectRef;
    }

    const parties: Record<string, string> = {};
    this.bindings.forEach((binding, index) => {
      const role = binding.role ?? 'subject';
      const ref = records[index].subjectRef;
      if (typeof ref === 'string') {
        parties[role] = ref;
        return;
      }
      for (const [nestedRole, subjectId] of Object.entries(ref)) {
        parties[`${role}.${nestedRole}`] = subjectId;
      }
    });
    return parties;
  }
}
