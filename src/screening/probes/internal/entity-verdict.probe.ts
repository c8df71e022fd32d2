import { parseRiskLevel, RiskLevel } from '../../risk-level';
import { BaseProbe, Classification } from '../base.probe';
import { asRecord, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';

/**
 * Looks a counterparty up in the verdicts written by the last bulk entity
 * risk run. Unknown parties are NO_RISK.
 */
export class EntityVerdictProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.MEDIUM, RiskLevel.HIGH];

  constructor() {
    super({ id: 'entity_verdict', riskDescription: 'Counterparty sanctions verdict' });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.ENTITY_VERDICTS];
  }

  protected classify(_subjectId: string, _params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    if (payload === null || payload === undefined) {
      return { level: RiskLevel.NO_RISK, rows: [] };
    }
    const verdict = asRecord(payload, '$');
    const level = parseRiskLevel(verdict.sanctionsLevel);
    const reported = level === RiskLevel.HIGH || level === RiskLevel.MEDIUM ? level : RiskLevel.NO_RISK;

    return {
      level: reported,
      rows: [
        {
          EntityId: toDetailValue(verdict.entityId),
          EntityName: toDetailValue(verdict.entityName),
          SanctionsLevel: reported,
        },
      ],
    };
  }
}
