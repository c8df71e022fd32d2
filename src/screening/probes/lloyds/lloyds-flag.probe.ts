import { isWithinDays, parseCalendarDay } from '../../dates';
import { RiskLevel } from '../../risk-level';
import { BaseProbe, Classification, IMO_NUMBER } from '../base.probe';
import { optionalRecord, toDetailValue } from '../payload';
import { ProbeParameter, ScreeningParams } from '../probe.interface';
import { ProviderIds } from '../provider-ids';
import { lloydsItems } from './lloyds-payload';

/** Flags a vessel that changed flag within the last year. */
export class LloydsFlagProbe extends BaseProbe {
  readonly levels = [RiskLevel.NO_DATA, RiskLevel.NO_RISK, RiskLevel.MEDIUM];

  constructor() {
    super({
      id: 'lloyds_flag_sanctions',
      riskDescription: 'Flag changed within the last year',
      subjectPattern: IMO_NUMBER,
    });
  }

  requiredParameters(): readonly ProbeParameter[] {
    return ['subjectId'];
  }

  providers(): readonly string[] {
    return [ProviderIds.LLOYDS_RISK_SCORE];
  }

  protected classify(subjectId: string, params: ScreeningParams, [payload]: readonly unknown[]): Classification {
    const [vessel] = lloydsItems(payload);
    const flag = optionalRecord(vessel?.Flag, '$.Data.Items[0].Flag');
    if (Object.keys(flag).length === 0) {
      return { level: RiskLevel.NO_RISK, rows: [] };
    }

    const startDay = parseCalendarDay(flag.FlagStartDate);
    const changedRecently = startDay !== undefined && isWithinDays(startDay, params.evaluatedAt);

    return {
      level: changedRecently ? RiskLevel.MEDIUM : RiskLevel.NO_RISK,
      rows: [
        {
          VesselImo: subjectId,
          FlagName: toDetailValue(flag.FlagName),
          FlagStartDate: toDetailValue(flag.FlagStartDate),
          ParisMouStatus: toDetailValue(flag.ParisMouStatus),
          ParisMouStartDate: toDetailValue(flag.ParisMouStartDate),
          FlagChangedWithinYear: changedRecently,
        },
      ],
    };
  }
}
