import { ConfigurationError } from './errors';
import { ProbeParameter, RegisteredProbe } from './probes/probe.interface';
import { ALL_RISK_LEVELS, isDeterminate, isRiskLevel, RiskLevel } from './risk-level';

export interface RegisterOptions {
  /** Business area the check belongs to (vessel, voyage, counterparty, ...). */
  businessModule?: string;
  /** Levels the check is allowed to report. Defaults to every determinate level. */
  validLevels?: readonly string[];
}

export interface ProbeRegistration {
  readonly probe: RegisteredProbe;
  readonly businessModule: string;
  readonly requiredParameters: readonly ProbeParameter[];
  readonly validLevels: readonly RiskLevel[];
}

const DEFAULT_VALID_LEVELS = ALL_RISK_LEVELS.filter(isDeterminate);

/**
 * Registration table owned by one orchestrator. Read-only once sealed; there
 * is no hot registration after startup.
 */
export class ProbeRegistry {
  private readonly registrations = new Map<string, ProbeRegistration>();
  private sealed = false;

  register(probeId: string, probe: RegisteredProbe, options: RegisterOptions = {}): ProbeRegistration {
    if (this.sealed) {
      throw new ConfigurationError(`Cannot register ${probeId}: the probe registry is sealed`);
    }
    if (!probeId.trim()) {
      throw new ConfigurationError('Probe id must not be empty');
    }
    if (probeId !== probe.id) {
      throw new ConfigurationError(`Probe ${probe.id} cannot be registered under a different id (${probeId})`);
    }
    if (this.registrations.has(probeId)) {
      throw new ConfigurationError(`Probe ${probeId} is already registered`);
    }

    const validLevels: RiskLevel[] = [];
    for (const level of options.validLevels ?? DEFAULT_VALID_LEVELS) {
      if (!isRiskLevel(level)) {
        throw new ConfigurationError(`Probe ${probeId} declares an unknown risk level: ${level}`);
      }
      validLevels.push(level);
    }
    const outside = probe.levels.filter((level) => !validLevels.includes(level));
    if (outside.length > 0) {
      throw new ConfigurationError(`Probe ${probeId} may report levels outside its vocabulary: ${outside.join(', ')}`);
    }

    const registration: ProbeRegistration = {
      probe,
      businessModule: options.businessModule ?? 'general',
      requiredParameters: probe.kind === 'probe' ? [...probe.requiredParameters()] : [],
      validLevels,
    };
    this.registrations.set(probeId, registration);
    return registration;
  }

  /** Checks that every aggregate component resolves and that no aggregate contains itself, then freezes the table. */
  seal(): void {
    if (this.sealed) return;
    for (const probeId of this.registrations.keys()) {
      this.assertAcyclic(probeId, []);
    }
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(probeId: string): boolean {
    return this.registrations.has(probeId);
  }

  get(probeId: string): ProbeRegistration | undefined {
    return this.registrations.get(probeId);
  }

  resolve(probeId: string): RegisteredProbe {
    const registration = this.registrations.get(probeId);
    if (!registration) {
      throw new ConfigurationError(`Unknown check id: ${probeId}`);
    }
    return registration.probe;
  }

  ids(): string[] {
    return [...this.registrations.keys()];
  }

  entries(): ProbeRegistration[] {
    return [...this.registrations.values()];
  }

  private assertAcyclic(probeId: string, path: readonly string[]): void {
    if (path.includes(probeId)) {
      throw new ConfigurationError(`Aggregate cycle: ${[...path, probeId].join(' -> ')}`);
    }
    const probe = this.resolve(probeId);
    if (probe.kind !== 'aggregate') return;
    for (const component of probe.components()) {
      this.assertAcyclic(component.probeId, [...path, probeId]);
    }
  }
}
