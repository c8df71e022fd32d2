import { Logger } from '@nestjs/common';
import { DateWindow, defaultWindow, RECENT_EVENT_DAYS } from './dates';
import { ConfigurationError, describeError, ProviderError, ScreeningCancelledError } from './errors';
import { FetchCache, FetchOutcome } from './fetch-cache';
import { ProbeRegistration, ProbeRegistry, RegisterOptions } from './probe-registry';
import { CompositeProbe } from './probes/aggregate.probe';
import {
  AggregateProbe,
  Probe,
  ProviderClient,
  RegisteredProbe,
  ScreeningParams,
} from './probes/probe.interface';
import { foldRiskLevels, RiskLevel } from './risk-level';
import { createRiskRecord, RiskRecord, SubjectRef } from './risk-record';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10000;

export interface OrchestratorOptions {
  providerTimeoutMs?: number;
  /** Length of the window used when a request names no dates. */
  windowDays?: number;
}

export interface ExecuteOptions {
  /** Reuse an existing session cache, e.g. when retrying a cancelled call. */
  cache?: FetchCache;
  signal?: AbortSignal;
}

export interface ScreeningSummary {
  total: number;
  counts: Record<RiskLevel, number>;
  overall: RiskLevel;
}

interface Session {
  params: ScreeningParams;
  window: DateWindow;
  cache: FetchCache;
  evaluations: Map<string, Promise<RiskRecord>>;
}

function nodeKey(probeId: string, subjectId: string): string {
  return JSON.stringify([probeId, subjectId]);
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ScreeningCancelledError();
  }
}

/**
 * Resolves requested checks into leaf probes, fetches each provider payload
 * once per session, evaluates leaves and then the aggregates built on them.
 *
 * Only a bad request (unknown check id, unregistered provider) rejects;
 * everything else surfaces as a NO_DATA record for the affected check.
 */
export class ScreeningOrchestrator {
  private readonly logger = new Logger(ScreeningOrchestrator.name);
  private readonly providerClients = new Map<string, ProviderClient>();
  private readonly providerTimeoutMs: number;
  private readonly windowDays: number;

  constructor(
    readonly registry: ProbeRegistry = new ProbeRegistry(),
    options: OrchestratorOptions = {},
  ) {
    this.providerTimeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.windowDays = options.windowDays ?? RECENT_EVENT_DAYS;
  }

  register(probeId: string, probe: RegisteredProbe, options?: RegisterOptions): ProbeRegistration {
    return this.registry.register(probeId, probe, options);
  }

  registerProvider(client: ProviderClient): void {
    if (this.providerClients.has(client.id)) {
      throw new ConfigurationError(`Provider ${client.id} is already registered`);
    }
    this.providerClients.set(client.id, client);
  }

  async execute(
    checkIds: readonly string[],
    subjectId: string,
    params: ScreeningParams,
    options: ExecuteOptions = {},
  ): Promise<RiskRecord[]> {
    const { signal } = options;
    throwIfAborted(signal);

    const fallback = defaultWindow(params.evaluatedAt, this.windowDays);
    const window: DateWindow = {
      start: params.startDate ?? fallback.start,
      end: params.endDate ?? fallback.end,
    };
    const session: Session = {
      params: { ...params, startDate: window.start, endDate: window.end },
      window,
      cache: options.cache ?? new FetchCache(),
      evaluations: new Map(),
    };

    // Plan first so configuration faults reject before any provider is called.
    const leaves = new Map<string, { probe: Probe; subjectId: string }>();
    for (const checkId of checkIds) {
      this.plan(checkId, subjectId, session.params, [], leaves);
    }
    this.logger.debug(`Screening ${subjectId}: ${checkIds.length} checks, ${leaves.size} leaf evaluations`);

    for (const leaf of leaves.values()) {
      this.prefetch(leaf.probe, leaf.subjectId, session);
    }

    const results = Promise.all(checkIds.map((checkId) => this.evaluateRequested(checkId, subjectId, session)));
    return signal ? this.raceAbort(results, signal) : results;
  }

  summarize(records: readonly RiskRecord[]): ScreeningSummary {
    const counts: Record<RiskLevel, number> = {
      [RiskLevel.NO_DATA]: 0,
      [RiskLevel.NO_RISK]: 0,
      [RiskLevel.LOW]: 0,
      [RiskLevel.MEDIUM]: 0,
      [RiskLevel.HIGH]: 0,
      [RiskLevel.UNDETERMINED]: 0,
    };
    for (const record of records) {
      counts[record.riskLevel] += 1;
    }
    return {
      total: records.length,
      counts,
      overall: foldRiskLevels(records.map((record) => record.riskLevel)),
    };
  }

  private plan(
    probeId: string,
    subjectId: string,
    params: ScreeningParams,
    path: readonly string[],
    leaves: Map<string, { probe: Probe; subjectId: string }>,
  ): void {
    if (path.includes(probeId)) {
      throw new ConfigurationError(`Aggregate cycle: ${[...path, probeId].join(' -> ')}`);
    }
    const probe = this.registry.resolve(probeId);
    if (probe.kind === 'probe') {
      for (const providerId of probe.providers()) {
        if (!this.providerClients.has(providerId)) {
          throw new ConfigurationError(`No provider client registered for ${providerId} (needed by ${probeId})`);
        }
      }
      leaves.set(nodeKey(probeId, subjectId), { probe, subjectId });
      return;
    }
    for (const component of probe.components()) {
      this.plan(component.probeId, this.componentSubject(component.role, subjectId, params), params, [...path, probeId], leaves);
    }
  }

  private componentSubject(role: string | undefined, subjectId: string, params: ScreeningParams): string {
    if (!role) return subjectId;
    return params.parties?.[role] ?? '';
  }

  /** A blank subject is only worth fetching for probes that never read it. */
  private needsFetch(probe: Probe, subjectId: string): boolean {
    return subjectId.trim() !== '' || !probe.requiredParameters().includes('subjectId');
  }

  private prefetch(probe: Probe, subjectId: string, session: Session): void {
    if (!this.needsFetch(probe, subjectId)) return;
    for (const providerId of probe.providers()) {
      void session.cache.getOrFetch(providerId, subjectId, session.window, () =>
        this.fetchWithTimeout(providerId, subjectId, session.window),
      );
    }
  }

  private async fetchWithTimeout(providerId: string, subjectId: string, window: DateWindow): Promise<unknown> {
    const client = this.providerClients.get(providerId);
    if (!client) {
      throw new ProviderError(`No client for ${providerId}`, providerId, subjectId);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(ProviderError.timeout(providerId, subjectId, this.providerTimeoutMs)), this.providerTimeoutMs);
    });
    try {
      return await Promise.race([client.fetch(subjectId, window), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private evaluate(probeId: string, subjectId: string, session: Session): Promise<RiskRecord> {
    const key = nodeKey(probeId, subjectId);
    const existing = session.evaluations.get(key);
    if (existing) return existing;

    const probe = this.registry.resolve(probeId);
    const pending =
      probe.kind === 'probe'
        ? this.evaluateLeaf(probe, subjectId, session)
        : this.evaluateAggregate(probe, subjectId, session);
    session.evaluations.set(key, pending);
    return pending;
  }

  /** Rejects when the probe itself faults; the caller decides how to recover. */
  private async evaluateLeaf(probe: Probe, subjectId: string, session: Session): Promise<RiskRecord> {
    const providerData = new Map<string, FetchOutcome>();
    if (this.needsFetch(probe, subjectId)) {
      for (const providerId of probe.providers()) {
        const outcome = await session.cache.getOrFetch(providerId, subjectId, session.window, () =>
          this.fetchWithTimeout(providerId, subjectId, session.window),
        );
        providerData.set(providerId, outcome);
      }
    }
    return probe.evaluate(subjectId, session.params, providerData);
  }

  private async evaluateRequested(checkId: string, subjectId: string, session: Session): Promise<RiskRecord> {
    try {
      return await this.evaluate(checkId, subjectId, session);
    } catch (error) {
      const probe = this.registry.resolve(checkId);
      this.logger.error(
        `Check ${checkId} failed for ${subjectId}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return createRiskRecord({
        riskType: checkId,
        riskDescription: probe.riskDescription,
        riskLevel: RiskLevel.NO_DATA,
        subjectRef: subjectId,
      });
    }
  }

  private async evaluateAggregate(aggregate: AggregateProbe, subjectId: string, session: Session): Promise<RiskRecord> {
    const bindings = aggregate.components();
    const componentIds = aggregate.componentProbeIds();
    const subjects = bindings.map((binding) => this.componentSubject(binding.role, subjectId, session.params));

    const settled = await Promise.allSettled(
      bindings.map((binding, index) => this.evaluate(binding.probeId, subjects[index], session)),
    );
    const records = settled.map((result, index) => {
      if (result.status === 'fulfilled') return result.value;
      return this.recoverComponent(aggregate, componentIds[index], subjects[index], result.reason);
    });

    try {
      return aggregate.combine(records);
    } catch (error) {
      this.logger.error(
        `Aggregate ${aggregate.id} could not combine its components: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return createRiskRecord({
        riskType: aggregate.id,
        riskDescription: aggregate.riskDescription,
        riskLevel: RiskLevel.NO_DATA,
        subjectRef: subjectId,
      });
    }
  }

  private recoverComponent(aggregate: AggregateProbe, componentId: string, subjectRef: SubjectRef, error: unknown): RiskRecord {
    if (aggregate instanceof CompositeProbe) {
      return aggregate.recoverComponent(componentId, subjectRef, error);
    }
    this.logger.error(`Component ${componentId} of ${aggregate.id} failed: ${describeError(error)}`);
    return createRiskRecord({ riskType: componentId, riskDescription: '', riskLevel: RiskLevel.NO_DATA, subjectRef });
  }

  private raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    throwIfAborted(signal);
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(new ScreeningCancelledError());
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }
}
