// Orchestrator: fetch the profile once, run every dimension analyzer concurrently, merge by dimension id
// A failing analyzer is isolated into a placeholder result; the other dimensions are unaffected.

import { DIMENSION_IDS, type DimensionDescriptor, type DimensionId, type DimensionResult } from '../types/evidence.js';
import type { CompanyProfile, RegistryReader } from '../types/registry.js';
import type { CompanyReport, ProfileSummary, ReportMetadata, StreamEvent } from '../types/report.js';
import { createEvent, SimpleEventBus, type DomainEvent, type EventBus } from '../types/events.js';
import { AnalyzerFaultError, CompanyNotFoundError, RegistryLensError } from '../types/errors.js';
import type { AnalyzerContext, DimensionAnalyzer } from '../analyzers/base-analyzer.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { formatAddress } from '../utils/heuristics.js';
import { normalizeCompanyNumber } from '../utils/registry-links.js';
import { createAnalyzers, mapDimensions } from './analyzer-registry.js';
import type { UsageTracker } from './usage-tracker.js';

export const FAILED_SUMMARY = 'Analysis failed — unable to complete this dimension';

export interface OrchestratorConfig {
  client: RegistryReader;
  analyzers?: Record<DimensionId, DimensionAnalyzer>;
  usage?: UsageTracker;
  /** Clock for analyzer windows and report timestamps */
  now?: () => Date;
  /** Observer for lifecycle events; a throwing observer is logged and ignored */
  onEvent?: (event: DomainEvent) => void;
  logger?: Logger;
}

export type AnalyzerOutcome =
  | { status: 'completed'; dimension: DimensionId; result: DimensionResult; durationMs: number }
  | { status: 'failed'; dimension: DimensionId; error: AnalyzerFaultError; durationMs: number };

interface ResolvedCompany {
  companyNumber: string;
  profile: CompanyProfile;
}

export function summarizeProfile(profile: CompanyProfile): ProfileSummary {
  return {
    companyNumber: profile.company_number,
    companyName: profile.company_name,
    companyStatus: profile.company_status,
    companyType: profile.type,
    incorporatedOn: profile.date_of_creation,
    registeredAddress: formatAddress(profile.registered_office_address),
    sicCodes: profile.sic_codes,
  };
}

export function failurePlaceholder(descriptor: DimensionDescriptor, error: AnalyzerFaultError): DimensionResult {
  return {
    ...descriptor,
    rating: 'investigate',
    summary: FAILED_SUMMARY,
    evidence: [],
    ratingLogic: FAILED_SUMMARY,
    whatToAsk: [],
    error: error.message,
  };
}

export class Orchestrator {
  private readonly client: RegistryReader;
  private readonly analyzers: Record<DimensionId, DimensionAnalyzer>;
  private readonly usage?: UsageTracker;
  private readonly now: () => Date;
  private readonly eventBus: EventBus;
  private readonly log: Logger;

  constructor(config: OrchestratorConfig) {
    this.client = config.client;
    this.analyzers = config.analyzers ?? createAnalyzers();
    this.usage = config.usage;
    this.now = config.now ?? (() => new Date());
    this.log = config.logger ?? createLogger('Orchestrator');
    this.eventBus = new SimpleEventBus(this.log);
    if (config.onEvent) this.eventBus.subscribe(config.onEvent);
  }

  /** Full six-dimension report. Rejects only for an invalid or unknown company, or an unreachable registry. */
  async analyze(input: string): Promise<CompanyReport> {
    const start = Date.now();
    const analyzedAt = this.now();
    const { companyNumber, profile } = await this.resolve(input);
    await this.usage?.recordRun(companyNumber);

    const ctx = this.contextFor(companyNumber, profile, analyzedAt);
    const outcomes = await Promise.all(DIMENSION_IDS.map((id) => this.runAnalyzer(id, ctx)));

    const metadata = this.metadata(analyzedAt, start);
    this.eventBus.publish(
      createEvent('AnalysisCompleted', { companyNumber, ...metadata, failed: outcomes.filter((o) => o.status === 'failed').length }),
    );
    this.log.info('Analysis completed', { companyNumber, elapsedSeconds: metadata.elapsedSeconds });

    return {
      profile: summarizeProfile(profile),
      dimensions: mapDimensions((id) => this.resultOf(outcomes[DIMENSION_IDS.indexOf(id)])),
      metadata,
    };
  }

  /**
   * Same analysis as analyze(), yielded as it happens: the profile, then each dimension
   * in completion order, then completion metadata. An invalid or unknown company yields
   * a single error event.
   */
  async *stream(input: string): AsyncGenerator<StreamEvent> {
    const start = Date.now();
    const analyzedAt = this.now();
    let resolved: ResolvedCompany;
    try {
      resolved = await this.resolve(input);
    } catch (err) {
      if (err instanceof RegistryLensError) {
        yield { type: 'error', message: err.message };
        return;
      }
      throw err;
    }
    const { companyNumber, profile } = resolved;

    const usage = await this.usage?.recordRun(companyNumber);
    yield { type: 'profile', profile: summarizeProfile(profile), usage };

    const ctx = this.contextFor(companyNumber, profile, analyzedAt);
    const pending = new Map<DimensionId, Promise<AnalyzerOutcome>>(
      DIMENSION_IDS.map((id): [DimensionId, Promise<AnalyzerOutcome>] => [id, this.runAnalyzer(id, ctx)]),
    );
    while (pending.size > 0) {
      const outcome = await Promise.race(pending.values());
      pending.delete(outcome.dimension);
      yield { type: 'dimension', dimension: outcome.dimension, result: this.resultOf(outcome) };
    }

    const metadata = this.metadata(analyzedAt, start);
    this.eventBus.publish(createEvent('AnalysisCompleted', { companyNumber, ...metadata }));
    yield { type: 'complete', metadata };
  }

  async analyzeDimension(input: string, dimension: DimensionId): Promise<DimensionResult> {
    const { companyNumber, profile } = await this.resolve(input);
    const outcome = await this.runAnalyzer(dimension, this.contextFor(companyNumber, profile, this.now()));
    return this.resultOf(outcome);
  }

  private async resolve(input: string): Promise<ResolvedCompany> {
    const companyNumber = normalizeCompanyNumber(input);
    this.eventBus.publish(createEvent('AnalysisRequested', { companyNumber }));

    const lookup = await this.client.lookupCompany(companyNumber);
    if (lookup.status === 'not_found') {
      this.log.warn('Company not found', { companyNumber });
      throw new CompanyNotFoundError(companyNumber);
    }
    this.eventBus.publish(createEvent('ProfileFetched', { companyNumber, companyName: lookup.data.company_name }));
    return { companyNumber, profile: lookup.data };
  }

  private contextFor(companyNumber: string, profile: CompanyProfile, now: Date): AnalyzerContext {
    return { client: this.client, companyNumber, profile, now, logger: this.log };
  }

  /** Never rejects: anything the analyzer throws becomes a failed outcome */
  private async runAnalyzer(dimension: DimensionId, ctx: AnalyzerContext): Promise<AnalyzerOutcome> {
    const started = Date.now();
    this.eventBus.publish(createEvent('AnalyzerStarted', { dimension, companyNumber: ctx.companyNumber }));
    try {
      const result = await this.analyzers[dimension].execute(ctx);
      const durationMs = Date.now() - started;
      this.eventBus.publish(createEvent('AnalyzerCompleted', { dimension, rating: result.rating, durationMs }));
      return { status: 'completed', dimension, result, durationMs };
    } catch (err) {
      const error = new AnalyzerFaultError(dimension, err);
      const durationMs = Date.now() - started;
      this.log.error('Analyzer failed', { dimension, companyNumber: ctx.companyNumber, error: error.message });
      this.eventBus.publish(createEvent('AnalyzerFailed', { dimension, error: error.message, durationMs }));
      return { status: 'failed', dimension, error, durationMs };
    }
  }

  private resultOf(outcome: AnalyzerOutcome): DimensionResult {
    return outcome.status === 'completed'
      ? outcome.result
      : failurePlaceholder(this.analyzers[outcome.dimension].descriptor, outcome.error);
  }

  private metadata(analyzedAt: Date, start: number): ReportMetadata {
    return {
      analyzedAt: analyzedAt.toISOString(),
      elapsedSeconds: Math.round((Date.now() - start) / 100) / 10,
    };
  }
}
