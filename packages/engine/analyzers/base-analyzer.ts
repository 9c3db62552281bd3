// Base analyzer: observe registry facts, rate them through the dimension's cascade, add follow-ups
// All dimension analyzers extend this class

import type {
  DimensionDescriptor,
  DimensionId,
  DimensionResult,
  EvidenceItem,
} from '../types/evidence.js';
import type { CompanyProfile, Officer, RegistryReader } from '../types/registry.js';
import { DIRECTOR_ROLES } from '../config/reference-data.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { applyCascade, type CascadeFallback, type CascadeOutcome, type RatingRule } from './cascade.js';

export interface AnalyzerContext {
  client: RegistryReader;
  companyNumber: string;
  /** Profile already fetched by the orchestrator; analyzers run standalone fetch it themselves */
  profile?: CompanyProfile;
  now: Date;
  logger?: Logger;
}

export interface DimensionAnalyzer {
  readonly descriptor: DimensionDescriptor;
  execute(ctx: AnalyzerContext): Promise<DimensionResult>;
}

export type Observation<D extends DimensionId, F> =
  | { status: 'observed'; facts: F; evidence: EvidenceItem<D>[] }
  | { status: 'insufficient'; summary: string };

export abstract class BaseAnalyzer<D extends DimensionId, F> implements DimensionAnalyzer {
  abstract readonly descriptor: DimensionDescriptor & { readonly dimension: D };
  protected abstract readonly rules: readonly RatingRule<F>[];
  protected abstract readonly fallback: CascadeFallback<F>;

  protected abstract observe(ctx: AnalyzerContext): Promise<Observation<D, F>>;
  protected abstract followUps(facts: F): string[];

  evaluate(facts: F): CascadeOutcome {
    return applyCascade(this.rules, facts, this.fallback);
  }

  async execute(ctx: AnalyzerContext): Promise<DimensionResult> {
    const log = ctx.logger ?? silentLogger;
    const observation = await this.observe(ctx);

    if (observation.status === 'insufficient') {
      log.info('Insufficient data', { dimension: this.descriptor.dimension, summary: observation.summary });
      return {
        ...this.descriptor,
        rating: 'investigate',
        summary: observation.summary,
        evidence: [],
        ratingLogic: observation.summary,
        whatToAsk: [],
      };
    }

    const outcome = this.evaluate(observation.facts);
    log.debug('Rated', { dimension: this.descriptor.dimension, rating: outcome.rating, rule: outcome.ruleId });
    return {
      ...this.descriptor,
      rating: outcome.rating,
      summary: outcome.summary,
      evidence: observation.evidence,
      ratingLogic: outcome.ratingLogic,
      whatToAsk: this.followUps(observation.facts),
    };
  }

  protected async profileOf(ctx: AnalyzerContext): Promise<CompanyProfile | null> {
    return ctx.profile ?? ctx.client.getCompany(ctx.companyNumber);
  }
}

export function isDirector(officer: Officer): boolean {
  return DIRECTOR_ROLES.includes(officer.officer_role);
}

export function currentDirectors(officers: readonly Officer[]): Officer[] {
  return officers.filter((o) => isDirector(o) && !o.resigned_on);
}
