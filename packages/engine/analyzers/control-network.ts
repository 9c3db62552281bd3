// Connected Parties: who sits on the board and who holds control, and how they overlap elsewhere

import type { EvidenceItem } from '../types/evidence.js';
import type { Officer, Psc } from '../types/registry.js';
import { daysBetween, parseDate } from '../utils/dates.js';
import { controlPercentage, roundTo } from '../utils/heuristics.js';
import { extractOfficerId, tryNormalizeCompanyNumber } from '../utils/registry-links.js';
import { BaseAnalyzer, currentDirectors, type AnalyzerContext, type Observation } from './base-analyzer.js';
import type { CascadeFallback, RatingRule } from './cascade.js';

type Evidence = EvidenceItem<'control_network'>;

export const LARGE_NETWORK_SIZE = 10;
export const RECENT_CHANGE_DAYS = 90;
export const PSC_ACTIVITY_DAYS = 730;
export const SHARED_APPOINTMENTS_FOR_OVERLAP = 2;
export const DENSE_NETWORK_PAIRS = 3;

export interface ControlNetworkFacts {
  directorCount: number;
  activePscCount: number;
  networkSize: number;
  recentDirectors: string[];
  recentPscs: string[];
  pscChanges: number;
  overlappingPairs: [string, string, number][];
  controlByDirectors: number;
}

const isIndividual = (p: Psc) => p.kind.includes('individual');
const upper = (name: string) => name.toUpperCase();

export const CONTROL_NETWORK_RULES: readonly RatingRule<ControlNetworkFacts>[] = [
  {
    id: 'board_and_ownership_change',
    rating: 'investigate',
    when: (f) => f.recentDirectors.length > 0 && f.recentPscs.length > 0,
    logic: () => 'Director and PSC both changed in last 90 days',
    summary: () => 'Recent board and ownership changes (last 90 days)',
  },
  {
    id: 'dense_network',
    rating: 'investigate',
    when: (f) => f.overlappingPairs.length >= DENSE_NETWORK_PAIRS,
    logic: () => 'Dense director network — multiple pairs share other company appointments',
    summary: () => 'Dense director network — directors share multiple other appointments',
  },
  {
    id: 'recent_psc',
    rating: 'investigate',
    when: (f) => f.recentPscs.length > 0,
    logic: () => 'PSC change in last 90 days',
    summary: (f) => `Recent PSC change: ${f.recentPscs[0]}`,
  },
  {
    id: 'large_network',
    rating: 'investigate',
    when: (f) => f.networkSize > LARGE_NETWORK_SIZE,
    logic: (f) => `Large control network (${f.networkSize} individuals)`,
    summary: (f) => `Large control network: ${f.networkSize} individuals`,
  },
  {
    id: 'psc_activity',
    rating: 'investigate',
    when: (f) => f.pscChanges >= 2,
    logic: (f) => `${f.pscChanges} PSC changes in last 2 years`,
    summary: (f) => `High PSC activity: ${f.pscChanges} changes in 2 years`,
  },
];

const FALLBACK: CascadeFallback<ControlNetworkFacts> = {
  logic: () => 'No concerning control network patterns',
  summary: (f) => `Clean control network (${f.directorCount} directors, ${f.activePscCount} PSCs)`,
};

export class ControlNetworkAnalyzer extends BaseAnalyzer<'control_network', ControlNetworkFacts> {
  readonly descriptor = {
    dimension: 'control_network',
    title: 'Connected Parties',
    question: 'What does the decision-making network look like?',
    interpretation: {
      whyMatters: [
        'Concentrated decision-making can indicate related party risk',
        'Recent changes may signal ownership restructuring ahead of transactions',
      ],
      innocentExplanations: [
        'Efficient family business or founder-led structure',
        'Planned succession or legitimate group reorganization',
      ],
      whatWeChecked: ['Director overlaps, PSC records, appointment timing'],
    },
  } as const;

  protected readonly rules = CONTROL_NETWORK_RULES;
  protected readonly fallback = FALLBACK;

  protected async observe(ctx: AnalyzerContext): Promise<Observation<'control_network', ControlNetworkFacts>> {
    const [officers, pscList] = await Promise.all([
      ctx.client.getOfficers(ctx.companyNumber),
      ctx.client.getPscs(ctx.companyNumber),
    ]);
    const directors = currentDirectors(officers?.items ?? []);
    const allPscs = pscList?.items ?? [];
    const pscs = allPscs.filter((p) => !p.ceased_on);
    const ceased = allPscs.filter((p) => p.ceased_on);

    if (directors.length === 0 && pscs.length === 0) {
      return { status: 'insufficient', summary: 'Insufficient data to assess control network' };
    }

    const evidence: Evidence[] = [];
    const individualPscs = pscs.filter(isIndividual);
    const individuals = new Set([...directors.map((d) => upper(d.name)), ...individualPscs.map((p) => upper(p.name))]);
    const directorNames = new Set(directors.map((d) => upper(d.name)));

    const facts: ControlNetworkFacts = {
      directorCount: directors.length,
      activePscCount: pscs.length,
      networkSize: individuals.size,
      recentDirectors: [],
      recentPscs: [],
      pscChanges: 0,
      overlappingPairs: [],
      controlByDirectors: individualPscs
        .filter((p) => directorNames.has(upper(p.name)))
        .reduce((sum, p) => sum + controlPercentage(p.natures_of_control), 0),
    };

    evidence.push({
      confidence: 'verified',
      severity: 'none',
      type: 'network_size',
      description: `Control network includes ${facts.networkSize} unique individual(s)`,
      details: {
        director_count: directors.length,
        individual_psc_count: individualPscs.length,
        unique_individuals: facts.networkSize,
      },
      source: ['officers', 'psc'],
    });
    if (facts.networkSize > LARGE_NETWORK_SIZE) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'large_network',
        description: `Large control network: ${facts.networkSize} individuals across directors and PSCs`,
        details: { network_size: facts.networkSize },
        source: ['officers', 'psc'],
      });
    }

    if (facts.controlByDirectors > 0) {
      evidence.push({
        confidence: 'verified',
        severity: 'none',
        type: 'decision_concentration',
        description: `Directors hold ~${facts.controlByDirectors.toFixed(0)}% of significant control`,
        details: { control_by_directors_pct: roundTo(facts.controlByDirectors, 1) },
        source: ['officers', 'psc'],
      });
    }

    for (const director of directors) {
      const appointed = parseDate(director.appointed_on);
      if (!appointed) continue;
      const days = daysBetween(appointed, ctx.now);
      if (days >= 0 && days < RECENT_CHANGE_DAYS) {
        facts.recentDirectors.push(director.name);
        evidence.push({
          confidence: 'verified',
          severity: 'medium',
          type: 'recent_director',
          description: `Director ${director.name} appointed ${days} days ago (${director.appointed_on})`,
          details: { director_name: director.name, appointed_on: director.appointed_on, days_ago: days },
          source: ['officers'],
        });
      }
    }

    for (const psc of pscs) {
      const notified = parseDate(psc.notified_on);
      if (!notified) continue;
      const days = daysBetween(notified, ctx.now);
      if (days >= 0 && days < RECENT_CHANGE_DAYS) {
        facts.recentPscs.push(psc.name);
        evidence.push({
          confidence: 'verified',
          severity: 'medium',
          type: 'recent_psc',
          description: `PSC ${psc.name} notified ${days} days ago (${psc.notified_on})`,
          details: { psc_name: psc.name, notified_on: psc.notified_on, days_ago: days },
          source: ['psc'],
        });
      }
    }

    const inActivityWindow = (value: string | undefined) => {
      const date = parseDate(value);
      if (!date) return false;
      const days = daysBetween(date, ctx.now);
      return days >= 0 && days < PSC_ACTIVITY_DAYS;
    };
    facts.pscChanges = ceased.filter((p) => inActivityWindow(p.ceased_on)).length
      + pscs.filter((p) => inActivityWindow(p.notified_on)).length;
    if (facts.pscChanges > 0) {
      evidence.push({
        confidence: 'verified',
        severity: facts.pscChanges >= 2 ? 'medium' : 'low',
        type: 'psc_activity',
        description: `${facts.pscChanges} PSC change(s) in last 2 years`,
        details: { psc_changes_2y: facts.pscChanges },
        source: ['psc'],
      });
    }

    evidence.push(...await this.directorOverlaps(ctx, directors, facts));
    const controlLinks = await this.directorsOfCorporatePscs(ctx, directors, pscs);
    evidence.push(...controlLinks);

    const concerns = facts.networkSize > LARGE_NETWORK_SIZE
      || facts.recentDirectors.length > 0
      || facts.recentPscs.length > 0
      || facts.pscChanges >= 2
      || facts.overlappingPairs.length > 0
      || controlLinks.length > 0;
    if (!concerns) {
      evidence.push({
        confidence: 'verified',
        severity: 'none',
        type: 'clean_network',
        description: 'No concerning control network patterns detected',
        details: {},
        source: ['officers', 'psc'],
      });
    }

    return { status: 'observed', facts, evidence };
  }

  /** Pairs of directors who are both current directors of two or more other companies */
  private async directorOverlaps(
    ctx: AnalyzerContext,
    directors: readonly Officer[],
    facts: ControlNetworkFacts,
  ): Promise<Evidence[]> {
    const portfolios: { name: string; companies: Set<string> }[] = [];
    for (const director of directors) {
      const officerId = extractOfficerId(director);
      if (!officerId) continue;
      const appointments = await ctx.client.getAppointments(officerId);
      if (!appointments) continue;
      const companies = new Set(
        appointments.items
          .filter((a) => !a.resigned_on && a.appointed_to.company_number && a.appointed_to.company_number !== ctx.companyNumber)
          .map((a) => a.appointed_to.company_number),
      );
      portfolios.push({ name: director.name, companies });
    }

    const evidence: Evidence[] = [];
    for (let i = 0; i < portfolios.length; i++) {
      for (let j = i + 1; j < portfolios.length; j++) {
        const a = portfolios[i];
        const b = portfolios[j];
        const shared = [...a.companies].filter((c) => b.companies.has(c)).length;
        if (shared < SHARED_APPOINTMENTS_FOR_OVERLAP) continue;
        facts.overlappingPairs.push([a.name, b.name, shared]);
        evidence.push({
          confidence: 'verified',
          severity: 'low',
          type: 'director_network_overlap',
          description: `${a.name} and ${b.name} are both current directors of ${shared} other companies`,
          details: { directors: [a.name, b.name], shared_company_count: shared },
          source: ['appointments'],
        });
      }
    }

    if (facts.overlappingPairs.length >= DENSE_NETWORK_PAIRS) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'dense_director_network',
        description: `Dense director network: ${facts.overlappingPairs.length} pairs of directors share multiple company appointments`,
        details: { overlapping_pairs: facts.overlappingPairs.length },
        source: ['appointments'],
      });
    }
    return evidence;
  }

  private async directorsOfCorporatePscs(
    ctx: AnalyzerContext,
    directors: readonly Officer[],
    pscs: readonly Psc[],
  ): Promise<Evidence[]> {
    const evidence: Evidence[] = [];
    for (const psc of pscs.filter((p) => p.kind.includes('corporate'))) {
      const reg = tryNormalizeCompanyNumber(psc.identification.registration_number);
      if (!reg) continue;
      const officers = await ctx.client.getOfficers(reg);
      if (!officers) continue;
      const names = new Set(officers.items.filter((o) => !o.resigned_on).map((o) => upper(o.name)));
      for (const director of directors) {
        if (!names.has(upper(director.name))) continue;
        evidence.push({
          confidence: 'verified',
          severity: 'low',
          type: 'director_controls_psc',
          description: `${director.name} is director of both target company and its PSC (${psc.name})`,
          details: { director: director.name, psc_company: psc.name, psc_company_number: reg },
          source: ['officers', 'psc'],
        });
      }
    }
    return evidence;
  }

  protected followUps(facts: ControlNetworkFacts): string[] {
    const asks: string[] = [];
    if (facts.recentDirectors.length > 0 && facts.recentPscs.length > 0) {
      asks.push('What prompted the recent changes to both board and ownership?');
    }
    if (facts.recentDirectors.length > 0) asks.push(`What is the background of ${facts.recentDirectors[0]}?`);
    if (facts.recentPscs.length > 0) asks.push('What prompted the recent ownership change?');
    const [first] = facts.overlappingPairs;
    if (first) asks.push(`What is the history of the business relationship between ${first[0]} and ${first[1]}?`);
    return asks;
  }
}
