// Director Track Record: disqualifications, failed companies and phoenix patterns across current directors

import type { EvidenceItem } from '../types/evidence.js';
import type { Appointment, CompanyProfile, Officer } from '../types/registry.js';
import { INSOLVENCY_DATE_TYPES, INSOLVENCY_STATUSES } from '../config/reference-data.js';
import { daysBetween, formatDate, parseDate } from '../utils/dates.js';
import {
  churnRate,
  dissolutionRate,
  industryCodesOverlap,
  medianTenure,
  nameSimilarity,
  roundTo,
} from '../utils/heuristics.js';
import { companyLink, extractOfficerId, officerLink } from '../utils/registry-links.js';
import { BaseAnalyzer, currentDirectors, type AnalyzerContext, type Observation } from './base-analyzer.js';
import type { CascadeFallback, RatingRule } from './cascade.js';

type Evidence = EvidenceItem<'director_track_record'>;

export const HIGH_DISSOLUTION_RATE = 50;
export const HIGH_DISSOLUTION_MIN_APPOINTMENTS = 10;
export const HIGH_CHURN_PER_YEAR = 3;
export const PRE_FAILURE_WINDOW_DAYS = 180;
export const PHOENIX_WINDOW_DAYS = 365;
export const PHOENIX_NAME_SIMILARITY = 0.6;
export const PHOENIX_CANDIDATES_PER_DIRECTOR = 5;

export interface InsolvencyAssociation {
  director: string;
  companyName: string;
  companyNumber: string;
}

export interface PreFailureResignation extends InsolvencyAssociation {
  daysBefore: number;
}

export interface PhoenixMatch {
  director: string;
  dissolvedCompany: string;
  dissolvedNumber: string;
  dissolvedOn: string;
  gapDays: number;
  sicMatch: boolean;
  nameSimilarity: number;
}

export interface DirectorTrackFacts {
  targetName: string;
  directorCount: number;
  disqualifiedCount: number;
  highDissolution: string[];
  highChurn: string[];
  insolvencies: InsolvencyAssociation[];
  preFailureResignations: PreFailureResignation[];
  phoenix: PhoenixMatch[];
}

export const DIRECTOR_TRACK_RULES: readonly RatingRule<DirectorTrackFacts>[] = [
  {
    id: 'disqualified',
    rating: 'red_flag',
    when: (f) => f.disqualifiedCount > 0,
    logic: (f) => `${f.disqualifiedCount} director(s) formally disqualified`,
    summary: (f) => `${f.disqualifiedCount} director(s) disqualified from acting`,
  },
  {
    id: 'high_dissolution',
    rating: 'red_flag',
    when: (f) => f.highDissolution.length > 0,
    logic: (f) => `Director(s) with >50% dissolution rate: ${f.highDissolution.join(', ')}`,
    summary: (f) => `High dissolution rate for ${f.highDissolution[0]}`,
  },
  {
    id: 'repeated_insolvency',
    rating: 'red_flag',
    when: (f) => f.insolvencies.length >= 2,
    logic: (f) => `Director(s) associated with ${f.insolvencies.length} insolvencies`,
    summary: (f) => `Directors linked to ${f.insolvencies.length} previous insolvencies`,
  },
  {
    id: 'repeated_phoenix',
    rating: 'red_flag',
    when: (f) => f.phoenix.length >= 2,
    logic: (f) => `Multiple phoenix-like patterns detected (${f.phoenix.length})`,
    summary: () => 'Multiple phoenix-like patterns detected (inferred)',
  },
  {
    id: 'single_insolvency',
    rating: 'investigate',
    when: (f) => f.insolvencies.length === 1,
    logic: () => '1 insolvency association found',
    summary: (f) => `${f.insolvencies[0].director} associated with 1 previous insolvency (${f.insolvencies[0].companyName})`,
  },
  {
    id: 'phoenix',
    rating: 'investigate',
    when: (f) => f.phoenix.length > 0,
    logic: () => 'Phoenix-like pattern detected (inferred)',
    summary: (f) => `Phoenix-like pattern: ${f.phoenix[0].dissolvedCompany} → ${f.targetName}`,
  },
  {
    id: 'high_churn',
    rating: 'investigate',
    when: (f) => f.highChurn.length > 0,
    logic: (f) => `High appointment churn: ${f.highChurn.join(', ')}`,
    summary: (f) => `High appointment churn for ${f.highChurn[0]}`,
  },
  {
    id: 'pre_failure_resignation',
    rating: 'investigate',
    when: (f) => f.preFailureResignations.length > 0,
    logic: () => 'Director resigned within 6 months before insolvency at another company',
    summary: () => 'Director resigned shortly before another company entered insolvency',
  },
];

const FALLBACK: CascadeFallback<DirectorTrackFacts> = {
  logic: () => 'No insolvency associations, disqualifications, or concerning patterns found',
  summary: (f) => `All ${f.directorCount} directors checked — clean track record`,
};

/** Date the first insolvency case started, from the case's dated events */
function insolvencyStart(cases: { dates: { type: string; date?: string }[] }[]): Date | null {
  const first = cases[0];
  if (!first) return null;
  const marker = first.dates.find((d) => INSOLVENCY_DATE_TYPES.includes(d.type));
  return parseDate(marker?.date);
}

export class DirectorTrackRecordAnalyzer extends BaseAnalyzer<'director_track_record', DirectorTrackFacts> {
  readonly descriptor = {
    dimension: 'director_track_record',
    title: 'Director Track Record',
    question: 'Have these directors been associated with companies that failed?',
    interpretation: {
      whyMatters: [
        'Past insolvencies may indicate governance issues or value extraction patterns',
        'Serial director metrics reveal professional track record across companies',
      ],
      innocentExplanations: [
        'External market factors or industry downturns beyond director control',
        'Unlucky timing or legitimate business pivots',
      ],
      whatWeChecked: ['Director appointments, insolvency records, disqualifications, dissolution rates'],
    },
  } as const;

  protected readonly rules = DIRECTOR_TRACK_RULES;
  protected readonly fallback = FALLBACK;

  protected async observe(ctx: AnalyzerContext): Promise<Observation<'director_track_record', DirectorTrackFacts>> {
    const target = await this.profileOf(ctx);
    const officers = await ctx.client.getOfficers(ctx.companyNumber);
    if (!officers) return { status: 'insufficient', summary: 'Unable to retrieve officer data' };

    const directors = currentDirectors(officers.items);
    if (directors.length === 0) return { status: 'insufficient', summary: 'No current directors found' };

    const facts: DirectorTrackFacts = {
      targetName: target?.company_name ?? '',
      directorCount: directors.length,
      disqualifiedCount: 0,
      highDissolution: [],
      highChurn: [],
      insolvencies: [],
      preFailureResignations: [],
      phoenix: [],
    };
    const evidence: Evidence[] = [];

    for (const director of directors) {
      const officerId = extractOfficerId(director);
      if (!officerId) continue;
      const found = await this.reviewDirector(ctx, director, officerId, target, facts);
      evidence.push(...found);

      const concerns = found.some((e) => e.type !== 'director_profile' && (e.severity === 'high' || e.severity === 'medium'));
      if (!concerns) {
        evidence.push({
          confidence: 'verified',
          severity: 'none',
          type: 'clean_record',
          description: `${director.name} — no insolvencies, disqualifications, or concerning patterns found`,
          details: { director_name: director.name },
          source: ['appointments', 'disqualified-officers'],
        });
      }
    }

    return { status: 'observed', facts, evidence };
  }

  private async reviewDirector(
    ctx: AnalyzerContext,
    director: Officer,
    officerId: string,
    target: CompanyProfile | null,
    facts: DirectorTrackFacts,
  ): Promise<Evidence[]> {
    const name = director.name;
    const evidence: Evidence[] = [];

    const disqualification = await ctx.client.getDisqualifications(officerId);
    if (disqualification && disqualification.disqualifications.length > 0) {
      facts.disqualifiedCount++;
      for (const d of disqualification.disqualifications) {
        evidence.push({
          confidence: 'verified',
          severity: 'high',
          type: 'disqualification',
          description: `${name} is disqualified until ${d.disqualified_until ?? 'unknown'}`,
          details: {
            director_name: name,
            reason: d.reason.description_identifier,
            disqualified_from: d.disqualified_from,
            disqualified_until: d.disqualified_until,
          },
          source: ['disqualified-officers'],
          link: officerLink(officerId),
        });
      }
    }

    const appointments = await ctx.client.getAppointments(officerId);
    if (!appointments) return evidence;
    const items = appointments.items;

    const dissolution = dissolutionRate(items);
    const tenure = medianTenure(items, ctx.now);
    const churn = churnRate(items);
    const active = items.filter((a) => !a.resigned_on).length;

    evidence.push({
      confidence: 'verified',
      severity: 'none',
      type: 'director_profile',
      description: `${name}: ${dissolution.total} lifetime appointments (${active} active), ${dissolution.dissolved} dissolved (${dissolution.rate.toFixed(0)}%)`,
      details: {
        director_name: name,
        total_appointments: dissolution.total,
        active_appointments: active,
        dissolved_count: dissolution.dissolved,
        dissolution_rate: roundTo(dissolution.rate, 1),
        median_tenure_years: tenure === undefined ? null : roundTo(tenure, 1),
        churn_rate: roundTo(churn, 2),
      },
      source: ['appointments'],
      link: officerLink(officerId),
    });

    if (dissolution.total >= HIGH_DISSOLUTION_MIN_APPOINTMENTS && dissolution.rate > HIGH_DISSOLUTION_RATE) {
      facts.highDissolution.push(name);
      evidence.push({
        confidence: 'verified',
        severity: 'high',
        type: 'high_dissolution_rate',
        description: `${name} has ${dissolution.rate.toFixed(0)}% dissolution rate across ${dissolution.total} companies`,
        details: {
          director_name: name,
          dissolution_rate: roundTo(dissolution.rate, 1),
          total_companies: dissolution.total,
          dissolved_companies: dissolution.dissolved,
        },
        source: ['appointments'],
      });
    }

    if (churn > HIGH_CHURN_PER_YEAR) {
      facts.highChurn.push(name);
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'high_churn',
        description: `${name} has high appointment churn (${churn.toFixed(1)} new appointments/year)`,
        details: { director_name: name, churn_rate: roundTo(churn, 2) },
        source: ['appointments'],
      });
    }

    const dissolvedElsewhere: Appointment[] = [];
    for (const appt of items) {
      const { company_status: status, company_number: number } = appt.appointed_to;
      if (number === ctx.companyNumber) continue;
      if (status === 'dissolved') dissolvedElsewhere.push(appt);
      if (INSOLVENCY_STATUSES.includes(status)) {
        evidence.push(await this.insolvencyAssociation(ctx, name, appt, facts));
      }
    }

    const incorporated = parseDate(target?.date_of_creation);
    if (target && incorporated) {
      for (const appt of dissolvedElsewhere.slice(0, PHOENIX_CANDIDATES_PER_DIRECTOR)) {
        const item = await this.phoenixCheck(ctx, name, appt, target, incorporated, facts);
        if (item) evidence.push(item);
      }
    }

    return evidence;
  }

  private async insolvencyAssociation(
    ctx: AnalyzerContext,
    name: string,
    appt: Appointment,
    facts: DirectorTrackFacts,
  ): Promise<Evidence> {
    const { company_name: companyName, company_number: companyNumber, company_status: status } = appt.appointed_to;
    const resigned = parseDate(appt.resigned_on);
    let assessment = 'Director was present at failure';
    let severity: Evidence['severity'] = 'high';

    if (resigned) {
      const insolvency = await ctx.client.getInsolvency(companyNumber);
      const failedOn = insolvency ? insolvencyStart(insolvency.cases) : null;
      if (failedOn) {
        const gap = daysBetween(resigned, failedOn);
        if (gap > 0 && gap < PRE_FAILURE_WINDOW_DAYS) {
          assessment = `Resigned ${gap} days before insolvency`;
          facts.preFailureResignations.push({ director: name, companyName, companyNumber, daysBefore: gap });
        } else if (gap >= PRE_FAILURE_WINDOW_DAYS) {
          assessment = `Resigned ${gap} days before insolvency`;
          severity = 'medium';
        }
      }
    }

    facts.insolvencies.push({ director: name, companyName, companyNumber });

    let role = `Director from ${appt.appointed_on ?? '?'}`;
    if (resigned) role += ` to ${appt.resigned_on ?? '?'}`;

    return {
      confidence: 'verified',
      severity,
      type: 'insolvency_association',
      description: `${name} — ${companyName} (${companyNumber}) entered ${status.replace(/-/g, ' ')}`,
      details: {
        director_name: name,
        company_name: companyName,
        company_number: companyNumber,
        director_role: role,
        insolvency_type: status,
        assessment,
      },
      source: ['appointments', 'insolvency'],
      link: companyLink(companyNumber),
    };
  }

  private async phoenixCheck(
    ctx: AnalyzerContext,
    name: string,
    appt: Appointment,
    target: CompanyProfile,
    incorporated: Date,
    facts: DirectorTrackFacts,
  ): Promise<Evidence | null> {
    const { company_name: dissolvedName, company_number: dissolvedNumber } = appt.appointed_to;
    const dissolved = await ctx.client.getCompany(dissolvedNumber);
    const ceased = parseDate(dissolved?.date_of_cessation);
    if (!dissolved || !ceased) return null;

    const gap = daysBetween(ceased, incorporated);
    if (gap < 0 || gap > PHOENIX_WINDOW_DAYS) return null;

    const sicMatch = industryCodesOverlap(dissolved.sic_codes, target.sic_codes);
    const similarity = nameSimilarity(dissolvedName, target.company_name);
    if (!sicMatch && similarity <= PHOENIX_NAME_SIMILARITY) return null;

    const match: PhoenixMatch = {
      director: name,
      dissolvedCompany: dissolvedName,
      dissolvedNumber,
      dissolvedOn: formatDate(ceased),
      gapDays: gap,
      sicMatch,
      nameSimilarity: roundTo(similarity, 2),
    };
    facts.phoenix.push(match);

    const indicators: string[] = [];
    if (sicMatch) indicators.push('same industry (SIC)');
    if (similarity > PHOENIX_NAME_SIMILARITY) indicators.push(`similar name (${Math.round(similarity * 100)}%)`);

    return {
      confidence: 'inferred',
      severity: facts.phoenix.length > 1 ? 'high' : 'medium',
      type: 'phoenix_pattern',
      description: `Phoenix-likelihood: ${dissolvedName} dissolved ${match.dissolvedOn}, ${target.company_name} incorporated ${gap} days later (${indicators.join(', ')})`,
      details: {
        director_name: name,
        dissolved_company: dissolvedName,
        dissolved_number: dissolvedNumber,
        dissolved_date: match.dissolvedOn,
        target_incorporated: formatDate(incorporated),
        gap_days: gap,
        sic_match: sicMatch,
        name_similarity: match.nameSimilarity,
      },
      source: ['appointments', 'company-profile'],
      link: companyLink(dissolvedNumber),
      disclaimer: 'Cannot verify: asset/staff migration or creditor harm',
    };
  }

  protected followUps(facts: DirectorTrackFacts): string[] {
    const asks = facts.insolvencies.map(
      (i) => `Ask ${i.director} to explain their involvement in ${i.companyName}'s insolvency`,
    );
    if (facts.insolvencies.length > 0) {
      asks.push('Request the IP\'s report to check for findings of director misconduct');
      asks.push('Verify whether failures were due to external factors vs. management decisions');
    }
    for (const p of facts.phoenix) {
      asks.push(`Understand the relationship between ${p.dissolvedCompany} and ${facts.targetName}`);
    }
    return asks;
  }
}
