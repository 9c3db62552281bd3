// Governance Stability: board turnover, tenure, timing of changes and registered office signals

import type { EvidenceItem } from '../types/evidence.js';
import type { Officer } from '../types/registry.js';
import { daysBetween, parseDate } from '../utils/dates.js';
import { formatAddress, isFormationAgentAddress, roundTo } from '../utils/heuristics.js';
import { BaseAnalyzer, currentDirectors, isDirector, type AnalyzerContext, type Observation } from './base-analyzer.js';
import type { CascadeFallback, RatingRule } from './cascade.js';

type Evidence = EvidenceItem<'governance_stability'>;

export const RECENT_APPOINTMENT_DAYS = 90;
export const RECENT_RESIGNATION_DAYS = 730;
export const SHORT_TENURE_DAYS = 548;
export const TIMING_WINDOW_DAYS = 30;
export const ADDRESS_WINDOW_DAYS = 1095;

export interface GovernanceFacts {
  directorCount: number;
  recentAppointments: { name: string; appointedOn: string }[];
  /** Appointments and resignations in the last two years */
  changesLastTwoYears: number;
  /** Years; 0 when no current director has a dated appointment */
  averageTenure: number;
  shortTenures: number;
  timingNearAccounts: boolean;
  timingNearPsc: boolean;
  formationAgent: boolean;
  addressChanges: number;
}

const tenureText = (f: GovernanceFacts) => f.averageTenure.toFixed(1);

export const GOVERNANCE_RULES: readonly RatingRule<GovernanceFacts>[] = [
  {
    id: 'high_turnover',
    rating: 'red_flag',
    when: (f) => f.changesLastTwoYears >= 3,
    logic: (f) => `${f.changesLastTwoYears} director changes in last 2 years`,
    summary: (f) => `High director turnover: ${f.changesLastTwoYears} changes in 2 years`,
  },
  {
    id: 'change_with_psc',
    rating: 'investigate',
    when: (f) => f.timingNearPsc && f.recentAppointments.length > 0,
    logic: () => 'Director change coincided with PSC change',
    summary: () => 'Director and ownership change at same time',
  },
  {
    id: 'recent_appointment',
    rating: 'investigate',
    when: (f) => f.recentAppointments.length > 0,
    logic: () => 'Director appointed in last 3 months',
    summary: (f) => `Recent board change: new director appointed ${f.recentAppointments[0].appointedOn}`,
  },
  {
    id: 'sole_director',
    rating: 'investigate',
    when: (f) => f.directorCount === 1,
    logic: () => 'Sole director — key person dependency',
    summary: () => 'Single director — key person risk',
  },
  {
    id: 'short_average_tenure',
    rating: 'investigate',
    when: (f) => f.averageTenure < 2,
    logic: (f) => `Average director tenure below 2 years (${tenureText(f)}y)`,
    summary: (f) => `Short average director tenure (${tenureText(f)} years)`,
  },
  {
    id: 'formation_agent',
    rating: 'investigate',
    when: (f) => f.formationAgent,
    logic: () => 'Registered at formation agent address',
    summary: () => 'Registered office is a formation agent address',
  },
  {
    id: 'address_churn',
    rating: 'investigate',
    when: (f) => f.addressChanges >= 3,
    logic: (f) => `${f.addressChanges} registered office changes in 3 years`,
    summary: (f) => `Registered office changed ${f.addressChanges} times in 3 years`,
  },
];

const FALLBACK: CascadeFallback<GovernanceFacts> = {
  logic: (f) => `Stable board (${f.directorCount} directors, ${tenureText(f)}yr avg tenure)`,
  summary: (f) => `Stable board: ${f.directorCount} directors, ${tenureText(f)} year average tenure`,
};

function within(a: Date, b: Date, days: number): boolean {
  return Math.abs(daysBetween(a, b)) <= days;
}

export class GovernanceStabilityAnalyzer extends BaseAnalyzer<'governance_stability', GovernanceFacts> {
  readonly descriptor = {
    dimension: 'governance_stability',
    title: 'Governance Stability',
    question: 'Is leadership stable or is there concerning churn?',
    interpretation: {
      whyMatters: [
        'High turnover can indicate instability or key person disputes',
        'Timing correlations with filings may suggest governance concerns',
      ],
      innocentExplanations: [
        'Growth-phase restructuring or internationalization',
        'Planned succession executed smoothly',
      ],
      whatWeChecked: ['Director tenure, resignation patterns, address changes'],
    },
  } as const;

  protected readonly rules = GOVERNANCE_RULES;
  protected readonly fallback = FALLBACK;

  protected async observe(ctx: AnalyzerContext): Promise<Observation<'governance_stability', GovernanceFacts>> {
    const officers = await ctx.client.getOfficers(ctx.companyNumber);
    if (!officers) return { status: 'insufficient', summary: 'Unable to retrieve officer data' };

    const current = currentDirectors(officers.items);
    const resigned = officers.items.filter((o) => isDirector(o) && o.resigned_on);
    const evidence: Evidence[] = [{
      confidence: 'verified',
      severity: 'none',
      type: 'director_count',
      description: `${current.length} active director(s)`,
      details: { count: current.length },
      source: ['officers'],
    }];

    const facts: GovernanceFacts = {
      directorCount: current.length,
      recentAppointments: [],
      changesLastTwoYears: 0,
      averageTenure: 0,
      shortTenures: 0,
      timingNearAccounts: false,
      timingNearPsc: false,
      formationAgent: false,
      addressChanges: 0,
    };

    const changeDates: Date[] = [];
    const tenures: number[] = [];
    for (const director of current) {
      const appointed = parseDate(director.appointed_on);
      if (!appointed) continue;
      const days = daysBetween(appointed, ctx.now);
      tenures.push(Math.max(days, 0) / 365.25);
      if (days >= 0 && days < RECENT_APPOINTMENT_DAYS) {
        facts.recentAppointments.push({ name: director.name, appointedOn: director.appointed_on ?? '?' });
        changeDates.push(appointed);
        evidence.push({
          confidence: 'verified',
          severity: 'medium',
          type: 'recent_appointment',
          description: `New director ${director.name} appointed ${director.appointed_on} (${days} days ago)`,
          details: { name: director.name, appointed_on: director.appointed_on, days_ago: days },
          source: ['officers'],
        });
      }
    }

    if (tenures.length > 0) {
      facts.averageTenure = tenures.reduce((sum, t) => sum + t, 0) / tenures.length;
      evidence.push({
        confidence: 'verified',
        severity: 'none',
        type: 'average_tenure',
        description: `Average director tenure: ${facts.averageTenure.toFixed(1)} years`,
        details: { average_years: roundTo(facts.averageTenure, 1) },
        source: ['officers'],
      });
    }

    evidence.push(...this.resignations(resigned, ctx.now, facts, changeDates));
    facts.changesLastTwoYears += facts.recentAppointments.length;

    if (facts.shortTenures >= 3) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'short_tenure_pattern',
        description: `${facts.shortTenures} former directors served less than 18 months`,
        details: { count: facts.shortTenures },
        source: ['officers'],
      });
    }

    const [history, pscs, office, addressHistory] = await Promise.all([
      ctx.client.getFilingHistory(ctx.companyNumber),
      ctx.client.getPscs(ctx.companyNumber),
      ctx.client.getRegisteredOffice(ctx.companyNumber),
      ctx.client.getFilingHistory(ctx.companyNumber, 'address'),
    ]);

    const accountsDates = (history?.items ?? [])
      .filter((f) => f.category === 'accounts')
      .map((f) => parseDate(f.date))
      .filter((d): d is Date => d !== null)
      .slice(0, 5);
    const pscDates = (pscs?.items ?? [])
      .flatMap((p) => [parseDate(p.notified_on), parseDate(p.ceased_on)])
      .filter((d): d is Date => d !== null);

    facts.timingNearAccounts = changeDates.some((c) => accountsDates.some((a) => within(c, a, TIMING_WINDOW_DAYS)));
    facts.timingNearPsc = changeDates.some((c) => pscDates.some((p) => within(c, p, TIMING_WINDOW_DAYS)));

    if (facts.timingNearAccounts) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'timing_near_accounts',
        description: `Director change within ${TIMING_WINDOW_DAYS} days of accounts filing`,
        details: {},
        source: ['officers', 'filing-history'],
      });
    }
    if (facts.timingNearPsc) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'timing_near_psc',
        description: `Director change within ${TIMING_WINDOW_DAYS} days of PSC change`,
        details: {},
        source: ['officers', 'psc'],
      });
    }

    if (office && isFormationAgentAddress(office)) {
      facts.formationAgent = true;
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'formation_agent_address',
        description: 'Registered office is a known formation agent address',
        details: { address: formatAddress(office) },
        source: ['registered-office-address'],
      });
    }

    facts.addressChanges = (addressHistory?.items ?? []).filter((f) => {
      const filed = parseDate(f.date);
      if (!filed) return false;
      const age = daysBetween(filed, ctx.now);
      return age >= 0 && age < ADDRESS_WINDOW_DAYS;
    }).length;
    if (facts.addressChanges >= 3) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'address_churn',
        description: `Registered office changed ${facts.addressChanges} times in last 3 years`,
        details: { count: facts.addressChanges },
        source: ['filing-history'],
      });
    }

    return { status: 'observed', facts, evidence };
  }

  private resignations(resigned: readonly Officer[], now: Date, facts: GovernanceFacts, changeDates: Date[]): Evidence[] {
    const evidence: Evidence[] = [];
    for (const director of resigned) {
      const resignedOn = parseDate(director.resigned_on);
      const appointedOn = parseDate(director.appointed_on);
      if (resignedOn) {
        const age = daysBetween(resignedOn, now);
        if (age >= 0 && age < RECENT_RESIGNATION_DAYS) {
          facts.changesLastTwoYears++;
          changeDates.push(resignedOn);
          evidence.push({
            confidence: 'verified',
            severity: 'low',
            type: 'resignation',
            description: `${director.name} resigned ${director.resigned_on}`,
            details: { name: director.name, resigned_on: director.resigned_on, appointed_on: director.appointed_on },
            source: ['officers'],
          });
        }
      }
      if (appointedOn && resignedOn) {
        const tenure = daysBetween(appointedOn, resignedOn);
        if (tenure >= 0 && tenure < SHORT_TENURE_DAYS) facts.shortTenures++;
      }
    }
    return evidence;
  }

  protected followUps(facts: GovernanceFacts): string[] {
    const asks = facts.recentAppointments.map((a) => `What prompted the appointment of ${a.name}?`);
    if (facts.changesLastTwoYears > 1) asks.push('Why has there been recent board turnover?');
    if (facts.directorCount === 1) asks.push('What succession plan exists if the sole director is unavailable?');
    if (facts.formationAgent) {
      asks.push('Why is the registered office at a formation agent rather than the trading address?');
    }
    if (facts.timingNearPsc) asks.push('Why did the director and ownership changes happen at the same time?');
    return asks;
  }
}
