// Filing Discipline: overdue flags, late and last-minute accounts, amendments, reference date changes

import type { EvidenceItem } from '../types/evidence.js';
import type { Filing } from '../types/registry.js';
import { daysBetween, formatDate, parseDate } from '../utils/dates.js';
import { accountsDeadline } from '../utils/heuristics.js';
import { BaseAnalyzer, type AnalyzerContext, type Observation } from './base-analyzer.js';
import type { CascadeFallback, RatingRule } from './cascade.js';

type Evidence = EvidenceItem<'filing_discipline'>;

export const AMENDMENT_SCAN = 10;
export const TIMELINESS_SCAN = 5;
export const LAST_MINUTE_DAYS = 14;

export interface FilingFacts {
  accountsOverdue: boolean;
  confirmationOverdue: boolean;
  historyAvailable: boolean;
  lateCount: number;
  lastMinuteCount: number;
  amendmentCount: number;
  ardChanges: number;
}

export const FILING_RULES: readonly RatingRule<FilingFacts>[] = [
  {
    id: 'overdue',
    rating: 'red_flag',
    when: (f) => f.accountsOverdue || f.confirmationOverdue,
    logic: () => 'Accounts or confirmation statement currently overdue',
    summary: () => 'Currently overdue on statutory filings',
  },
  {
    id: 'repeated_late',
    rating: 'red_flag',
    when: (f) => f.lateCount >= 2,
    logic: (f) => `${f.lateCount} late filings in recent history`,
    summary: (f) => `${f.lateCount} accounts filed after deadline`,
  },
  {
    id: 'last_minute',
    rating: 'investigate',
    when: (f) => f.lastMinuteCount >= 3,
    logic: (f) => `Pattern of last-minute filings (${f.lastMinuteCount} of last ${TIMELINESS_SCAN})`,
    summary: () => 'Consistent pattern of last-minute accounts filings',
  },
  {
    id: 'amendments',
    rating: 'investigate',
    when: (f) => f.amendmentCount > 0,
    logic: (f) => `${f.amendmentCount} amended/replacement accounts filed`,
    summary: (f) => `${f.amendmentCount} amended or replacement accounts on record`,
  },
  {
    id: 'ard_changes',
    rating: 'investigate',
    when: (f) => f.ardChanges >= 2,
    logic: (f) => `Multiple accounting reference date changes (${f.ardChanges})`,
    summary: (f) => `Accounting reference date changed ${f.ardChanges} times`,
  },
];

const FALLBACK: CascadeFallback<FilingFacts> = {
  logic: (f) => f.historyAvailable
    ? 'Consistent on-time filing with no amendments'
    : 'No filing history returned; only overdue flags checked',
  summary: (f) => f.historyAvailable ? 'All filings on time with no amendments' : 'Limited filing history available',
};

export function isAmendment(filing: Filing): boolean {
  const text = `${filing.description} ${filing.type}`.toUpperCase();
  return text.includes('AMENDED') || text.includes('REPLACEMENT');
}

export function isReferenceDateChange(filing: Filing): boolean {
  const text = filing.description.toUpperCase();
  return filing.type === 'AA01'
    || text.includes('CHANGE OF ACCOUNTING REFERENCE')
    || text.includes('CHANGE-ACCOUNT-REFERENCE-DATE');
}

export class FilingDisciplineAnalyzer extends BaseAnalyzer<'filing_discipline', FilingFacts> {
  readonly descriptor = {
    dimension: 'filing_discipline',
    title: 'Filing Discipline',
    question: 'Do they treat statutory obligations seriously?',
    interpretation: {
      whyMatters: [
        'Late filings often correlate with weak finance function or cash constraints',
        'Amendments may indicate error-prone accounting processes',
      ],
      innocentExplanations: [
        'One-off adviser failure or staff turnover',
        'System migration causing timing issues',
      ],
      whatWeChecked: ['Filing history, deadline calculations, overdue flags'],
    },
  } as const;

  protected readonly rules = FILING_RULES;
  protected readonly fallback = FALLBACK;

  protected async observe(ctx: AnalyzerContext): Promise<Observation<'filing_discipline', FilingFacts>> {
    const profile = await this.profileOf(ctx);
    if (!profile) return { status: 'insufficient', summary: 'Unable to retrieve company profile' };

    const evidence: Evidence[] = [];
    const facts: FilingFacts = {
      accountsOverdue: profile.accounts.overdue,
      confirmationOverdue: profile.confirmation_statement.overdue,
      historyAvailable: false,
      lateCount: 0,
      lastMinuteCount: 0,
      amendmentCount: 0,
      ardChanges: 0,
    };

    if (facts.accountsOverdue) {
      const dueOn = profile.accounts.next_accounts.due_on ?? profile.accounts.next_due ?? 'unknown';
      evidence.push({
        confidence: 'verified',
        severity: 'high',
        type: 'accounts_overdue',
        description: `Accounts currently OVERDUE (due: ${dueOn})`,
        details: { due_on: dueOn },
        source: ['company-profile'],
      });
    }
    if (facts.confirmationOverdue) {
      const nextDue = profile.confirmation_statement.next_due ?? 'unknown';
      evidence.push({
        confidence: 'verified',
        severity: 'high',
        type: 'confirmation_overdue',
        description: `Confirmation statement currently OVERDUE (due: ${nextDue})`,
        details: { next_due: nextDue },
        source: ['company-profile'],
      });
    }

    const history = await ctx.client.getFilingHistory(ctx.companyNumber);
    if (!history) return { status: 'observed', facts, evidence };
    facts.historyAvailable = true;

    const accountsFilings = history.items.filter((f) => f.category === 'accounts');

    for (const filing of accountsFilings.slice(0, AMENDMENT_SCAN)) {
      if (isAmendment(filing)) {
        facts.amendmentCount++;
        evidence.push({
          confidence: 'verified',
          severity: 'medium',
          type: 'amendment',
          description: `Amended/replacement accounts filed on ${filing.date ?? '?'}`,
          details: { type: filing.type, date: filing.date },
          source: ['filing-history'],
        });
      }
      if (isReferenceDateChange(filing)) {
        facts.ardChanges++;
        evidence.push({
          confidence: 'verified',
          severity: 'low',
          type: 'ard_change',
          description: `Accounting reference date changed on ${filing.date ?? '?'}`,
          details: { date: filing.date },
          source: ['filing-history'],
        });
      }
    }

    for (const filing of accountsFilings.slice(0, TIMELINESS_SCAN)) {
      const madeUp = parseDate(filing.description_values.made_up_date);
      const filedOn = parseDate(filing.date);
      if (!madeUp || !filedOn) continue;

      const deadline = accountsDeadline(madeUp, profile.type);
      const margin = daysBetween(filedOn, deadline);
      if (margin < 0) {
        facts.lateCount++;
        evidence.push({
          confidence: 'verified',
          severity: 'high',
          type: 'late_filing',
          description: `Accounts for Y/E ${formatDate(madeUp)} filed ${-margin} days late`,
          details: {
            period_end: formatDate(madeUp),
            filed_on: formatDate(filedOn),
            deadline: formatDate(deadline),
            days_late: -margin,
          },
          source: ['filing-history'],
        });
      } else if (margin < LAST_MINUTE_DAYS) {
        facts.lastMinuteCount++;
      }
    }

    if (facts.lastMinuteCount >= 3) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'last_minute_pattern',
        description: `${facts.lastMinuteCount} of last ${TIMELINESS_SCAN} accounts filed within final ${LAST_MINUTE_DAYS} days of deadline`,
        details: { count: facts.lastMinuteCount },
        source: ['filing-history'],
      });
    }

    return { status: 'observed', facts, evidence };
  }

  protected followUps(facts: FilingFacts): string[] {
    const asks: string[] = [];
    if (facts.lateCount > 0) asks.push('Why were accounts filed late? Was this a one-off or systemic?');
    if (facts.amendmentCount > 0) asks.push('What was corrected in the amended accounts?');
    if (facts.ardChanges > 0) asks.push('Why was the accounting reference date changed?');
    if (facts.accountsOverdue) asks.push('When will the overdue accounts be filed?');
    return asks;
  }
}
