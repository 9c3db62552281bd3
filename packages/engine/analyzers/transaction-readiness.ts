// Closing Friction: charges register, all-assets debentures and secured creditors

import type { EvidenceItem } from '../types/evidence.js';
import type { Charge } from '../types/registry.js';
import { daysBetween, parseDate } from '../utils/dates.js';
import { BaseAnalyzer, type AnalyzerContext, type Observation } from './base-analyzer.js';
import type { CascadeFallback, RatingRule } from './cascade.js';

type Evidence = EvidenceItem<'transaction_readiness'>;

export const RECENT_CHARGE_DAYS = 180;

export interface TransactionFacts {
  chargeCount: number;
  outstandingCount: number;
  allAssetsDebenture: boolean;
  recentCharges: number;
  creditors: string[];
}

/** Every friction flag that applies, most serious first */
export function frictionFlags(f: TransactionFacts): string[] {
  const flags: string[] = [];
  if (f.allAssetsDebenture) flags.push('All-assets debenture outstanding');
  if (f.recentCharges > 0) flags.push('Charge created in last 6 months');
  if (f.creditors.length > 1) flags.push(`Multiple secured creditors (${f.creditors.length})`);
  return flags;
}

const frictionLogic = (f: TransactionFacts) => frictionFlags(f).join('; ');

export const TRANSACTION_RULES: readonly RatingRule<TransactionFacts>[] = [
  {
    id: 'all_assets_debenture',
    rating: 'investigate',
    when: (f) => f.allAssetsDebenture,
    logic: frictionLogic,
    summary: () => 'All-assets debenture outstanding',
  },
  {
    id: 'recent_charge',
    rating: 'investigate',
    when: (f) => f.recentCharges > 0,
    logic: frictionLogic,
    summary: () => 'Charge created in last 6 months',
  },
  {
    id: 'multiple_creditors',
    rating: 'investigate',
    when: (f) => f.creditors.length > 1,
    logic: frictionLogic,
    summary: (f) => `Multiple secured creditors (${f.creditors.length})`,
  },
];

const FALLBACK: CascadeFallback<TransactionFacts> = {
  logic: (f) => f.outstandingCount > 0
    ? `${f.outstandingCount} outstanding charge(s), no concerning patterns`
    : 'No charges, simple structure',
  summary: (f) => f.outstandingCount > 0
    ? `${f.outstandingCount} charge(s) on record, no red flags`
    : 'No charges registered — clean transaction path',
};

const holders = (charge: Charge) =>
  charge.persons_entitled.map((p) => p.name || 'Unknown').join(', ');

export class TransactionReadinessAnalyzer extends BaseAnalyzer<'transaction_readiness', TransactionFacts> {
  readonly descriptor = {
    dimension: 'transaction_readiness',
    title: 'Closing Friction',
    question: 'How much friction should we expect in executing this deal?',
    interpretation: {
      whyMatters: [
        'Outstanding charges require lender consent for asset transfers',
        'Multiple creditors may create subordination complexity',
      ],
      innocentExplanations: [
        'Routine refinancing or growth financing',
        'Standard banking relationship with no unusual terms',
      ],
      whatWeChecked: ['Charges register, floating charge coverage, creditor identification'],
    },
  } as const;

  protected readonly rules = TRANSACTION_RULES;
  protected readonly fallback = FALLBACK;

  protected async observe(ctx: AnalyzerContext): Promise<Observation<'transaction_readiness', TransactionFacts>> {
    // A missing charges register means nothing is registered
    const charges = (await ctx.client.getCharges(ctx.companyNumber))?.items ?? [];
    const outstanding = charges.filter((c) => c.status === 'outstanding');
    const evidence: Evidence[] = [];

    for (const charge of outstanding) {
      if (charge.particulars.floating_charge_covers_all) {
        evidence.push({
          confidence: 'verified',
          severity: 'high',
          type: 'all_assets_debenture',
          description: `Floating charge covers ALL assets — held by ${holders(charge)}. Lender consent required for sale.`,
          details: {
            charge_id: charge.charge_number,
            created_on: charge.created_on,
            persons_entitled: holders(charge),
          },
          source: ['charges'],
        });
      } else {
        evidence.push({
          confidence: 'verified',
          severity: 'medium',
          type: 'outstanding_charge',
          description: `Charge to ${holders(charge)} (created ${charge.created_on ?? '?'}) — OUTSTANDING`,
          details: {
            created_on: charge.created_on,
            persons_entitled: holders(charge),
            description: charge.particulars.description ?? '',
          },
          source: ['charges'],
        });
      }
    }

    const recent = charges.filter((c) => {
      const created = parseDate(c.created_on);
      if (!created) return false;
      const age = daysBetween(created, ctx.now);
      return age >= 0 && age < RECENT_CHARGE_DAYS;
    });
    for (const charge of recent) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'recent_charge',
        description: `New charge registered ${charge.created_on ?? '?'} to ${holders(charge)}`,
        details: { created_on: charge.created_on, persons_entitled: holders(charge) },
        source: ['charges'],
      });
    }

    const creditors = [...new Set(outstanding.flatMap((c) => c.persons_entitled.map((p) => p.name || 'Unknown')))];
    if (creditors.length > 1) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'multiple_creditors',
        description: `${creditors.length} secured creditors: ${creditors.join(', ')}`,
        details: { creditors },
        source: ['charges'],
      });
    }

    if (charges.length === 0) {
      evidence.push({
        confidence: 'verified',
        severity: 'none',
        type: 'no_charges',
        description: 'No charges registered against this company',
        details: {},
        source: ['charges'],
      });
    }

    return {
      status: 'observed',
      facts: {
        chargeCount: charges.length,
        outstandingCount: outstanding.length,
        allAssetsDebenture: outstanding.some((c) => c.particulars.floating_charge_covers_all),
        recentCharges: recent.length,
        creditors,
      },
      evidence,
    };
  }

  protected followUps(facts: TransactionFacts): string[] {
    const asks: string[] = [];
    if (facts.allAssetsDebenture) {
      asks.push('Has the lender been informed of the potential sale? What\'s their typical consent process?');
    }
    if (facts.recentCharges > 0) asks.push('Why was the recent charge taken out? What were the proceeds used for?');
    if (facts.creditors.length > 1) asks.push('Is there an intercreditor agreement? Understand subordination terms.');
    return asks;
  }
}
