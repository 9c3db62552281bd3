import { describe, it, expect } from 'vitest';
import { TransactionReadinessAnalyzer, frictionFlags } from '../analyzers/transaction-readiness.js';
import { FakeRegistryTransport, NOW, fakeClient } from './helpers/fake-registry.js';

const TARGET = '00000001';

function charge(lender: string, createdOn: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    charge_number: 1,
    status: 'outstanding',
    created_on: createdOn,
    particulars: { description: 'Fixed charge over plant and machinery' },
    persons_entitled: [{ name: lender }],
    ...overrides,
  };
}

const debenture = (lender: string, createdOn: string) =>
  charge(lender, createdOn, { particulars: { floating_charge_covers_all: true } });

async function analyze(charges: Record<string, unknown>[] | null) {
  const transport = new FakeRegistryTransport();
  if (charges) transport.on(`/company/${TARGET}/charges`, { items: charges });
  return new TransactionReadinessAnalyzer().execute({ client: fakeClient(transport), companyNumber: TARGET, now: NOW });
}

describe('TransactionReadinessAnalyzer', () => {
  it('treats a missing charges register as no charges', async () => {
    const result = await analyze(null);

    expect(result.title).toBe('Closing Friction');
    expect(result.rating).toBe('clean');
    expect(result.summary).toBe('No charges registered — clean transaction path');
    expect(result.ratingLogic).toBe('No charges, simple structure');
    expect(result.evidence.map((e) => e.type)).toEqual(['no_charges']);
  });

  it('flags an outstanding all-assets debenture', async () => {
    const result = await analyze([
      debenture('EXAMPLE BANK PLC', '2019-05-01'),
      charge('OTHER LENDER LTD', '2017-01-01', { status: 'fully-satisfied' }),
    ]);

    expect(result.rating).toBe('investigate');
    expect(result.summary).toBe('All-assets debenture outstanding');
    expect(result.ratingLogic).toBe('All-assets debenture outstanding');
    expect(result.evidence).toHaveLength(1);
    expect(result.evidence[0].description)
      .toBe('Floating charge covers ALL assets — held by EXAMPLE BANK PLC. Lender consent required for sale.');
    expect(result.whatToAsk).toEqual([
      'Has the lender been informed of the potential sale? What\'s their typical consent process?',
    ]);
  });

  it('joins every friction flag into the rating logic', async () => {
    const result = await analyze([
      debenture('EXAMPLE BANK PLC', '2019-05-01'),
      charge('ASSET FINANCE LTD', '2024-03-01'),
    ]);

    expect(result.ratingLogic)
      .toBe('All-assets debenture outstanding; Charge created in last 6 months; Multiple secured creditors (2)');
    expect(result.evidence.map((e) => e.type)).toEqual([
      'all_assets_debenture',
      'outstanding_charge',
      'recent_charge',
      'multiple_creditors',
    ]);
    expect(result.evidence[3].description).toBe('2 secured creditors: EXAMPLE BANK PLC, ASSET FINANCE LTD');
    expect(result.whatToAsk).toHaveLength(3);
  });

  it('rates an old single-lender charge clean', async () => {
    const result = await analyze([charge('EXAMPLE BANK PLC', '2019-05-01')]);

    expect(result.rating).toBe('clean');
    expect(result.summary).toBe('1 charge(s) on record, no red flags');
    expect(result.ratingLogic).toBe('1 outstanding charge(s), no concerning patterns');
    expect(result.evidence[0].description).toBe('Charge to EXAMPLE BANK PLC (created 2019-05-01) — OUTSTANDING');
  });

  it('lists friction flags most serious first', () => {
    expect(frictionFlags({
      chargeCount: 3,
      outstandingCount: 3,
      allAssetsDebenture: false,
      recentCharges: 1,
      creditors: ['A', 'B', 'C'],
    })).toEqual(['Charge created in last 6 months', 'Multiple secured creditors (3)']);
  });
});
