import { describe, it, expect } from 'vitest';
import { OwnershipClarityAnalyzer } from '../analyzers/ownership-clarity.js';
import {
  FakeRegistryTransport,
  NOW,
  appointment,
  corporatePsc,
  fakeClient,
  individualPsc,
  officer,
  profile,
} from './helpers/fake-registry.js';

const TARGET = '00000001';
const pscPath = (cn: string) => `/company/${cn}/persons-with-significant-control`;

function withPscs(items: Record<string, unknown>[]): FakeRegistryTransport {
  return new FakeRegistryTransport().on(pscPath(TARGET), { items });
}

async function analyze(transport: FakeRegistryTransport) {
  return new OwnershipClarityAnalyzer().execute({ client: fakeClient(transport), companyNumber: TARGET, now: NOW });
}

describe('OwnershipClarityAnalyzer', () => {
  it('reports direct individual ownership clean', async () => {
    const result = await analyze(withPscs([individualPsc('SMITH, Jane')]));

    expect(result.rating).toBe('clean');
    expect(result.ratingLogic).toBe('Direct individual UK ownership');
    expect(result.summary).toBe('Clear ownership: SMITH, Jane');
    expect(result.disclaimer).toBe('Asset location (IP, property, contracts) cannot be determined from Companies House');
    expect(result.evidence.map((e) => e.description)).toEqual([
      'Orbit includes 0 connected companies (0 active, 0 dormant, 0 dissolved)',
      'SMITH, Jane (British) — ownership of shares 75 to 100 percent',
    ]);
    expect(result.whatToAsk).toEqual([]);
  });

  it('red-flags an unidentified controller statement', async () => {
    const transport = withPscs([]).on(`/company/${TARGET}/persons-with-significant-control-statements`, {
      items: [
        { statement: 'psc-exists-but-not-identified' },
        { statement: 'psc-details-not-confirmed', ceased_on: '2020-01-01' },
      ],
    });

    const result = await analyze(transport);

    expect(result.rating).toBe('red_flag');
    expect(result.summary).toBe('Company has unidentified person(s) with significant control');
    expect(result.evidence[0]).toMatchObject({
      type: 'psc_statement',
      severity: 'high',
      description: "PSC statement filed: 'psc exists but not identified'",
    });
    expect(result.evidence.filter((e) => e.type === 'psc_statement')).toHaveLength(1);
  });

  it('asks who stands behind a foreign corporate holder', async () => {
    const result = await analyze(withPscs([
      corporatePsc('OFFSHORE HOLDINGS SA', 'B123456', 'Luxembourg', 'Luxembourg'),
    ]));

    expect(result.rating).toBe('investigate');
    expect(result.ratingLogic).toBe('Foreign entity in ownership chain: OFFSHORE HOLDINGS SA');
    expect(result.summary).toBe('Foreign entity in ownership: OFFSHORE HOLDINGS SA');
    expect(result.evidence.find((e) => e.type === 'corporate_psc')).toMatchObject({
      severity: 'medium',
      description: 'OFFSHORE HOLDINGS SA (Luxembourg Luxembourg, B123456) — ownership of shares 75 to 100 percent',
      link: undefined,
    });
    expect(result.whatToAsk).toEqual(['Who is the ultimate beneficial owner of OFFSHORE HOLDINGS SA?']);
  });

  it('rates three domestic holding layers as a layered structure', async () => {
    const transport = withPscs([corporatePsc('PARENT ONE LTD', '00000002', 'England', 'United Kingdom')])
      .on(pscPath('00000002'), { items: [corporatePsc('PARENT TWO LTD', '00000003', 'England', 'United Kingdom')] })
      .on(pscPath('00000003'), { items: [corporatePsc('PARENT THREE LTD', '00000004', 'Scotland', 'United Kingdom')] })
      .on(pscPath('00000004'), { items: [individualPsc('OWNER, Ultimate')] });

    const result = await analyze(transport);

    expect(result.rating).toBe('investigate');
    expect(result.ratingLogic).toBe('3+ corporate layers in ownership');
    expect(result.summary).toBe('Complex 4-layer ownership structure');
    expect(result.evidence.find((e) => e.type === 'corporate_psc')).toMatchObject({
      severity: 'low',
      description: 'PARENT ONE LTD (England United Kingdom, 00000002) — ownership of shares 75 to 100 percent',
      link: 'https://find-and-update.company-information.service.gov.uk/company/00000002',
    });
    expect(result.evidence.find((e) => e.type === 'ownership_depth')?.description)
      .toBe('4-layer ownership structure (including target)');
    expect(result.whatToAsk).toEqual(['Why is ownership structured through holding companies rather than directly?']);
  });

  it('counts holders that ceased within two years as churn', async () => {
    const result = await analyze(withPscs([
      individualPsc('CURRENT, Owner', { notified_on: '2024-01-01' }),
      individualPsc('FORMER, One', { ceased_on: '2023-01-01' }),
      individualPsc('FORMER, Two', { ceased_on: '2024-01-01' }),
      individualPsc('FORMER, Old', { ceased_on: '2020-01-01' }),
    ]));

    expect(result.rating).toBe('investigate');
    expect(result.summary).toBe('Ownership changed 2 times in 2 years');
    expect(result.evidence.find((e) => e.type === 'psc_churn')?.details).toEqual({ count: 2 });
    expect(result.whatToAsk).toEqual(['What prompted the recent ownership changes?']);
  });

  it('flags a cluttered orbit of dissolved companies', async () => {
    const others = ['00000011', '00000012', '00000013', '00000014', '00000015'];
    const transport = withPscs([individualPsc('SMITH, Jane')])
      .on(`/company/${TARGET}/officers`, { items: [officer('SMITH, Jane', 'd1')] })
      .on('/officers/d1/appointments', {
        items: [
          appointment(TARGET, 'EXAMPLE TRADING LTD', 'active'),
          ...others.map((cn) => appointment(cn, `OLD ${cn} LTD`, 'dissolved')),
        ],
      });
    for (const cn of others) {
      transport.on(`/company/${cn}`, profile({ company_number: cn, company_name: `OLD ${cn} LTD`, company_status: 'dissolved' }));
    }

    const result = await analyze(transport);

    expect(result.rating).toBe('investigate');
    expect(result.summary).toBe('5 dormant/dissolved entities connected to this company');
    expect(result.evidence[0].description).toBe('Orbit includes 5 connected companies (0 active, 0 dormant, 5 dissolved)');
    expect(result.evidence[1].type).toBe('orbit_clutter');
    expect(result.whatToAsk).toEqual(['Are there plans to clean up dormant/dissolved entities in the group?']);
  });

  it('notes when no PSC data is on record', async () => {
    const result = await analyze(new FakeRegistryTransport());

    expect(result.rating).toBe('clean');
    expect(result.summary).toBe('No PSC information on record');
    expect(result.ratingLogic).toBe('No PSC data available');
  });
});
