import { describe, it, expect } from 'vitest';
import { DirectorTrackRecordAnalyzer } from '../analyzers/director-track-record.js';
import { FakeRegistryTransport, NOW, appointment, fakeClient, officer, profile } from './helpers/fake-registry.js';

const TARGET = '00000001';

function registry(): FakeRegistryTransport {
  return new FakeRegistryTransport()
    .on(`/company/${TARGET}`, profile({
      company_name: 'ACME WIDGETS (2023) LTD',
      date_of_creation: '2023-03-01',
      sic_codes: ['62020'],
    }))
    .on(`/company/${TARGET}/officers`, {
      items: [
        officer('SMITH, Jane', 'd1', { appointed_on: '2023-03-01' }),
        officer('JONES, Sam', 's1', { officer_role: 'secretary' }),
        officer('BROWN, Alex', 'd9', { resigned_on: '2023-06-01' }),
      ],
    });
}

async function analyze(transport: FakeRegistryTransport) {
  return new DirectorTrackRecordAnalyzer().execute({ client: fakeClient(transport), companyNumber: TARGET, now: NOW });
}

describe('DirectorTrackRecordAnalyzer', () => {
  it('infers a phoenix pattern from a recently dissolved company in the same industry', async () => {
    const transport = registry()
      .on('/officers/d1/appointments', {
        items: [
          appointment(TARGET, 'ACME WIDGETS (2023) LTD', 'active', { appointed_on: '2023-03-01' }),
          appointment('00000005', 'ACME WIDGETS LTD', 'dissolved', { appointed_on: '2015-01-01' }),
        ],
      })
      .on('/company/00000005', profile({
        company_number: '00000005',
        company_name: 'ACME WIDGETS LTD',
        company_status: 'dissolved',
        date_of_cessation: '2023-01-10',
        sic_codes: ['62020'],
      }));

    const result = await analyze(transport);

    expect(result.rating).toBe('investigate');
    expect(result.ratingLogic).toBe('Phoenix-like pattern detected (inferred)');
    expect(result.summary).toBe('Phoenix-like pattern: ACME WIDGETS LTD → ACME WIDGETS (2023) LTD');

    const phoenix = result.evidence.find((e) => e.type === 'phoenix_pattern');
    expect(phoenix?.confidence).toBe('inferred');
    expect(phoenix?.severity).toBe('medium');
    expect(phoenix?.description).toBe(
      'Phoenix-likelihood: ACME WIDGETS LTD dissolved 2023-01-10, ACME WIDGETS (2023) LTD incorporated 50 days later (same industry (SIC), similar name (70%))',
    );
    expect(phoenix?.details).toMatchObject({ gap_days: 50, sic_match: true, name_similarity: 0.7 });
    expect(result.evidence.some((e) => e.type === 'clean_record')).toBe(false);
    expect(result.whatToAsk).toEqual(['Understand the relationship between ACME WIDGETS LTD and ACME WIDGETS (2023) LTD']);
  });

  it('only reviews current directors', async () => {
    const transport = registry().on('/officers/d1/appointments', { items: [] });

    await analyze(transport);

    expect(transport.callsTo('/officers/s1/appointments')).toBe(0);
    expect(transport.callsTo('/officers/d9/appointments')).toBe(0);
  });

  it('rates a clean record clean', async () => {
    const transport = registry().on('/officers/d1/appointments', {
      items: [
        appointment(TARGET, 'ACME WIDGETS (2023) LTD', 'active', { appointed_on: '2023-03-01' }),
        appointment('00000007', 'STEADY LTD', 'active', { appointed_on: '2012-05-01' }),
      ],
    });

    const result = await analyze(transport);

    expect(result.rating).toBe('clean');
    expect(result.summary).toBe('All 1 directors checked — clean track record');
    expect(result.evidence.map((e) => e.type)).toEqual(['director_profile', 'clean_record']);
    expect(result.whatToAsk).toEqual([]);
  });

  it('red-flags a disqualified director', async () => {
    const transport = registry()
      .on('/disqualified-officers/natural/d1', {
        disqualifications: [{
          disqualified_from: '2020-01-01',
          disqualified_until: '2030-01-01',
          reason: { description_identifier: 'unfit-conduct' },
        }],
      })
      .on('/officers/d1/appointments', { items: [] });

    const result = await analyze(transport);

    expect(result.rating).toBe('red_flag');
    expect(result.summary).toBe('1 director(s) disqualified from acting');
    expect(result.evidence[0]).toMatchObject({
      type: 'disqualification',
      severity: 'high',
      description: 'SMITH, Jane is disqualified until 2030-01-01',
    });
  });

  it('measures a resignation shortly before insolvency', async () => {
    const transport = registry()
      .on('/officers/d1/appointments', {
        items: [
          appointment('00000006', 'FAILED LTD', 'liquidation', { appointed_on: '2018-01-01', resigned_on: '2022-01-01' }),
        ],
      })
      .on('/company/00000006/insolvency', {
        cases: [{
          type: 'creditors-voluntary-liquidation',
          dates: [{ type: 'wound-up-on', date: '2022-03-02' }],
        }],
      });

    const result = await analyze(transport);

    expect(result.rating).toBe('investigate');
    expect(result.summary).toBe('SMITH, Jane associated with 1 previous insolvency (FAILED LTD)');
    const association = result.evidence.find((e) => e.type === 'insolvency_association');
    expect(association?.severity).toBe('high');
    expect(association?.details).toMatchObject({
      assessment: 'Resigned 60 days before insolvency',
      director_role: 'Director from 2018-01-01 to 2022-01-01',
    });
    expect(result.whatToAsk[0]).toBe("Ask SMITH, Jane to explain their involvement in FAILED LTD's insolvency");
  });

  it('reports insufficient data when officers are unavailable', async () => {
    const transport = new FakeRegistryTransport().on(`/company/${TARGET}`, profile());

    const result = await analyze(transport);

    expect(result.rating).toBe('investigate');
    expect(result.summary).toBe('Unable to retrieve officer data');
    expect(result.evidence).toEqual([]);
  });
});
