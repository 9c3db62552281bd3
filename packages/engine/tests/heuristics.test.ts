import { describe, it, expect } from 'vitest';
import {
  accountsDeadline,
  churnRate,
  controlPercentage,
  dissolutionRate,
  formatAddress,
  industryCodesOverlap,
  isFormationAgentAddress,
  medianTenure,
  nameSimilarity,
  normalizeAddress,
  roundTo,
} from '../utils/heuristics.js';
import { daysBetween, formatDate, parseDate } from '../utils/dates.js';
import { AppointmentSchema, type Appointment } from '../types/registry.js';

function appt(status: string, appointedOn?: string, resignedOn?: string): Appointment {
  return AppointmentSchema.parse({
    appointed_on: appointedOn,
    resigned_on: resignedOn,
    officer_role: 'director',
    appointed_to: { company_number: '00000002', company_name: 'OTHER LTD', company_status: status },
  });
}

describe('dates', () => {
  it('parses registry dates and ignores any time part', () => {
    expect(formatDate(parseDate('2023-11-15T10:00:00') ?? new Date(0))).toBe('2023-11-15');
  });

  it('returns null for missing or invalid dates', () => {
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('not-a-date')).toBeNull();
  });

  it('counts calendar days, negative when reversed', () => {
    const a = new Date(2023, 9, 31);
    const b = new Date(2023, 10, 15);
    expect(daysBetween(a, b)).toBe(15);
    expect(daysBetween(b, a)).toBe(-15);
  });
});

describe('dissolutionRate', () => {
  it('is the percentage of dissolved appointments', () => {
    const rate = dissolutionRate([appt('dissolved'), appt('dissolved'), appt('active')]);
    expect(rate.dissolved).toBe(2);
    expect(rate.total).toBe(3);
    expect(rate.rate).toBeCloseTo(66.667, 2);
  });

  it('is zero for no appointments', () => {
    expect(dissolutionRate([])).toEqual({ dissolved: 0, total: 0, rate: 0 });
  });
});

describe('medianTenure', () => {
  const now = new Date(2024, 5, 1);

  it('takes the middle tenure, running open appointments to now', () => {
    const tenure = medianTenure([
      appt('active', '2020-01-01', '2021-01-01'),
      appt('active', '2018-01-01', '2020-01-01'),
      appt('active', '2023-06-01'),
    ], now);
    expect(tenure).toBeCloseTo(366 / 365.25, 6);
  });

  it('averages the two middle tenures for an even count', () => {
    const tenure = medianTenure([
      appt('active', '2020-01-01', '2021-01-01'),
      appt('active', '2020-01-01', '2024-01-01'),
    ], now);
    expect(tenure).toBeCloseTo((366 + 1461) / 2 / 365.25, 6);
  });

  it('is undefined without dated appointments', () => {
    expect(medianTenure([appt('active')], now)).toBeUndefined();
  });
});

describe('churnRate', () => {
  it('divides appointments by the span of start dates', () => {
    const rate = churnRate([
      appt('active', '2020-01-01'),
      appt('active', '2022-01-01'),
      appt('active'),
    ]);
    expect(rate).toBeCloseTo(3 / (731 / 365.25), 6);
  });

  it('is zero for a span under six months or a single start', () => {
    expect(churnRate([appt('active', '2020-01-01'), appt('active', '2020-03-01')])).toBe(0);
    expect(churnRate([appt('active', '2020-01-01')])).toBe(0);
  });
});

describe('nameSimilarity', () => {
  it('ignores case and outer whitespace', () => {
    expect(nameSimilarity('ACME WIDGETS LTD', ' acme widgets ltd ')).toBe(1);
  });

  it('is one minus edit distance over the longer length', () => {
    expect(nameSimilarity('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7, 6);
  });

  it('is zero when either name is empty', () => {
    expect(nameSimilarity('ACME LTD', '  ')).toBe(0);
  });
});

describe('industryCodesOverlap', () => {
  it('detects a shared code', () => {
    expect(industryCodesOverlap(['62020', '62090'], ['70229', '62090'])).toBe(true);
    expect(industryCodesOverlap(['62020'], [])).toBe(false);
  });
});

describe('accountsDeadline', () => {
  it('allows nine months for private companies', () => {
    expect(formatDate(accountsDeadline(new Date(2023, 0, 31), 'ltd'))).toBe('2023-10-31');
  });

  it('allows six months for public companies', () => {
    expect(formatDate(accountsDeadline(new Date(2023, 0, 31), 'plc'))).toBe('2023-07-31');
  });
});

describe('addresses', () => {
  it('normalises to lower-case alphanumerics and spaces', () => {
    expect(normalizeAddress({ address_line_1: '1 High St.', locality: 'Leeds', postal_code: 'LS1 1AA' }))
      .toBe('1 high st  leeds ls1 1aa');
  });

  it('recognises formation agent addresses whatever the punctuation', () => {
    expect(isFormationAgentAddress({ address_line_1: '71-75 Shelton Street', locality: 'London', postal_code: 'WC2H 9JQ' }))
      .toBe(true);
    expect(isFormationAgentAddress('Kemp House, 152 City Road')).toBe(true);
    expect(isFormationAgentAddress({ address_line_1: '1 High Street', locality: 'Leeds' })).toBe(false);
  });

  it('formats the non-empty parts in order', () => {
    expect(formatAddress({ premises: 'Unit 2', address_line_1: '1 High Street', locality: 'Leeds', postal_code: 'LS1 1AA' }))
      .toBe('Unit 2, 1 High Street, Leeds, LS1 1AA');
  });
});

describe('controlPercentage', () => {
  it('sums bucket midpoints across natures of control', () => {
    expect(controlPercentage(['ownership-of-shares-75-to-100-percent', 'voting-rights-25-to-50-percent'])).toBe(125);
    expect(controlPercentage(['significant-influence-or-control'])).toBe(0);
  });
});

describe('roundTo', () => {
  it('rounds to the given places', () => {
    expect(roundTo(66.6667, 1)).toBe(66.7);
    expect(roundTo(2.5, 0)).toBe(3);
  });
});
