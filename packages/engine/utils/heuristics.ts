// Pure heuristics over registry records. Anything time-dependent takes `now` explicitly.

import { addMonths } from 'date-fns';
import {
  CONTROL_BUCKETS,
  FORMATION_AGENT_FRAGMENTS,
  PUBLIC_COMPANY_TYPES,
} from '../config/reference-data.js';
import type { Address, Appointment } from '../types/registry.js';
import { daysBetween, parseDate } from './dates.js';

export interface DissolutionRate {
  dissolved: number;
  total: number;
  /** Percentage, 0-100 */
  rate: number;
}

export function dissolutionRate(appointments: readonly Appointment[]): DissolutionRate {
  const total = appointments.length;
  if (total === 0) return { dissolved: 0, total: 0, rate: 0 };
  const dissolved = appointments.filter((a) => a.appointed_to.company_status === 'dissolved').length;
  return { dissolved, total, rate: (dissolved / total) * 100 };
}

/** Median tenure in years; open appointments run to `now` */
export function medianTenure(appointments: readonly Appointment[], now: Date): number | undefined {
  const tenures: number[] = [];
  for (const appt of appointments) {
    const appointed = parseDate(appt.appointed_on);
    if (!appointed) continue;
    const end = parseDate(appt.resigned_on) ?? now;
    const days = daysBetween(appointed, end);
    if (days >= 0) tenures.push(days / 365.25);
  }
  if (tenures.length === 0) return undefined;
  tenures.sort((a, b) => a - b);
  const mid = Math.floor(tenures.length / 2);
  return tenures.length % 2 === 0 ? (tenures[mid - 1] + tenures[mid]) / 2 : tenures[mid];
}

/** Appointments per year across the span of dated start dates */
export function churnRate(appointments: readonly Appointment[]): number {
  const starts = appointments
    .map((a) => parseDate(a.appointed_on))
    .filter((d): d is Date => d !== null)
    .sort((a, b) => a.getTime() - b.getTime());
  if (starts.length < 2) return 0;
  const spanYears = daysBetween(starts[0], starts[starts.length - 1]) / 365.25;
  if (spanYears < 0.5) return 0;
  return appointments.length / spanYears;
}

function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/** 1 - edit distance / longer length, ignoring case and outer whitespace */
export function nameSimilarity(a: string, b: string): number {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  if (!left || !right) return 0;
  if (left === right) return 1;
  return 1 - levenshtein(left, right) / Math.max(left.length, right.length);
}

export function industryCodesOverlap(a: readonly string[], b: readonly string[]): boolean {
  const codes = new Set(a);
  return b.some((code) => codes.has(code));
}

/** Filing deadline for accounts made up to `madeUpDate`: 6 months for public companies, 9 otherwise */
export function accountsDeadline(madeUpDate: Date, companyType: string): Date {
  return addMonths(madeUpDate, PUBLIC_COMPANY_TYPES.includes(companyType) ? 6 : 9);
}

export function normalizeAddress(address: Address | string): string {
  const raw = typeof address === 'string'
    ? address
    : [address.address_line_1, address.address_line_2, address.locality, address.postal_code]
      .map((part) => part ?? '')
      .join(' ');
  return raw.toLowerCase().replace(/[^a-z0-9 ]/g, '').trim();
}

// Fragments go through the same normalisation as the address, so "71-75" compares as "7175"
const NORMALIZED_AGENT_FRAGMENTS = FORMATION_AGENT_FRAGMENTS.map((fragment) => normalizeAddress(fragment));

export function isFormationAgentAddress(address: Address | string): boolean {
  const normalized = normalizeAddress(address);
  return NORMALIZED_AGENT_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

/**
 * Rough share of control implied by PSC natures of control.
 * Each bucket contributes its midpoint and buckets are summed across natures,
 * so a holder with both shares and votes in the same band counts twice.
 */
export function controlPercentage(natures: readonly string[]): number {
  let total = 0;
  for (const nature of natures) {
    const bucket = CONTROL_BUCKETS.find((b) => nature.includes(b.marker));
    if (bucket) total += bucket.midpoint;
  }
  return total;
}

export function formatAddress(address: Address): string {
  return [
    address.premises,
    address.address_line_1,
    address.address_line_2,
    address.locality,
    address.region,
    address.postal_code,
    address.country,
  ]
    .filter((part): part is string => Boolean(part))
    .join(', ');
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
