// Registry web links and identifier handling

import { REGISTRY_WEB_BASE } from '../config/reference-data.js';
import { InvalidCompanyNumberError } from '../types/errors.js';
import type { Officer } from '../types/registry.js';

/**
 * Drop whitespace, upper-case and zero-pad all-digit numbers to 8 characters.
 * Throws InvalidCompanyNumberError when the result is not 2-8 alphanumerics.
 */
export function normalizeCompanyNumber(input: string): string {
  let value = input.replace(/\s+/g, '').toUpperCase();
  if (/^\d+$/.test(value)) value = value.padStart(8, '0');
  if (!/^[A-Z0-9]{2,8}$/.test(value)) {
    throw new InvalidCompanyNumberError(input);
  }
  return value;
}

export function companyLink(companyNumber: string): string {
  return `${REGISTRY_WEB_BASE}/company/${companyNumber}`;
}

export function officerLink(officerId: string): string {
  return `${REGISTRY_WEB_BASE}/officers/${officerId}/appointments`;
}

/** Officer id from `links.officer.appointments`, falling back to `links.self` */
export function extractOfficerId(officer: Officer): string | undefined {
  const link = officer.links.officer.appointments ?? officer.links.self;
  if (!link) return undefined;
  const segments = link.split('/').filter(Boolean);
  const index = segments.indexOf('officers');
  if (index === -1 || index + 1 >= segments.length) return undefined;
  return segments[index + 1];
}

/** Normalised company number, or undefined when the input is not one */
export function tryNormalizeCompanyNumber(input: string | undefined): string | undefined {
  if (!input) return undefined;
  try {
    return normalizeCompanyNumber(input);
  } catch (err) {
    if (err instanceof InvalidCompanyNumberError) return undefined;
    throw err;
  }
}
