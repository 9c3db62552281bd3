// One-hop survey of companies around the target via corporate PSCs and director appointments

import type { OrbitCompany, OrbitStatus, OrbitSurvey } from '../types/ownership.js';
import type { CompanyProfile, Officer, RegistryReader } from '../types/registry.js';
import { extractOfficerId, tryNormalizeCompanyNumber } from '../utils/registry-links.js';

export const ORBIT_DIRECTOR_LIMIT = 3;
export const ORBIT_SAMPLE_LIMIT = 20;

export function classifyOrbitCompany(profile: CompanyProfile): OrbitStatus {
  if (profile.company_status === 'dissolved') return 'dissolved';
  if (profile.company_status === 'active'
    && (profile.has_been_liquidated || profile.type.toLowerCase().includes('dormant'))) {
    return 'dormant';
  }
  return 'active';
}

export async function surveyOrbit(
  client: RegistryReader,
  companyNumber: string,
  directors: readonly Officer[],
): Promise<OrbitSurvey> {
  const discovered = new Map<string, OrbitCompany['via']>();

  const pscs = await client.getPscs(companyNumber);
  for (const psc of pscs?.items ?? []) {
    if (!psc.kind.includes('corporate')) continue;
    const reg = tryNormalizeCompanyNumber(psc.identification.registration_number);
    if (reg && reg !== companyNumber && !discovered.has(reg)) discovered.set(reg, 'psc');
  }

  for (const director of directors.slice(0, ORBIT_DIRECTOR_LIMIT)) {
    const officerId = extractOfficerId(director);
    if (!officerId) continue;
    const appointments = await client.getAppointments(officerId);
    for (const appt of appointments?.items ?? []) {
      const other = appt.appointed_to.company_number;
      if (other && other !== companyNumber && !discovered.has(other)) discovered.set(other, 'director');
    }
  }

  const candidates = [...discovered].slice(0, ORBIT_SAMPLE_LIMIT);
  const profiles = await Promise.all(candidates.map(([number]) => client.getCompany(number)));

  const survey: OrbitSurvey = { discovered: discovered.size, sampled: [], active: 0, dormant: 0, dissolved: 0 };
  candidates.forEach(([number, via], i) => {
    const profile = profiles[i];
    if (!profile) return;
    const status = classifyOrbitCompany(profile);
    survey[status]++;
    survey.sampled.push({ companyNumber: number, companyName: profile.company_name, status, via });
  });
  return survey;
}
