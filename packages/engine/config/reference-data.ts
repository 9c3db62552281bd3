// Registry vocabulary and thresholds shared by the analyzers

/** Registered-office fragments used by company formation agents (compared after normalisation) */
export const FORMATION_AGENT_FRAGMENTS: readonly string[] = [
  '71-75 shelton street',
  '20-22 wenlock road',
  '85 great portland street',
  'kemp house',
  '27 old gloucester street',
  '128 city road',
  'suite 4 lincoln house',
  '167-169 great portland street',
  'c/o companies house',
  'lenta business centre',
  '63/66 hatton garden',
];

export const INSOLVENCY_STATUSES: readonly string[] = [
  'liquidation',
  'administration',
  'receivership',
  'voluntary-arrangement',
  'insolvency-proceedings',
];

/** Insolvency case date types that mark the start of a failure */
export const INSOLVENCY_DATE_TYPES: readonly string[] = [
  'wound-up-on',
  'instrumented-on',
  'administration-started-on',
];

export const PROBLEMATIC_PSC_STATEMENTS: readonly string[] = [
  'psc-exists-but-not-identified',
  'psc-details-not-confirmed',
  'steps-to-find-psc-not-yet-completed',
];

export const PUBLIC_COMPANY_TYPES: readonly string[] = ['plc', 'public-limited'];

/** Natures-of-control bucket midpoints, matched by substring */
export const CONTROL_BUCKETS: readonly { marker: string; midpoint: number }[] = [
  { marker: '75-to-100-percent', midpoint: 87.5 },
  { marker: '50-to-75-percent', midpoint: 62.5 },
  { marker: '25-to-50-percent', midpoint: 37.5 },
];

export const DIRECTOR_ROLES: readonly string[] = ['director', 'corporate-director'];

export const REGISTRY_WEB_BASE = 'https://find-and-update.company-information.service.gov.uk';
export const REGISTRY_API_BASE = 'https://api.company-information.service.gov.uk';
