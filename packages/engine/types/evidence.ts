// Dimension results: evidence items, ratings and the per-dimension catalogs

export const DIMENSION_IDS = [
  'director_track_record',
  'filing_discipline',
  'governance_stability',
  'control_network',
  'ownership_clarity',
  'transaction_readiness',
] as const;

export type DimensionId = typeof DIMENSION_IDS[number];

export type Confidence = 'verified' | 'inferred';
export type Severity = 'none' | 'low' | 'medium' | 'high';
export type Rating = 'clean' | 'investigate' | 'red_flag';

/** Registry resources an evidence item can cite */
export type RegistryResource =
  | 'company-profile'
  | 'officers'
  | 'appointments'
  | 'disqualified-officers'
  | 'insolvency'
  | 'psc'
  | 'psc-statements'
  | 'filing-history'
  | 'charges'
  | 'registered-office-address';

export const EVIDENCE_CATALOG = {
  director_track_record: [
    'disqualification',
    'director_profile',
    'high_dissolution_rate',
    'high_churn',
    'insolvency_association',
    'phoenix_pattern',
    'clean_record',
  ],
  filing_discipline: [
    'accounts_overdue',
    'confirmation_overdue',
    'amendment',
    'ard_change',
    'late_filing',
    'last_minute_pattern',
  ],
  governance_stability: [
    'director_count',
    'recent_appointment',
    'average_tenure',
    'resignation',
    'short_tenure_pattern',
    'timing_near_accounts',
    'timing_near_psc',
    'formation_agent_address',
    'address_churn',
  ],
  control_network: [
    'network_size',
    'large_network',
    'decision_concentration',
    'recent_director',
    'recent_psc',
    'psc_activity',
    'director_network_overlap',
    'dense_director_network',
    'director_controls_psc',
    'clean_network',
  ],
  ownership_clarity: [
    'psc_statement',
    'orbit_summary',
    'orbit_clutter',
    'individual_psc',
    'corporate_psc',
    'trust_psc',
    'ownership_depth',
    'psc_churn',
  ],
  transaction_readiness: [
    'all_assets_debenture',
    'outstanding_charge',
    'recent_charge',
    'multiple_creditors',
    'no_charges',
  ],
} as const satisfies Record<DimensionId, readonly string[]>;

export type EvidenceType<D extends DimensionId = DimensionId> = typeof EVIDENCE_CATALOG[D][number];

export interface EvidenceItem<D extends DimensionId = DimensionId> {
  readonly confidence: Confidence;
  readonly severity: Severity;
  readonly type: EvidenceType<D>;
  readonly description: string;
  readonly details: Readonly<Record<string, unknown>>;
  readonly source: readonly RegistryResource[];
  readonly link?: string;
  /** What an inferred finding cannot establish from registry data */
  readonly disclaimer?: string;
}

export interface Interpretation {
  readonly whyMatters: readonly string[];
  readonly innocentExplanations: readonly string[];
  readonly whatWeChecked: readonly string[];
}

export interface DimensionDescriptor {
  readonly dimension: DimensionId;
  readonly title: string;
  readonly question: string;
  readonly interpretation: Interpretation;
  readonly disclaimer?: string;
}

export interface DimensionResult extends DimensionDescriptor {
  readonly rating: Rating;
  readonly summary: string;
  readonly evidence: readonly EvidenceItem[];
  readonly ratingLogic: string;
  readonly whatToAsk: readonly string[];
  /** Set only on the placeholder for a dimension whose analyzer failed */
  readonly error?: string;
}
