// Ownership graph produced by the tracer

export type HolderKind = 'individual' | 'corporate' | 'trust';

export interface OwnershipNode {
  name: string;
  kind: HolderKind;
  /** Raw PSC kind as returned by the registry */
  registryKind: string;
  naturesOfControl: string[];
  depth: number;
  controlledCompany: string;
  nationality?: string;
  registrationNumber?: string;
  jurisdiction?: string;
  foreign?: boolean;
  /** Present on domestic corporate holders that were followed */
  layer?: OwnershipLayer;
}

export interface OwnershipLayer {
  companyNumber: string;
  depth: number;
  /** Already visited in this trace, or past the depth limit */
  untraceable: boolean;
  holders: OwnershipNode[];
}

export interface OwnershipSummary {
  corporateLayers: number;
  foreignEntities: { name: string; jurisdiction: string }[];
  trustCount: number;
  maxDepth: number;
}

export type OrbitStatus = 'active' | 'dormant' | 'dissolved';

export interface OrbitCompany {
  companyNumber: string;
  companyName: string;
  status: OrbitStatus;
  via: 'psc' | 'director';
}

export interface OrbitSurvey {
  discovered: number;
  sampled: OrbitCompany[];
  active: number;
  dormant: number;
  dissolved: number;
}
