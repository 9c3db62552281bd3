// Company report: profile summary, the six dimension slots and run metadata

import type { DimensionId, DimensionResult } from './evidence.js';

export interface ProfileSummary {
  companyNumber: string;
  companyName: string;
  companyStatus: string;
  companyType: string;
  incorporatedOn?: string;
  registeredAddress: string;
  sicCodes: string[];
}

export interface ReportMetadata {
  /** ISO-8601 timestamp of when the analysis started */
  analyzedAt: string;
  elapsedSeconds: number;
}

export interface CompanyReport {
  profile: ProfileSummary;
  dimensions: Record<DimensionId, DimensionResult>;
  metadata: ReportMetadata;
}

export interface UsageSnapshot {
  totalRuns: number;
  companyRuns: number;
  firstRunAt?: string;
  lastRunAt?: string;
}

/** Events yielded by Orchestrator.stream(), in order: profile, dimension*, complete (or a lone error) */
export type StreamEvent =
  | { type: 'profile'; profile: ProfileSummary; usage?: UsageSnapshot }
  | { type: 'dimension'; dimension: DimensionId; result: DimensionResult }
  | { type: 'complete'; metadata: ReportMetadata }
  | { type: 'error'; message: string };
