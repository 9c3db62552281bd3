// Fixed registry of dimension analyzers, keyed by dimension id

import type { DimensionId } from '../types/evidence.js';
import type { DimensionAnalyzer } from '../analyzers/base-analyzer.js';
import { DirectorTrackRecordAnalyzer } from '../analyzers/director-track-record.js';
import { FilingDisciplineAnalyzer } from '../analyzers/filing-discipline.js';
import { GovernanceStabilityAnalyzer } from '../analyzers/governance-stability.js';
import { ControlNetworkAnalyzer } from '../analyzers/control-network.js';
import { OwnershipClarityAnalyzer } from '../analyzers/ownership-clarity.js';
import { TransactionReadinessAnalyzer } from '../analyzers/transaction-readiness.js';

const FACTORY: Record<DimensionId, () => DimensionAnalyzer> = {
  director_track_record: () => new DirectorTrackRecordAnalyzer(),
  filing_discipline: () => new FilingDisciplineAnalyzer(),
  governance_stability: () => new GovernanceStabilityAnalyzer(),
  control_network: () => new ControlNetworkAnalyzer(),
  ownership_clarity: () => new OwnershipClarityAnalyzer(),
  transaction_readiness: () => new TransactionReadinessAnalyzer(),
};

export function createAnalyzer(dimension: DimensionId): DimensionAnalyzer {
  return FACTORY[dimension]();
}

/** Build a record with one entry per dimension */
export function mapDimensions<T>(fn: (dimension: DimensionId) => T): Record<DimensionId, T> {
  return {
    director_track_record: fn('director_track_record'),
    filing_discipline: fn('filing_discipline'),
    governance_stability: fn('governance_stability'),
    control_network: fn('control_network'),
    ownership_clarity: fn('ownership_clarity'),
    transaction_readiness: fn('transaction_readiness'),
  };
}

export function createAnalyzers(): Record<DimensionId, DimensionAnalyzer> {
  return mapDimensions(createAnalyzer);
}
