// Registry Lens engine
// Due-diligence signals for UK companies from the public registry, in six rated dimensions

export { Orchestrator, FAILED_SUMMARY, failurePlaceholder, summarizeProfile } from './orchestrator/coordinator.js';
export type { OrchestratorConfig, AnalyzerOutcome } from './orchestrator/coordinator.js';
export { BatchAnalyzer, buildComparative } from './orchestrator/batch-analyzer.js';
export type { BatchOptions, BatchProgress, BatchResult, CompanyBatchResult } from './orchestrator/batch-analyzer.js';
export { createAnalyzer, createAnalyzers, mapDimensions } from './orchestrator/analyzer-registry.js';
export { InMemoryUsageTracker } from './orchestrator/usage-tracker.js';
export type { UsageTracker } from './orchestrator/usage-tracker.js';

export { BaseAnalyzer, currentDirectors, isDirector } from './analyzers/base-analyzer.js';
export type { AnalyzerContext, DimensionAnalyzer, Observation } from './analyzers/base-analyzer.js';
export { applyCascade } from './analyzers/cascade.js';
export type { RatingRule, CascadeFallback, CascadeOutcome } from './analyzers/cascade.js';
export { DirectorTrackRecordAnalyzer } from './analyzers/director-track-record.js';
export { FilingDisciplineAnalyzer } from './analyzers/filing-discipline.js';
export { GovernanceStabilityAnalyzer } from './analyzers/governance-stability.js';
export { ControlNetworkAnalyzer } from './analyzers/control-network.js';
export { OwnershipClarityAnalyzer } from './analyzers/ownership-clarity.js';
export { TransactionReadinessAnalyzer } from './analyzers/transaction-readiness.js';

export { traceOwnership, summarizeOwnership } from './ownership/ownership-tracer.js';
export type { TraceOptions } from './ownership/ownership-tracer.js';
export { surveyOrbit, classifyOrbitCompany } from './ownership/orbit.js';

// Client: rate limiting, caching, retries over a swappable transport
export { RegistryClient, CacheTTL } from './client/registry-client.js';
export type { RegistryClientOptions, ClientHealth, FetchOptions } from './client/registry-client.js';
export { SlidingWindowRateLimiter } from './client/rate-limiter.js';
export type { RateLimiterOptions } from './client/rate-limiter.js';
export { MemoryResponseCache, FileResponseCache, cacheKey } from './client/response-cache.js';
export type { ResponseCache, QueryParams } from './client/response-cache.js';
export { HttpRegistryTransport } from './client/transport.js';
export type { RegistryTransport, TransportResponse, HttpTransportOptions } from './client/transport.js';

// Config factory: CH_* environment variables → client
export { loadConfig, createRegistryClient } from './config/index.js';
export type { RegistryLensConfig } from './config/index.js';

export { formatReportMarkdown, RATING_LABEL } from './utils/report-formatter.js';
export { normalizeCompanyNumber, tryNormalizeCompanyNumber, companyLink, officerLink } from './utils/registry-links.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './utils/logger.js';

export * from './types/evidence.js';
export * from './types/errors.js';
export * from './types/events.js';
export * from './types/ownership.js';
export * from './types/registry.js';
export * from './types/report.js';
