// Error hierarchy for registry access and analysis

import type { DimensionId } from './evidence.js';

export class RegistryLensError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Upstream 429. Recovered by backoff; only surfaces as the cause of an exhausted retry. */
export class RateLimitedError extends RegistryLensError {
  constructor(readonly path: string) {
    super(`Registry rate limited request to ${path}`);
  }
}

export class UpstreamUnavailableError extends RegistryLensError {
  constructor(
    readonly path: string,
    readonly attempts: number,
    readonly lastStatus: number | undefined,
    options?: { cause?: unknown },
  ) {
    super(
      `Registry unavailable for ${path} after ${attempts} attempt(s)` +
        (lastStatus !== undefined ? ` (last status ${lastStatus})` : ''),
      options,
    );
  }
}

export class CompanyNotFoundError extends RegistryLensError {
  constructor(readonly companyNumber: string) {
    super(`Company ${companyNumber} not found`);
  }
}

export class InvalidCompanyNumberError extends RegistryLensError {
  constructor(readonly input: string) {
    super(`Invalid company number: "${input}"`);
  }
}

export class AnalyzerFaultError extends RegistryLensError {
  constructor(readonly dimension: DimensionId, cause: unknown) {
    super(
      `Analyzer ${dimension} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class ConfigError extends RegistryLensError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
