// Usage statistics: how often reports are run, globally and per company

import type { UsageSnapshot } from '../types/report.js';

export interface UsageTracker {
  /** Count one run for the company and return the updated figures */
  recordRun(companyNumber: string): Promise<UsageSnapshot>;
  getStats(companyNumber?: string): Promise<UsageSnapshot>;
}

interface CompanyUsage {
  runs: number;
  firstRunAt: string;
  lastRunAt: string;
}

export class InMemoryUsageTracker implements UsageTracker {
  private totalRuns = 0;
  private companies = new Map<string, CompanyUsage>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async recordRun(companyNumber: string): Promise<UsageSnapshot> {
    const at = this.now().toISOString();
    this.totalRuns++;
    const existing = this.companies.get(companyNumber);
    const usage: CompanyUsage = existing
      ? { ...existing, runs: existing.runs + 1, lastRunAt: at }
      : { runs: 1, firstRunAt: at, lastRunAt: at };
    this.companies.set(companyNumber, usage);
    return this.snapshot(usage);
  }

  async getStats(companyNumber?: string): Promise<UsageSnapshot> {
    const usage = companyNumber ? this.companies.get(companyNumber) : undefined;
    return this.snapshot(usage);
  }

  private snapshot(usage: CompanyUsage | undefined): UsageSnapshot {
    return {
      totalRuns: this.totalRuns,
      companyRuns: usage?.runs ?? 0,
      firstRunAt: usage?.firstRunAt,
      lastRunAt: usage?.lastRunAt,
    };
  }
}
