// Batch analysis: several companies through one orchestrator (and so one shared client budget),
// with concurrency control and a comparative rating table.

import { DIMENSION_IDS } from '../types/evidence.js';
import type { CompanyReport } from '../types/report.js';
import { errorMessage } from '../types/errors.js';
import { RATING_LABEL } from '../utils/report-formatter.js';
import { Orchestrator, type OrchestratorConfig } from './coordinator.js';

export interface BatchOptions {
  /** Max concurrent analyses (default: 3) */
  concurrency?: number;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface CompanyBatchResult {
  companyNumber: string;
  report?: CompanyReport;
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  companies: CompanyBatchResult[];
  comparative: string;
  totalDurationMs: number;
}

export class BatchAnalyzer {
  private orchestrator: Orchestrator;

  constructor(config: OrchestratorConfig) {
    this.orchestrator = new Orchestrator(config);
  }

  async analyze(companyNumbers: string[], options: BatchOptions = {}): Promise<BatchResult> {
    const { concurrency = 3, onProgress } = options;
    const width = Math.max(1, Math.floor(concurrency));
    const totalStart = Date.now();
    const results: CompanyBatchResult[] = [];

    for (let i = 0; i < companyNumbers.length; i += width) {
      const batch = companyNumbers.slice(i, i + width);
      let settled = results.length;

      const batchResults = await Promise.all(batch.map(async (companyNumber): Promise<CompanyBatchResult> => {
        const companyStart = Date.now();
        onProgress?.({ completed: settled, total: companyNumbers.length, current: companyNumber, status: 'running' });

        try {
          const report = await this.orchestrator.analyze(companyNumber);
          settled++;
          onProgress?.({ completed: settled, total: companyNumbers.length, current: companyNumber, status: 'completed' });
          return { companyNumber, report, durationMs: Date.now() - companyStart };
        } catch (err) {
          const error = errorMessage(err);
          settled++;
          onProgress?.({
            completed: settled,
            total: companyNumbers.length,
            current: companyNumber,
            status: 'failed',
            error,
          });
          return { companyNumber, error, durationMs: Date.now() - companyStart };
        }
      }));
      results.push(...batchResults);
    }

    return {
      companies: results,
      comparative: buildComparative(results),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

export function buildComparative(results: readonly CompanyBatchResult[]): string {
  const successful = results.filter((r): r is CompanyBatchResult & { report: CompanyReport } => r.report !== undefined);
  const failed = results.filter((r) => r.report === undefined);

  if (successful.length === 0) {
    return '## Comparative Analysis\n\nNo companies were successfully analyzed.';
  }

  const first = successful[0].report;
  const titles = DIMENSION_IDS.map((id) => first.dimensions[id].title);
  const lines: string[] = [
    '## Comparative Analysis',
    '',
    `**Companies analyzed:** ${successful.length}/${results.length}`,
    '',
    `| Company | ${titles.join(' | ')} |`,
    `|---------|${titles.map(() => '---').join('|')}|`,
  ];

  for (const { report } of successful) {
    const ratings = DIMENSION_IDS.map((id) => RATING_LABEL[report.dimensions[id].rating]);
    lines.push(`| ${report.profile.companyName} (${report.profile.companyNumber}) | ${ratings.join(' | ')} |`);
  }
  lines.push('');

  if (failed.length > 0) {
    lines.push('### Failed Analyses', '');
    for (const r of failed) lines.push(`- **${r.companyNumber}**: ${r.error ?? 'unknown error'}`);
    lines.push('');
  }

  return lines.join('\n');
}
