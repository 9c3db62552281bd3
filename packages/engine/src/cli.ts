#!/usr/bin/env node
// Registry Lens: command-line entry point
//
// Usage:
//   registry-lens analyze 00000006               # full report as markdown
//   registry-lens analyze 00000006 --stream      # dimensions printed as they finish
//   registry-lens analyze 00000006 --json        # report as JSON
//   registry-lens batch 00000006 SC123456        # comparative table
//   registry-lens trace 00000006 --depth 2       # ownership chain
//   registry-lens --help

import 'dotenv/config';
import { loadConfig, createRegistryClient } from '../config/index.js';
import { Orchestrator, type OrchestratorConfig } from '../orchestrator/coordinator.js';
import { BatchAnalyzer } from '../orchestrator/batch-analyzer.js';
import { InMemoryUsageTracker } from '../orchestrator/usage-tracker.js';
import { summarizeOwnership, traceOwnership } from '../ownership/ownership-tracer.js';
import { formatReportMarkdown, RATING_LABEL } from '../utils/report-formatter.js';
import { normalizeCompanyNumber } from '../utils/registry-links.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';
import type { Rating } from '../types/evidence.js';
import type { OwnershipLayer } from '../types/ownership.js';
import type { RegistryClient } from '../client/registry-client.js';
import type { RegistryLensConfig } from '../config/index.js';

// ── ANSI helpers ──────────────────────────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const RATING_COLOR: Record<Rating, keyof typeof ansi> = {
  clean: 'green',
  investigate: 'yellow',
  red_flag: 'red',
};

function ratingBadge(rating: Rating): string {
  return c(RATING_COLOR[rating], RATING_LABEL[rating]);
}

class UsageError extends Error {}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return n;
}

// ── CLI class ───────────────────────────────────────────────────────

class RegistryLensCli {
  private config: RegistryLensConfig | null = null;
  private client: RegistryClient | null = null;

  async start(rawArgs: string[]): Promise<void> {
    if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
      this.printHelp();
      return;
    }

    const [command, ...rest] = rawArgs;
    switch (command) {
      case 'analyze':
        await this.handleAnalyze(rest);
        break;
      case 'batch':
        await this.handleBatch(rest);
        break;
      case 'trace':
        await this.handleTrace(rest);
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(args: string[]): Promise<void> {
    let stream = false;
    let json = false;
    const positional: string[] = [];

    for (const arg of args) {
      if (arg === '--stream') stream = true;
      else if (arg === '--json') json = true;
      else positional.push(arg);
    }
    const companyNumber = positional[0];
    if (!companyNumber) throw new UsageError('analyze needs a company number');

    const orchestrator = this.orchestrator();

    if (!stream) {
      const report = await orchestrator.analyze(companyNumber);
      console.log(json ? JSON.stringify(report, null, 2) : formatReportMarkdown(report));
      return;
    }

    for await (const event of orchestrator.stream(companyNumber)) {
      if (json) {
        console.log(JSON.stringify(event));
        continue;
      }
      switch (event.type) {
        case 'profile':
          console.log(`\n  ${c('bold', event.profile.companyName)} ${c('dim', `(${event.profile.companyNumber}) ${event.profile.companyStatus}`)}`);
          if (event.usage && event.usage.companyRuns > 1) {
            console.log(`  ${c('dim', `Checked ${event.usage.companyRuns} times since ${event.usage.firstRunAt ?? 'unknown'}`)}`);
          }
          console.log();
          break;
        case 'dimension':
          console.log(`  ${c('cyan', event.result.title.padEnd(24, ' '))} ${ratingBadge(event.result.rating)} ${c('dim', event.result.summary)}`);
          break;
        case 'complete':
          console.log(`\n  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${event.metadata.elapsedSeconds.toFixed(1)}s`)}\n`);
          break;
        case 'error':
          console.error(`  ${c('red', 'Error:')} ${event.message}\n`);
          process.exitCode = 1;
          break;
      }
    }
  }

  // ── Subcommand: batch ───────────────────────────────────────────

  private async handleBatch(args: string[]): Promise<void> {
    let concurrency = 3;
    const numbers: string[] = [];

    for (let i = 0; i < args.length; i++) {
      if (args[i] === '--concurrency') {
        concurrency = parsePositiveInt('--concurrency', args[++i]);
      } else {
        numbers.push(args[i]);
      }
    }
    if (numbers.length === 0) throw new UsageError('batch needs at least one company number');

    const batch = new BatchAnalyzer(this.orchestratorConfig());
    const result = await batch.analyze(numbers, {
      concurrency,
      onProgress: (p) => {
        const marker = p.status === 'failed' ? c('red', '✗') : p.status === 'completed' ? c('green', '✓') : c('dim', '…');
        process.stderr.write(`  ${marker} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}\n`);
      },
    });

    console.log(`\n${result.comparative}`);
    console.log(`  ${c('dim', `Total: ${(result.totalDurationMs / 1000).toFixed(1)}s`)}\n`);
    if (result.companies.some((r) => r.error !== undefined)) process.exitCode = 1;
  }

  // ── Subcommand: trace ───────────────────────────────────────────

  private async handleTrace(args: string[]): Promise<void> {
    let maxDepth = 3;
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
      if (args[i] === '--depth') {
        maxDepth = parsePositiveInt('--depth', args[++i]);
      } else {
        positional.push(args[i]);
      }
    }
    if (!positional[0]) throw new UsageError('trace needs a company number');

    const companyNumber = normalizeCompanyNumber(positional[0]);
    const root = await traceOwnership(this.registryClient(), companyNumber, { maxDepth });
    const summary = summarizeOwnership(root);

    console.log(`\n  ${c('bold', 'Ownership of')} ${c('cyan', companyNumber)}\n`);
    this.printLayer(root, 1);
    console.log();
    console.log(`  ${c('dim', `Corporate layers: ${summary.corporateLayers} | Trusts: ${summary.trustCount} | Foreign entities: ${summary.foreignEntities.length} | Max depth: ${summary.maxDepth}`)}\n`);
  }

  private printLayer(layer: OwnershipLayer, indent: number): void {
    const pad = '  '.repeat(indent);
    if (layer.untraceable) {
      console.log(`${pad}${c('dim', `${layer.companyNumber}: already visited or beyond depth limit`)}`);
      return;
    }
    if (layer.holders.length === 0) {
      console.log(`${pad}${c('dim', 'No active control-holders registered')}`);
      return;
    }
    for (const holder of layer.holders) {
      const tag = holder.kind === 'corporate' && holder.foreign
        ? c('magenta', `corporate, ${holder.jurisdiction || 'foreign'}`)
        : c('yellow', holder.kind);
      console.log(`${pad}${c('dim', '●')} ${holder.name} ${c('dim', '[')}${tag}${c('dim', ']')}`);
      if (holder.layer) this.printLayer(holder.layer, indent + 1);
    }
  }

  // ── Wiring ──────────────────────────────────────────────────────

  private loadedConfig(): RegistryLensConfig {
    this.config ??= loadConfig();
    return this.config;
  }

  private registryClient(): RegistryClient {
    this.client ??= createRegistryClient(this.loadedConfig());
    return this.client;
  }

  private orchestratorConfig(): OrchestratorConfig {
    return {
      client: this.registryClient(),
      usage: new InMemoryUsageTracker(),
      logger: createLogger('Orchestrator', { level: this.loadedConfig().logLevel }),
    };
  }

  private orchestrator(): Orchestrator {
    return new Orchestrator(this.orchestratorConfig());
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Registry Lens')} — due-diligence signals from the UK company registry

  ${c('bold', 'Usage:')}
    registry-lens analyze <number> [--stream] [--json]   Six-dimension report
    registry-lens batch <number...> [--concurrency N]    Comparative ratings
    registry-lens trace <number> [--depth N]             Ownership chain
    registry-lens --help                                 Show this help

  ${c('bold', 'Environment:')}
    CH_API_KEY        Required. Registry API key.
    CH_CACHE_DIR      Persist responses on disk instead of in memory.
    CH_LOG_LEVEL      debug, info, warn or error (default: info).
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new RegistryLensCli();
cli.start(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
    cli.printHelp();
  } else {
    console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  }
  process.exit(1);
});
