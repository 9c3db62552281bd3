import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { formatReportMarkdown } from '@registry-lens/engine';
import { AnalyzeCompanySchema, AnalyzeDimensionSchema } from '../schemas/common.js';
import { respond } from '../formatters/response.js';
import type { ServerDeps } from '../server.js';

export function registerAnalysisTools(server: McpServer, deps: Required<Pick<ServerDeps, 'orchestrator' | 'logger'>>) {
  const { orchestrator, logger } = deps;

  server.tool(
    'registry_analyze_company',
    'Full due-diligence report for a UK company: director track record, filing discipline, governance stability, control network, ownership clarity and closing friction, each rated clean / investigate / red flag with evidence and questions to ask.',
    AnalyzeCompanySchema.shape,
    async (params) => respond('registry_analyze_company', logger, async () => {
      const { company_number, format } = AnalyzeCompanySchema.parse(params);
      const report = await orchestrator.analyze(company_number);
      return format === 'json' ? report : formatReportMarkdown(report);
    }),
  );

  server.tool(
    'registry_analyze_dimension',
    'Run a single analysis dimension for a UK company. Cheaper than the full report when only one question matters.',
    AnalyzeDimensionSchema.shape,
    async (params) => respond('registry_analyze_dimension', logger, async () => {
      const { company_number, dimension } = AnalyzeDimensionSchema.parse(params);
      return orchestrator.analyzeDimension(company_number, dimension);
    }),
  );
}
