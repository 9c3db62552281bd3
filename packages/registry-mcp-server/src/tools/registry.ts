import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  CompanyNotFoundError,
  normalizeCompanyNumber,
  summarizeOwnership,
  summarizeProfile,
  traceOwnership,
} from '@registry-lens/engine';
import { CompanyNumberSchema, HealthSchema, TraceOwnershipSchema } from '../schemas/common.js';
import { respond } from '../formatters/response.js';
import type { ServerDeps } from '../server.js';

export function registerRegistryTools(server: McpServer, deps: Required<Pick<ServerDeps, 'client' | 'logger'>> & Pick<ServerDeps, 'usage'>) {
  const { client, usage, logger } = deps;

  server.tool(
    'registry_trace_ownership',
    'Trace who controls a UK company through its persons with significant control, following UK corporate holders layer by layer. Flags foreign entities, trusts and cycles.',
    TraceOwnershipSchema.shape,
    async (params) => respond('registry_trace_ownership', logger, async () => {
      const { company_number, max_depth } = TraceOwnershipSchema.parse(params);
      const companyNumber = normalizeCompanyNumber(company_number);
      const ownership = await traceOwnership(client, companyNumber, { maxDepth: max_depth });
      return { companyNumber, summary: summarizeOwnership(ownership), ownership };
    }),
  );

  server.tool(
    'registry_company_profile',
    'Basic registry profile: name, status, type, incorporation date, registered office and SIC codes.',
    CompanyNumberSchema.shape,
    async (params) => respond('registry_company_profile', logger, async () => {
      const companyNumber = normalizeCompanyNumber(CompanyNumberSchema.parse(params).company_number);
      const lookup = await client.lookupCompany(companyNumber);
      if (lookup.status === 'not_found') throw new CompanyNotFoundError(companyNumber);
      return summarizeProfile(lookup.data);
    }),
  );

  server.tool(
    'registry_health',
    'Remaining registry request budget in the current rate-limit window, cached response count and report usage.',
    HealthSchema.shape,
    async () => respond('registry_health', logger, async () => ({
      ...client.health(),
      usage: usage ? await usage.getStats() : undefined,
    })),
  );
}
