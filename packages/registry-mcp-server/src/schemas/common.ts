import { z } from 'zod';
import { DIMENSION_IDS } from '@registry-lens/engine';

export const CompanyNumberSchema = z.object({
  company_number: z.string().min(1).describe('Companies House company number (e.g., 00000001, SC123456)'),
});

export const AnalyzeCompanySchema = CompanyNumberSchema.extend({
  format: z.enum(['markdown', 'json']).default('markdown').describe('Report rendering'),
});

export const AnalyzeDimensionSchema = CompanyNumberSchema.extend({
  dimension: z.enum(DIMENSION_IDS).describe('Which of the six dimensions to run'),
});

export const TraceOwnershipSchema = CompanyNumberSchema.extend({
  max_depth: z.coerce.number().int().min(0).max(5).default(3).describe('How many corporate layers to follow'),
});

export const HealthSchema = z.object({});
