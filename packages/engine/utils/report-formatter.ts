// Markdown rendering of company reports

import { DIMENSION_IDS, type DimensionResult, type Rating } from '../types/evidence.js';
import type { CompanyReport } from '../types/report.js';

export const RATING_LABEL: Record<Rating, string> = {
  clean: 'Clean',
  investigate: 'Investigate',
  red_flag: 'Red flag',
};

function formatDimension(result: DimensionResult): string[] {
  const lines = [
    `## ${result.title}: ${RATING_LABEL[result.rating]}`,
    '',
    `_${result.question}_`,
    '',
    `**Summary:** ${result.summary}`,
    `**Why:** ${result.ratingLogic}`,
  ];
  if (result.error) lines.push(`**Error:** ${result.error}`);
  lines.push('');

  if (result.evidence.length > 0) {
    lines.push('### Evidence', '');
    for (const item of result.evidence) {
      const tag = item.confidence === 'inferred' ? ' (inferred)' : '';
      lines.push(`- [${item.severity}] ${item.description}${tag}`);
      if (item.disclaimer) lines.push(`  - ${item.disclaimer}`);
    }
    lines.push('');
  }

  if (result.whatToAsk.length > 0) {
    lines.push('### What to ask', '');
    for (const ask of result.whatToAsk) lines.push(`- ${ask}`);
    lines.push('');
  }

  if (result.disclaimer) lines.push(`> ${result.disclaimer}`, '');
  return lines;
}

export function formatReportMarkdown(report: CompanyReport): string {
  const { profile } = report;
  const lines = [
    `# ${profile.companyName} (${profile.companyNumber})`,
    '',
    `- **Status:** ${profile.companyStatus}`,
    `- **Type:** ${profile.companyType}`,
    `- **Incorporated:** ${profile.incorporatedOn ?? 'unknown'}`,
    `- **Registered office:** ${profile.registeredAddress || 'unknown'}`,
    `- **SIC codes:** ${profile.sicCodes.join(', ') || 'none'}`,
    '',
    '| Dimension | Rating | Summary |',
    '|-----------|--------|---------|',
  ];
  for (const id of DIMENSION_IDS) {
    const d = report.dimensions[id];
    lines.push(`| ${d.title} | ${RATING_LABEL[d.rating]} | ${d.summary} |`);
  }
  lines.push('');

  for (const id of DIMENSION_IDS) {
    lines.push(...formatDimension(report.dimensions[id]));
  }

  lines.push(`_Analyzed at ${report.metadata.analyzedAt} in ${report.metadata.elapsedSeconds.toFixed(1)}s_`);
  return lines.join('\n');
}
