// Ownership Clarity: PSC statements, traced ownership chain, orbit clutter and PSC churn

import type { EvidenceItem } from '../types/evidence.js';
import type { OwnershipSummary } from '../types/ownership.js';
import { PROBLEMATIC_PSC_STATEMENTS } from '../config/reference-data.js';
import { traceOwnership, summarizeOwnership, jurisdictionOf, holderKind } from '../ownership/ownership-tracer.js';
import { surveyOrbit } from '../ownership/orbit.js';
import { daysBetween, parseDate } from '../utils/dates.js';
import { companyLink } from '../utils/registry-links.js';
import { BaseAnalyzer, currentDirectors, type AnalyzerContext, type Observation } from './base-analyzer.js';
import type { CascadeFallback, RatingRule } from './cascade.js';

type Evidence = EvidenceItem<'ownership_clarity'>;

export const ORBIT_CLUTTER_THRESHOLD = 5;
export const PSC_CHURN_DAYS = 730;

export interface OwnershipFacts {
  problematicStatements: string[];
  clutter: number;
  ownership: OwnershipSummary;
  recentlyCeased: number;
  activePscCount: number;
  individualNames: string[];
}

export const OWNERSHIP_RULES: readonly RatingRule<OwnershipFacts>[] = [
  {
    id: 'problematic_statement',
    rating: 'red_flag',
    when: (f) => f.problematicStatements.length > 0,
    logic: () => 'PSC statement indicates unidentified controller',
    summary: () => 'Company has unidentified person(s) with significant control',
  },
  {
    id: 'orbit_clutter',
    rating: 'investigate',
    when: (f) => f.clutter >= ORBIT_CLUTTER_THRESHOLD,
    logic: (f) => `${f.clutter} dormant/dissolved entities in orbit`,
    summary: (f) => `${f.clutter} dormant/dissolved entities connected to this company`,
  },
  {
    id: 'foreign_entity',
    rating: 'investigate',
    when: (f) => f.ownership.foreignEntities.length > 0,
    logic: (f) => `Foreign entity in ownership chain: ${f.ownership.foreignEntities.slice(0, 2).map((e) => e.name).join(', ')}`,
    summary: (f) => `Foreign entity in ownership: ${f.ownership.foreignEntities[0].name}`,
  },
  {
    id: 'trust',
    rating: 'investigate',
    when: (f) => f.ownership.trustCount > 0,
    logic: () => 'Trust/legal person in ownership chain',
    summary: () => 'Trust or legal person in ownership structure',
  },
  {
    id: 'layered_structure',
    rating: 'investigate',
    when: (f) => f.ownership.corporateLayers >= 3,
    logic: (f) => `${f.ownership.corporateLayers}+ corporate layers in ownership`,
    summary: (f) => `Complex ${f.ownership.corporateLayers + 1}-layer ownership structure`,
  },
  {
    id: 'psc_churn',
    rating: 'investigate',
    when: (f) => f.recentlyCeased >= 2,
    logic: (f) => `${f.recentlyCeased} PSC changes in last 2 years`,
    summary: (f) => `Ownership changed ${f.recentlyCeased} times in 2 years`,
  },
];

const FALLBACK: CascadeFallback<OwnershipFacts> = {
  logic: (f) => {
    if (f.activePscCount === 0) return 'No PSC data available';
    return f.individualNames.length > 0 ? 'Direct individual UK ownership' : 'Ownership structure traceable';
  },
  summary: (f) => {
    if (f.activePscCount === 0) return 'No PSC information on record';
    return f.individualNames.length > 0
      ? `Clear ownership: ${f.individualNames.slice(0, 2).join(', ')}`
      : 'Ownership structure is traceable';
  },
};

const describeControl = (natures: readonly string[]) =>
  natures.slice(0, 2).map((n) => n.replace(/-/g, ' ')).join(', ');

export class OwnershipClarityAnalyzer extends BaseAnalyzer<'ownership_clarity', OwnershipFacts> {
  readonly descriptor = {
    dimension: 'ownership_clarity',
    title: 'Ownership Clarity',
    question: 'Is it clear who controls this company and why?',
    disclaimer: 'Asset location (IP, property, contracts) cannot be determined from Companies House',
    interpretation: {
      whyMatters: [
        'Complex structures may exist for tax or liability reasons worth understanding',
        'Foreign entities require additional verification steps',
      ],
      innocentExplanations: [
        'Legitimate holding structure for group operations',
        'Legacy cleanup in progress',
      ],
      whatWeChecked: ['PSC records, ownership chain tracing, corporate layers'],
    },
  } as const;

  protected readonly rules = OWNERSHIP_RULES;
  protected readonly fallback = FALLBACK;

  protected async observe(ctx: AnalyzerContext): Promise<Observation<'ownership_clarity', OwnershipFacts>> {
    const [officers, pscList, statements] = await Promise.all([
      ctx.client.getOfficers(ctx.companyNumber),
      ctx.client.getPscs(ctx.companyNumber),
      ctx.client.getPscStatements(ctx.companyNumber),
    ]);
    const directors = currentDirectors(officers?.items ?? []);
    const pscs = pscList?.items ?? [];
    const active = pscs.filter((p) => !p.ceased_on);
    const evidence: Evidence[] = [];

    const problematicStatements = (statements?.items ?? [])
      .filter((s) => !s.ceased_on && PROBLEMATIC_PSC_STATEMENTS.includes(s.statement))
      .map((s) => s.statement);
    for (const statement of problematicStatements) {
      evidence.push({
        confidence: 'verified',
        severity: 'high',
        type: 'psc_statement',
        description: `PSC statement filed: '${statement.replace(/-/g, ' ')}'`,
        details: { statement },
        source: ['psc-statements'],
      });
    }

    const [layer, orbit] = await Promise.all([
      traceOwnership(ctx.client, ctx.companyNumber),
      surveyOrbit(ctx.client, ctx.companyNumber, directors),
    ]);
    const ownership = summarizeOwnership(layer);

    evidence.push({
      confidence: 'verified',
      severity: 'none',
      type: 'orbit_summary',
      description: `Orbit includes ${orbit.discovered} connected companies (${orbit.active} active, ${orbit.dormant} dormant, ${orbit.dissolved} dissolved)`,
      details: {
        total: orbit.discovered,
        sampled: orbit.sampled.length,
        active: orbit.active,
        dormant: orbit.dormant,
        dissolved: orbit.dissolved,
      },
      source: ['psc', 'appointments', 'company-profile'],
    });

    const clutter = orbit.dormant + orbit.dissolved;
    if (clutter >= ORBIT_CLUTTER_THRESHOLD) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'orbit_clutter',
        description: `${clutter} dormant/dissolved entities in orbit — may indicate complexity or legacy cleanup needed`,
        details: { dormant: orbit.dormant, dissolved: orbit.dissolved },
        source: ['psc', 'appointments', 'company-profile'],
      });
    }

    for (const psc of active) {
      const control = describeControl(psc.natures_of_control);
      switch (holderKind(psc.kind)) {
        case 'individual':
          evidence.push({
            confidence: 'verified',
            severity: 'none',
            type: 'individual_psc',
            description: `${psc.name} (${psc.nationality ?? 'Unknown nationality'}) — ${control}`,
            details: { name: psc.name, nationality: psc.nationality, control: psc.natures_of_control },
            source: ['psc'],
          });
          break;
        case 'corporate': {
          const jurisdiction = jurisdictionOf(psc);
          const reg = psc.identification.registration_number ?? '';
          evidence.push({
            confidence: 'verified',
            severity: jurisdiction && !jurisdiction.toLowerCase().includes('england') ? 'medium' : 'low',
            type: 'corporate_psc',
            description: `${psc.name} (${jurisdiction || 'UK'}${reg ? `, ${reg}` : ''}) — ${control}`,
            details: {
              name: psc.name,
              registration_number: reg,
              jurisdiction,
              control: psc.natures_of_control,
            },
            source: ['psc'],
            link: /^\d+$/.test(reg) ? companyLink(reg) : undefined,
          });
          break;
        }
        case 'trust':
          evidence.push({
            confidence: 'verified',
            severity: 'medium',
            type: 'trust_psc',
            description: `${psc.name} (trust/legal person) — ${control}`,
            details: { name: psc.name, control: psc.natures_of_control },
            source: ['psc'],
          });
          break;
        default:
          break;
      }
    }

    if (ownership.corporateLayers > 0) {
      evidence.push({
        confidence: 'verified',
        severity: ownership.corporateLayers === 1 ? 'low' : 'medium',
        type: 'ownership_depth',
        description: `${ownership.corporateLayers + 1}-layer ownership structure (including target)`,
        details: {
          corporate_layers: ownership.corporateLayers,
          foreign_count: ownership.foreignEntities.length,
          trust_count: ownership.trustCount,
        },
        source: ['psc'],
      });
    }

    const recentlyCeased = pscs.filter((p) => {
      const ceased = parseDate(p.ceased_on);
      if (!ceased) return false;
      const age = daysBetween(ceased, ctx.now);
      return age >= 0 && age < PSC_CHURN_DAYS;
    }).length;
    if (recentlyCeased >= 2) {
      evidence.push({
        confidence: 'verified',
        severity: 'medium',
        type: 'psc_churn',
        description: `${recentlyCeased} PSC changes in last 2 years`,
        details: { count: recentlyCeased },
        source: ['psc'],
      });
    }

    return {
      status: 'observed',
      facts: {
        problematicStatements,
        clutter,
        ownership,
        recentlyCeased,
        activePscCount: active.length,
        individualNames: active.filter((p) => holderKind(p.kind) === 'individual').map((p) => p.name || '?'),
      },
      evidence,
    };
  }

  protected followUps(facts: OwnershipFacts): string[] {
    const asks = facts.ownership.foreignEntities.map((e) => `Who is the ultimate beneficial owner of ${e.name}?`);
    if (facts.ownership.trustCount > 0) asks.push('Can we see the trust deed?');
    if (facts.ownership.corporateLayers > 0) {
      asks.push('Why is ownership structured through holding companies rather than directly?');
    }
    if (facts.recentlyCeased >= 2) asks.push('What prompted the recent ownership changes?');
    if (facts.clutter >= ORBIT_CLUTTER_THRESHOLD) {
      asks.push('Are there plans to clean up dormant/dissolved entities in the group?');
    }
    return asks;
  }
}
