// Recursive PSC ownership tracing, bounded by depth and a per-trace visited set

import type { HolderKind, OwnershipLayer, OwnershipNode, OwnershipSummary } from '../types/ownership.js';
import type { Psc, RegistryReader } from '../types/registry.js';
import { tryNormalizeCompanyNumber } from '../utils/registry-links.js';

export interface TraceOptions {
  maxDepth?: number;
}

const DOMESTIC_PLACES = ['england', 'wales', 'scotland', 'northern ireland', 'companies house'];

export function holderKind(registryKind: string): HolderKind | undefined {
  if (registryKind.includes('individual')) return 'individual';
  if (registryKind.includes('corporate')) return 'corporate';
  if (registryKind.includes('legal-person')) return 'trust';
  return undefined;
}

export function jurisdictionOf(psc: Psc): string {
  const { place_registered, country_registered } = psc.identification;
  return `${place_registered} ${country_registered}`.trim();
}

/** Whether a corporate holder is registered where this registry can follow it */
export function isDomesticRegistration(psc: Psc): boolean {
  const reg = psc.identification.registration_number;
  if (!reg) return false;
  const place = psc.identification.place_registered.toLowerCase();
  const country = psc.identification.country_registered.toLowerCase();
  return DOMESTIC_PLACES.some((p) => place.includes(p))
    || country.includes('united kingdom')
    || /^\d{8}$/.test(reg.replace(/\s+/g, ''));
}

export function traceOwnership(
  client: RegistryReader,
  companyNumber: string,
  options: TraceOptions = {},
): Promise<OwnershipLayer> {
  return traceLayer(client, companyNumber, 0, options.maxDepth ?? 3, new Set());
}

async function traceLayer(
  client: RegistryReader,
  companyNumber: string,
  depth: number,
  maxDepth: number,
  visited: Set<string>,
): Promise<OwnershipLayer> {
  if (visited.has(companyNumber) || depth > maxDepth) {
    return { companyNumber, depth, untraceable: true, holders: [] };
  }
  visited.add(companyNumber);

  const pscs = await client.getPscs(companyNumber);
  const holders: OwnershipNode[] = [];

  // Sequential so the visited set decides deterministically which branch reaches a shared parent
  for (const psc of pscs?.items ?? []) {
    if (psc.ceased_on) continue;
    const kind = holderKind(psc.kind);
    if (!kind) continue;

    const node: OwnershipNode = {
      name: psc.name || 'Unknown',
      kind,
      registryKind: psc.kind,
      naturesOfControl: psc.natures_of_control,
      depth,
      controlledCompany: companyNumber,
    };

    if (kind === 'individual') {
      node.nationality = psc.nationality;
    } else if (kind === 'corporate') {
      node.registrationNumber = psc.identification.registration_number;
      node.jurisdiction = jurisdictionOf(psc);
      const parent = isDomesticRegistration(psc)
        ? tryNormalizeCompanyNumber(psc.identification.registration_number)
        : undefined;
      node.foreign = parent === undefined;
      if (parent !== undefined) {
        node.layer = await traceLayer(client, parent, depth + 1, maxDepth, visited);
      }
    }

    holders.push(node);
  }

  return { companyNumber, depth, untraceable: false, holders };
}

export function summarizeOwnership(root: OwnershipLayer): OwnershipSummary {
  const summary: OwnershipSummary = { corporateLayers: 0, foreignEntities: [], trustCount: 0, maxDepth: 0 };

  const visit = (layer: OwnershipLayer): void => {
    for (const holder of layer.holders) {
      summary.maxDepth = Math.max(summary.maxDepth, holder.depth);
      if (holder.kind === 'trust') summary.trustCount++;
      if (holder.foreign) {
        summary.foreignEntities.push({ name: holder.name, jurisdiction: holder.jurisdiction || 'Unknown' });
      }
      if (holder.layer) {
        summary.corporateLayers++;
        visit(holder.layer);
      }
    }
  };
  visit(root);
  return summary;
}
