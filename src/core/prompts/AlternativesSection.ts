import type { AlternativePart, AlternativesResult } from '../entities/Pricing.js';

export const ALTERNATIVES_LABEL = '=== ALTERNATIVE PARTS ===';

export const DEMO_ALTERNATIVES_DISCLOSURE =
  'Entries tagged DEMO are invented placeholder parts, not real products. Whenever you mention them, tell the ' +
  'user plainly that they are demo suggestions and that a real replacement must be checked with a distributor.';
export const LIVE_ALTERNATIVES_NOTICE =
  'Entries tagged LIVE are similar parts found by distributor search. Check pinout, ratings and package ' +
  'before recommending one as a drop-in replacement.';

/**
 * Replacement candidates per component, tagged by provenance
 */
export function formatAlternativesSection(results: readonly AlternativesResult[]): string {
  const lines = [ALTERNATIVES_LABEL];

  for (const result of results) {
    const tag = result.source === 'live' ? 'LIVE' : 'DEMO';
    if (result.alternatives.length === 0) {
      lines.push(`${result.component_ref} [${tag}]: no similar parts found`);
      continue;
    }
    lines.push(`${result.component_ref} [${tag}]:`);
    for (const part of result.alternatives) {
      lines.push(`  - ${describePart(part)}`);
    }
  }

  if (results.some((result) => result.source === 'live')) lines.push(LIVE_ALTERNATIVES_NOTICE);
  if (results.some((result) => result.source === 'demo')) lines.push(DEMO_ALTERNATIVES_DISCLOSURE);

  return lines.join('\n');
}

function describePart(part: AlternativePart): string {
  const facts = [
    part.unit_price !== undefined && part.currency ? `~${part.unit_price.toFixed(4)} ${part.currency}` : undefined,
    part.stock_quantity !== undefined ? `stock ${part.stock_quantity}` : undefined,
  ].filter((fact): fact is string => fact !== undefined);

  const summary = `${part.mpn} (${part.manufacturer})${facts.length > 0 ? `, ${facts.join(', ')}` : ''}`;
  return part.description ? `${summary}: ${part.description}` : summary;
}
