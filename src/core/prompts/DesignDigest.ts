import type { DesignComponent, DesignSnapshot } from '../entities/Design.js';
import { isEmptySnapshot } from '../entities/Design.js';

export const DIGEST_MAX_CHARS = 3000;
export const DIGEST_MAX_COMPONENTS = 25;
export const DIGEST_MAX_NETS = 10;
export const NO_PROJECT_DATA = 'No project data available.';

const TRUNCATION_MARKER = '\n[digest truncated]';

export function compareReferences(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}

export function referencePrefix(reference: string): string {
  const match = /^[A-Za-z]+/.exec(reference);
  return match ? match[0].toUpperCase() : '?';
}

/**
 * Compact, size-bounded text summary of a design snapshot
 */
export function buildDesignDigest(snapshot: DesignSnapshot | undefined): string {
  if (!snapshot || isEmptySnapshot(snapshot)) {
    return NO_PROJECT_DATA;
  }

  const lines: string[] = [`Project: ${snapshot.title || 'Untitled'}`];

  if (snapshot.board) {
    const { width_mm, height_mm, copper_layers, track_count } = snapshot.board;
    lines.push(`Dimensions: ${width_mm.toFixed(1)} x ${height_mm.toFixed(1)} mm`);
    if (copper_layers !== undefined) lines.push(`Copper layers: ${copper_layers}`);
    if (track_count !== undefined) lines.push(`Tracks: ${track_count}`);
  }

  if (snapshot.sheet) {
    const paper = snapshot.sheet.paper_size ? ` (${snapshot.sheet.paper_size})` : '';
    lines.push(`Sheets: ${snapshot.sheet.sheet_count}${paper}`);
  }

  lines.push(`Components: ${snapshot.components.length}`);
  if (snapshot.components.length > 0) {
    lines.push(`By class: ${classBreakdown(snapshot.components)}`);

    const sorted = [...snapshot.components].sort((a, b) => compareReferences(a.reference, b.reference));
    for (const component of sorted.slice(0, DIGEST_MAX_COMPONENTS)) {
      lines.push(`- ${describeComponent(component)}`);
    }
    if (sorted.length > DIGEST_MAX_COMPONENTS) {
      lines.push(`- ... ${sorted.length - DIGEST_MAX_COMPONENTS} more components`);
    }
  }

  lines.push(`Nets: ${snapshot.nets.length}`);
  const named = snapshot.nets.filter((net) => net.name.trim() !== '').slice(0, DIGEST_MAX_NETS);
  if (named.length > 0) {
    lines.push(`Key nets: ${named.map((net) => net.name).join(', ')}`);
  }

  return capLength(lines.join('\n'));
}

function classBreakdown(components: readonly DesignComponent[]): string {
  const counts = new Map<string, number>();
  for (const component of components) {
    const prefix = referencePrefix(component.reference);
    counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([prefix, count]) => `${prefix} x${count}`)
    .join(', ');
}

function describeComponent(component: DesignComponent): string {
  let text = `${component.reference}: ${component.value || '?'}`;
  if (component.footprint) text += ` [${component.footprint}]`;
  if (component.layer) text += ` ${component.layer}`;
  return text;
}

function capLength(text: string): string {
  if (text.length <= DIGEST_MAX_CHARS) return text;

  let cut = DIGEST_MAX_CHARS - TRUNCATION_MARKER.length;
  // Never keep the high half of a surrogate pair.
  if (isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
  return text.slice(0, cut) + TRUNCATION_MARKER;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
