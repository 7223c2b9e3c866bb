import type { AnalysisContext } from '../entities/Settings.js';

type Purpose = 'chat' | 'review';

const PERSONAS: { readonly [C in AnalysisContext]: { readonly [P in Purpose]: string } } = {
  pcb: {
    chat:
      'You are a helpful PCB design assistant with access to the current PCB design. ' +
      'When the user asks about a specific component (for example R1 or U3), find it in the design data ' +
      'and answer with its actual value, footprint and designator.',
    review:
      'You are an expert PCB design engineer. Analyze the provided PCB data thoroughly and give specific, ' +
      'practical advice. Look at individual components, their values, placement and relationships.',
  },
  schematic: {
    chat:
      'You are a helpful schematic design assistant with access to the current schematic. ' +
      'Reference the actual component values, connections and circuit topology in your answers.',
    review:
      'You are an expert electronic circuit designer and schematic review specialist. Analyze the provided ' +
      'schematic data thoroughly: component types, values, connections and circuit topology.',
  },
};

export function personaFor(context: AnalysisContext, purpose: Purpose): string {
  return PERSONAS[context][purpose];
}

export function contextHeading(context: AnalysisContext): string {
  return context === 'schematic' ? 'CURRENT SCHEMATIC CONTEXT' : 'CURRENT PCB CONTEXT';
}
