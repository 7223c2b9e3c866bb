import { createTurn } from '../src/core/entities/Conversation.js';
import { DesignSnapshotSchema } from '../src/core/entities/Design.js';
import type { AlternativesResult, PricingResult } from '../src/core/entities/Pricing.js';
import type { ModeConfig } from '../src/core/entities/Settings.js';
import { AUTONOMY_DISCLOSURE, CONFIRMATION_CLAUSE, ModeFactory } from '../src/core/modes/index.js';
import {
  ALTERNATIVES_LABEL,
  DEMO_ALTERNATIVES_DISCLOSURE,
  LIVE_ALTERNATIVES_NOTICE,
  formatAlternativesSection,
} from '../src/core/prompts/AlternativesSection.js';
import { buildDesignDigest, DIGEST_MAX_CHARS, NO_PROJECT_DATA } from '../src/core/prompts/DesignDigest.js';
import {
  DEMO_DISCLOSURE,
  DEMO_PRICING_LABEL,
  LIVE_PRICING_LABEL,
  MIXED_PRICING_LABEL,
  formatPricingSection,
} from '../src/core/prompts/PricingSection.js';
import { compileSystemPrompt, mentionsModification } from '../src/core/prompts/PromptCompiler.js';
import { TemplateFactory } from '../src/core/templates/index.js';

const at = new Date('2026-01-01T10:00:00.000Z');
const analysis: ModeConfig = { interaction_mode: 'analysis', language: 'en', analysis_context: 'pcb' };

const design = DesignSnapshotSchema.parse({
  title: 'Demo Board',
  board: { width_mm: 100, height_mm: 80, copper_layers: 2 },
  components: [
    { reference: 'R2', value: '4k7', footprint: 'R_0603' },
    { reference: 'R10', value: '1k' },
    { reference: 'R1', value: '10k', footprint: 'R_0603', layer: 'top' },
    { reference: 'C1', value: '100n', footprint: 'C_0603' },
  ],
  nets: [
    { code: 1, name: 'GND' },
    { code: 2, name: '' },
    { code: 3, name: 'VCC' },
  ],
});

function offer(distributor_id: string, unit_price: number, stock_quantity: number) {
  return { distributor_id, unit_price, currency: 'USD', stock_quantity, fetched_at: at };
}

describe('Design digest', () => {
  it('should note missing project data', () => {
    expect(buildDesignDigest(undefined)).toBe(NO_PROJECT_DATA);
    expect(buildDesignDigest(DesignSnapshotSchema.parse({}))).toBe(NO_PROJECT_DATA);
  });

  it('should summarise counts, dimensions, components and named nets', () => {
    expect(buildDesignDigest(design)).toBe(
      [
        'Project: Demo Board',
        'Dimensions: 100.0 x 80.0 mm',
        'Copper layers: 2',
        'Components: 4',
        'By class: C x1, R x3',
        '- C1: 100n [C_0603]',
        '- R1: 10k [R_0603] top',
        '- R2: 4k7 [R_0603]',
        '- R10: 1k',
        'Nets: 3',
        'Key nets: GND, VCC',
      ].join('\n')
    );
  });

  it('should list at most 25 components', () => {
    const big = DesignSnapshotSchema.parse({
      components: Array.from({ length: 100 }, (_, i) => ({ reference: `R${i + 1}`, value: '10k' })),
    });
    const digest = buildDesignDigest(big);

    expect(digest).toContain('- R25: 10k\n- ... 75 more components');
    expect(digest).not.toContain('- R26: 10k');
  });

  it('should cap the digest length', () => {
    const digest = buildDesignDigest(DesignSnapshotSchema.parse({ title: 'x'.repeat(5000), nets: [{ code: 1, name: 'GND' }] }));

    expect(digest).toHaveLength(DIGEST_MAX_CHARS);
    expect(digest.endsWith('\n[digest truncated]')).toBe(true);
  });

  it('should not split a character outside the basic plane at the cap', () => {
    // "Project: " + 2971 x puts the first plug emoji across the cut at 2981.
    const title = 'x'.repeat(2971) + '\u{1F50C}'.repeat(10);
    const digest = buildDesignDigest(DesignSnapshotSchema.parse({ title, nets: [{ code: 1, name: 'GND' }] }));

    expect(digest).toHaveLength(2999);
    expect(digest).toBe(`Project: ${'x'.repeat(2971)}\n[digest truncated]`);
    expect(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])/.test(digest)).toBe(false);
  });
});

describe('Pricing section', () => {
  const live: PricingResult = {
    component_ref: 'R1',
    offers: [offer('digikey', 0.02, 100), offer('mouser', 0.018, 75000), offer('farnell', 0.03, 0)],
    best_offer: offer('mouser', 0.018, 75000),
    source: 'live',
  };
  const demo: PricingResult = { component_ref: 'C1', offers: [], source: 'demo' };

  it('should label live pricing', () => {
    expect(formatPricingSection([live]).split('\n').slice(0, 2)).toEqual([
      LIVE_PRICING_LABEL,
      'R1 [LIVE]: best mouser 0.0180 USD, stock 75000 (3 offers)',
    ]);
  });

  it('should label demo pricing and tell the model to disclose it', () => {
    const section = formatPricingSection([demo]);

    expect(section.split('\n')).toEqual([DEMO_PRICING_LABEL, 'C1 [DEMO]: no offers', DEMO_DISCLOSURE]);
  });

  it('should mark mixed provenance per entry', () => {
    const section = formatPricingSection([live, demo]);

    expect(section.startsWith(MIXED_PRICING_LABEL)).toBe(true);
    expect(section).toContain('C1 [DEMO]: no offers');
  });
});

describe('Alternatives section', () => {
  it('should list candidates per component and disclose demo parts', () => {
    const results: AlternativesResult[] = [
      {
        component_ref: 'U1',
        alternatives: [
          { mpn: 'LM2904DR', manufacturer: 'Texas Instruments', description: 'Dual op amp', unit_price: 0.12, currency: 'USD', stock_quantity: 5000 },
          { mpn: 'LM358DT', manufacturer: 'STMicroelectronics', description: '' },
        ],
        source: 'live',
      },
      { component_ref: 'R1', alternatives: [], source: 'demo' },
    ];

    expect(formatAlternativesSection(results)).toBe(
      [
        ALTERNATIVES_LABEL,
        'U1 [LIVE]:',
        '  - LM2904DR (Texas Instruments), ~0.1200 USD, stock 5000: Dual op amp',
        '  - LM358DT (STMicroelectronics)',
        'R1 [DEMO]: no similar parts found',
        LIVE_ALTERNATIVES_NOTICE,
        DEMO_ALTERNATIVES_DISCLOSURE,
      ].join('\n')
    );
  });
});

describe('Mode strategies', () => {
  const briefing = { modificationRequested: false, purpose: 'chat' as const };

  it('should keep numbered steps out of analysis mode', () => {
    const section = ModeFactory.getStrategy('analysis').compileSection({ ...briefing, modificationRequested: true });

    expect(section).not.toMatch(/\d+\.\s/);
    expect(section).toContain('Do not propose direct modifications');
  });

  it('should require numbered steps and a confirmation question in advisory mode', () => {
    const section = ModeFactory.getStrategy('advisory').compileSection(briefing);

    expect(section).toContain('numbered sequence of steps (1., 2., 3., ...)');
    expect(section).toContain(CONFIRMATION_CLAUSE);
  });

  it('should require the autonomy disclosure in assistant mode', () => {
    expect(ModeFactory.getStrategy('assistant').compileSection(briefing)).toContain(AUTONOMY_DISCLOSURE);
  });

  it('should return the strategy for each mode', () => {
    expect(ModeFactory.getStrategy('analysis').mode).toBe('analysis');
    expect(ModeFactory.getStrategy('advisory').getName()).toBe('Advisory Mode');
    expect(ModeFactory.getStrategy('assistant').describe()).toBe('Interactive step-by-step guidance (changes stay manual)');
  });
});

describe('compileSystemPrompt', () => {
  it('should produce a valid prompt without design data', () => {
    const prompt = compileSystemPrompt({ mode: analysis, window: [createTurn('user', 'Hi', at)] });
    const sections = prompt.split('\n\n');

    expect(sections[0]).toBe('LANGUAGE: English (en). Respond in English.');
    expect(sections).toContain('This is the start of the conversation.');
    expect(sections).toContain(`CURRENT PCB CONTEXT:\n${NO_PROJECT_DATA}`);
    expect(sections[sections.length - 1]).toBe('REMEMBER: reply in English.');
  });

  it('should be deterministic for identical input', () => {
    const input = {
      mode: analysis,
      window: [createTurn('user', 'Is the ground plane adequate?', at)],
      snapshot: design,
    };

    expect(compileSystemPrompt(input)).toBe(compileSystemPrompt({ ...input, window: [...input.window] }));
  });

  it('should declare the selected language', () => {
    const prompt = compileSystemPrompt({ mode: { ...analysis, language: 'nl' }, window: [] });

    expect(prompt.startsWith('LANGUAGE: Nederlands (nl). Antwoord altijd in het Nederlands.')).toBe(true);
    expect(prompt.endsWith('REMEMBER: reply in Nederlands.')).toBe(true);
  });

  it('should count earlier messages', () => {
    const window = [createTurn('user', 'a', at), createTurn('assistant', 'b', at), createTurn('user', 'c', at)];

    expect(compileSystemPrompt({ mode: analysis, window })).toContain(
      'The chat history holds 2 earlier messages in chronological order. Build on earlier topics when relevant.'
    );
  });

  it('should use the schematic persona and heading', () => {
    const prompt = compileSystemPrompt({
      mode: { ...analysis, analysis_context: 'schematic' },
      window: [],
      purpose: 'review',
    });

    expect(prompt).toContain('schematic review specialist');
    expect(prompt).toContain(`CURRENT SCHEMATIC CONTEXT:\n${NO_PROJECT_DATA}`);
  });

  it('should add the confirmation reminder when the user asks to modify the design', () => {
    const prompt = compileSystemPrompt({
      mode: { ...analysis, interaction_mode: 'advisory' },
      window: [createTurn('user', 'Can I remove R5?', at)],
    });

    expect(prompt).toContain('IMPORTANT: The latest request involves modifying the design. Follow the CONFIRMATION RULE.');
  });

  it('should place pricing before the closing language reminder', () => {
    const demo: PricingResult = { component_ref: 'R1', offers: [], source: 'demo' };
    const sections = compileSystemPrompt({ mode: analysis, window: [], pricing: [demo] }).split('\n\n');

    expect(sections[sections.length - 2]).toBe(formatPricingSection([demo]));
  });

  it('should leave out an empty pricing list', () => {
    expect(compileSystemPrompt({ mode: analysis, window: [], pricing: [] })).not.toContain('COMPONENT PRICING');
  });
});

describe('mentionsModification', () => {
  it('should detect edit verbs', () => {
    expect(mentionsModification('Should I move U1 closer to J1?')).toBe(true);
    expect(mentionsModification('What do you think of this design?')).toBe(false);
  });
});

describe('Prompt templates', () => {
  const history = [createTurn('user', 'a', at), createTurn('assistant', 'b', at), createTurn('user', 'c', at)];

  it('should detect chat-capable models', () => {
    expect(TemplateFactory.detectTemplateType('llama3.2:3b')).toBe('chat');
    expect(TemplateFactory.detectTemplateType('qwen2.5:7b')).toBe('chat');
    expect(TemplateFactory.detectTemplateType('gemma3:1b')).toBe('legacy');
  });

  it('should put the system prompt first in chat format', () => {
    expect(TemplateFactory.getTemplate('chat').formatPrompt(history, 'SYS')).toEqual({
      type: 'chat',
      messages: [
        { role: 'system', content: 'SYS' },
        { role: 'user', content: 'a' },
        { role: 'assistant', content: 'b' },
        { role: 'user', content: 'c' },
      ],
    });
  });

  it('should flatten history in legacy format', () => {
    expect(TemplateFactory.getTemplate('legacy').formatPrompt(history, 'SYS')).toEqual({
      type: 'generate',
      prompt: 'Recent conversation:\nUser: a\nAssistant: b\n\nUser question: c',
      system: 'SYS',
    });
  });
});
