import { selectBestOffer, DEFAULT_DISTRIBUTOR_PRIORITY } from '../src/application/services/OfferSelection.js';
import {
  KeywordAlternativesIntent,
  KeywordPricingIntent,
  selectAlternativeQueries,
  selectPricingQueries,
} from '../src/application/services/PricingIntent.js';
import { PricingLedger } from '../src/application/services/PricingLedger.js';
import { PricingService } from '../src/application/services/PricingService.js';
import {
  SyntheticPricing,
  classifyComponent,
  packageMultiplier,
} from '../src/application/services/SyntheticPricing.js';
import { DesignSnapshotSchema } from '../src/core/entities/Design.js';
import type { Offer, PartAlternatives, PricingQuery, PricingResult, QuotedPart } from '../src/core/entities/Pricing.js';
import type { Config } from '../src/core/entities/Settings.js';
import { PricingProtocolError, PricingTransportError } from '../src/core/errors.js';
import type { GatewayCallOptions, IPricingGateway } from '../src/core/interfaces/IPricingGateway.js';

const fetchedAt = new Date('2026-03-01T12:00:00.000Z');

function offer(distributor_id: string, unit_price: number, stock_quantity: number): Offer {
  return { distributor_id, unit_price, currency: 'USD', stock_quantity, fetched_at: fetchedAt };
}

function query(component_ref: string, value = '10k', footprint = 'R_0603'): PricingQuery {
  return { component_ref, value, footprint };
}

const demoConfig: Config = { demo_mode: true, language: 'en', ai_mode: 'analysis', analysis_context: 'pcb' };
const liveConfig: Config = { ...demoConfig, demo_mode: false, api_key: 'test-secret' };

class FakeGateway implements IPricingGateway {
  readonly fetchOffers = jest.fn<Promise<QuotedPart[]>, [readonly PricingQuery[], GatewayCallOptions]>();
  readonly fetchAlternatives = jest.fn<Promise<PartAlternatives[]>, [readonly PricingQuery[], number, GatewayCallOptions]>();
  readonly close = jest.fn<Promise<void>, []>().mockResolvedValue(undefined);
}

describe('selectBestOffer', () => {
  it('should pick the cheapest in-stock offer', () => {
    const best = selectBestOffer([offer('A', 0.11, 0), offer('B', 0.09, 25000), offer('C', 0.1, 15000)]);
    expect(best?.distributor_id).toBe('B');
  });

  it('should skip a cheaper offer that is out of stock', () => {
    const best = selectBestOffer([offer('A', 0.05, 0), offer('B', 0.09, 25000), offer('C', 0.1, 15000)]);
    expect(best?.distributor_id).toBe('B');
  });

  it('should pick the cheapest overall when nothing is in stock', () => {
    const best = selectBestOffer([offer('A', 0.11, 0), offer('B', 0.09, 0), offer('C', 0.1, 0)]);
    expect(best?.distributor_id).toBe('B');
  });

  it('should break price ties by distributor priority', () => {
    const offers = [offer('mouser', 0.1, 10), offer('digikey', 0.1, 10)];

    expect(selectBestOffer(offers)?.distributor_id).toBe('digikey');
    expect(selectBestOffer(offers, ['mouser', 'digikey'])?.distributor_id).toBe('mouser');
  });

  it('should rank unknown distributors after the list, then by id', () => {
    const offers = [offer('zeta', 0.1, 10), offer('alpha', 0.1, 10), offer('arrow', 0.1, 10)];

    expect(selectBestOffer(offers, DEFAULT_DISTRIBUTOR_PRIORITY)?.distributor_id).toBe('arrow');
    expect(selectBestOffer(offers.slice(0, 2))?.distributor_id).toBe('alpha');
  });

  it('should return undefined without offers', () => {
    expect(selectBestOffer([])).toBeUndefined();
  });
});

describe('SyntheticPricing', () => {
  it('should give the same offers for the same seed and query', () => {
    const first = new SyntheticPricing({ seed: 7, now: () => fetchedAt }).quote(query('R1'));
    const second = new SyntheticPricing({ seed: 7, now: () => fetchedAt }).quote(query('R1'));

    expect(second).toEqual(first);
    expect(first.offers.map((o) => o.distributor_id)).toEqual(['digikey', 'mouser', 'farnell']);
    expect(first.offers.every((o) => o.fetched_at === fetchedAt)).toBe(true);
  });

  it('should vary prices with the seed', () => {
    const a = new SyntheticPricing({ seed: 1 }).quote(query('U1', 'STM32F103', 'LQFP-48'));
    const b = new SyntheticPricing({ seed: 2 }).quote(query('U1', 'STM32F103', 'LQFP-48'));

    expect(a.offers.map((o) => o.unit_price)).not.toEqual(b.offers.map((o) => o.unit_price));
  });

  it('should keep prices within 15 % of the class band times the package multiplier', () => {
    const pricing = new SyntheticPricing({ seed: 3 });
    const cases: Array<[PricingQuery, number]> = [
      [query('R1', '10k', 'R_0603'), 0.01 * 0.9],
      [query('U1', 'FPGA', 'BGA-256'), 1.5 * 2.5],
      [query('C4', '10u', 'C_1206'), 0.02 * 1.2],
    ];

    for (const [q, base] of cases) {
      for (const o of pricing.quote(q).offers) {
        expect(o.unit_price).toBeGreaterThanOrEqual(Math.round(base * 0.85 * 10000) / 10000 - 0.0001);
        expect(o.unit_price).toBeLessThanOrEqual(Math.round(base * 1.15 * 10000) / 10000 + 0.0001);
        expect(o.currency).toBe('USD');
      }
    }
  });

  it('should mark roughly one offer in eight as out of stock', () => {
    const pricing = new SyntheticPricing({ seed: 11 });
    const offers = Array.from({ length: 300 }, (_, i) => pricing.quote(query(`R${i + 1}`)).offers).flat();
    const outOfStock = offers.filter((o) => o.stock_quantity === 0).length / offers.length;

    expect(outOfStock).toBeGreaterThan(0.05);
    expect(outOfStock).toBeLessThan(0.22);
    expect(offers.every((o) => o.stock_quantity === 0 || (o.stock_quantity >= 100 && o.stock_quantity < 50000))).toBe(
      true
    );
  });

  it('should classify components by reference prefix and value', () => {
    expect(classifyComponent(query('R1'))).toBe('resistor');
    expect(classifyComponent(query('D2', 'LED red', 'LED_0805'))).toBe('led');
    expect(classifyComponent(query('D3', '1N4148', 'SOD-123'))).toBe('diode');
    expect(classifyComponent(query('LED1', 'green', '0603'))).toBe('led');
    expect(classifyComponent(query('Q1', 'BC847', 'SOT-23'))).toBe('transistor');
    expect(classifyComponent(query('XYZ1', '', ''))).toBe('other');
  });

  it('should derive a multiplier from the package', () => {
    expect(packageMultiplier('Package_TO_SOT_SMD:SOT-23')).toBe(1.1);
    expect(packageMultiplier('Package_DFN_QFN:QFN-32')).toBe(1.4);
    expect(packageMultiplier('LQFP-48_7x7mm')).toBe(1.6);
    expect(packageMultiplier('Resistor_SMD:R_0402_1005Metric')).toBe(0.8);
    expect(packageMultiplier('Package_SO:TSSOP-20')).toBe(1.2);
    expect(packageMultiplier('custom')).toBe(1.0);
  });
});

describe('SyntheticPricing alternatives', () => {
  const synthetic = new SyntheticPricing({ seed: 3 });

  it('should invent clearly marked demo parts in the price band of the component', () => {
    const { component_ref, alternatives } = synthetic.alternatives(query('R1'), 2);

    expect(component_ref).toBe('R1');
    expect(alternatives.map((part) => [part.mpn, part.manufacturer, part.description])).toEqual([
      ['DEMO-10K-001', 'Demo Components', 'Demo alternative to 10k in R_0603'],
      ['DEMO-10K-002', 'Sample Semiconductor', 'Demo alternative to 10k in R_0603'],
    ]);
    for (const part of alternatives) {
      expect(part.currency).toBe('USD');
      expect(part.unit_price).toBeGreaterThanOrEqual(0.0076);
      expect(part.unit_price).toBeLessThanOrEqual(0.0104);
    }
  });

  it('should give the same parts for the same seed and query', () => {
    expect(new SyntheticPricing({ seed: 3 }).alternatives(query('U2', 'LM358', 'SOIC-8'), 3)).toEqual(
      synthetic.alternatives(query('U2', 'LM358', 'SOIC-8'), 3)
    );
  });

  it('should cap the number of invented parts', () => {
    expect(synthetic.alternatives(query('C1', '100n', 'C_0402'), 9).alternatives).toHaveLength(5);
  });
});

describe('KeywordPricingIntent', () => {
  const intent = new KeywordPricingIntent();

  it('should detect pricing questions', () => {
    expect(intent.detect('How much does this cost?')).toBe(true);
    expect(intent.detect('What is the BOM price?')).toBe(true);
    expect(intent.detect('Is U1 in stock?')).toBe(true);
  });

  it('should ignore other questions', () => {
    expect(intent.detect('What do you think of this design?')).toBe(false);
  });

  it('should accept a custom keyword list', () => {
    expect(new KeywordPricingIntent(['prijs']).detect('Wat is de prijs van R1?')).toBe(true);
  });
});

describe('KeywordAlternativesIntent', () => {
  const intent = new KeywordAlternativesIntent();

  it('should detect requests for replacement parts', () => {
    expect(intent.detect('Can you suggest a replacement for U1?')).toBe(true);
    expect(intent.detect('Is there a cheaper equivalent of R4?')).toBe(true);
  });

  it('should ignore plain pricing questions', () => {
    expect(intent.detect('Is U1 in stock?')).toBe(false);
  });
});

describe('selectAlternativeQueries', () => {
  const design = DesignSnapshotSchema.parse({
    components: [
      { reference: 'R1', value: '10k', footprint: 'R_0603' },
      { reference: 'R2', value: '4k7', footprint: 'R_0603' },
      { reference: 'R3', value: '1k', footprint: 'R_0603' },
      { reference: 'U1', value: 'LM358', footprint: 'SOIC-8' },
    ],
  });

  it('should only take the components the user names', () => {
    expect(selectAlternativeQueries('Find a substitute for U1 and R2', design)).toEqual([
      { component_ref: 'U1', value: 'LM358', footprint: 'SOIC-8' },
      { component_ref: 'R2', value: '4k7', footprint: 'R_0603' },
    ]);
    expect(selectAlternativeQueries('Suggest cheaper parts', design)).toEqual([]);
  });

  it('should take at most three components', () => {
    expect(selectAlternativeQueries('Replace R1, R2, R3 and U1', design).map((q) => q.component_ref)).toEqual([
      'R1',
      'R2',
      'R3',
    ]);
  });
});

describe('selectPricingQueries', () => {
  const design = DesignSnapshotSchema.parse({
    components: Array.from({ length: 10 }, (_, i) => ({ reference: `R${10 - i}`, value: '1k', footprint: 'R_0603' })).concat([
      { reference: 'U1', value: 'ATmega328P', footprint: 'TQFP-32' },
    ]),
  });

  it('should price the components the user names, in mention order', () => {
    expect(selectPricingQueries('Compare the cost of U1 and r2 (and R99)', design)).toEqual([
      { component_ref: 'U1', value: 'ATmega328P', footprint: 'TQFP-32' },
      { component_ref: 'R2', value: '1k', footprint: 'R_0603' },
    ]);
  });

  it('should fall back to the first eight components by reference', () => {
    expect(selectPricingQueries('What does this board cost?', design).map((q) => q.component_ref)).toEqual([
      'R1',
      'R2',
      'R3',
      'R4',
      'R5',
      'R6',
      'R7',
      'R8',
    ]);
  });

  it('should return nothing without design data', () => {
    expect(selectPricingQueries('price of R1?', undefined)).toEqual([]);
  });
});

describe('PricingLedger', () => {
  function result(ref: string, price: number): PricingResult {
    return { component_ref: ref, offers: [offer('digikey', price, 1)], source: 'live' };
  }

  it('should keep the newer result when an older overlapping request lands late', () => {
    const ledger = new PricingLedger();
    const first = ledger.begin(['R1', 'R2']);
    const second = ledger.begin(['R1', 'R3']);

    expect(second.generation).toBeGreaterThan(first.generation);
    expect(first.signal.aborted).toBe(false);

    expect(ledger.accept(second.generation, [result('R1', 2), result('R3', 2)]).map((r) => r.component_ref)).toEqual([
      'R1',
      'R3',
    ]);
    expect(ledger.accept(first.generation, [result('R1', 1), result('R2', 1)]).map((r) => r.component_ref)).toEqual([
      'R2',
    ]);

    const prices = ledger.resultsFor(['R1', 'R2', 'R3']).map((r) => [r.component_ref, r.offers[0].unit_price]);
    expect(prices).toEqual([
      ['R1', 2],
      ['R2', 1],
      ['R3', 2],
    ]);
  });

  it('should abort a request once all of its components are requested again', () => {
    const ledger = new PricingLedger();
    const first = ledger.begin(['R1']);
    ledger.begin(['R1', 'R2']);

    expect(first.signal.aborted).toBe(true);
    expect(ledger.pendingCount).toBe(1);
    expect(ledger.accept(first.generation, [result('R1', 1)])).toEqual([]);
  });

  it('should abort everything on clear', () => {
    const ledger = new PricingLedger();
    const pending = ledger.begin(['R1']);

    ledger.clear();
    expect(pending.signal.aborted).toBe(true);
    expect(ledger.resultsFor(['R1'])).toEqual([]);
  });
});

describe('PricingService', () => {
  const synthetic = new SyntheticPricing({ seed: 5, now: () => fetchedAt });
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should not touch the gateway in demo mode', async () => {
    const gateway = new FakeGateway();
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.quote([query('R1'), query('R2')], demoConfig);

    expect(gateway.fetchOffers).not.toHaveBeenCalled();
    expect(results.map((r) => [r.component_ref, r.source])).toEqual([
      ['R1', 'demo'],
      ['R2', 'demo'],
    ]);
    expect(results[0].offers).toEqual(synthetic.quote(query('R1')).offers);
    expect(results[0].best_offer).toEqual(selectBestOffer(results[0].offers));
  });

  it('should not touch the gateway without a credential', async () => {
    const gateway = new FakeGateway();
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.quote([query('R1')], { ...demoConfig, demo_mode: false });

    expect(gateway.fetchOffers).not.toHaveBeenCalled();
    expect(results[0].source).toBe('demo');
  });

  it('should use live offers and fill unanswered components with demo data', async () => {
    const gateway = new FakeGateway();
    gateway.fetchOffers.mockResolvedValue([
      { component_ref: 'R1', offers: [offer('mouser', 0.02, 0), offer('digikey', 0.03, 500)] },
    ]);
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.quote([query('R1'), query('R2'), query('R1')], liveConfig);

    expect(gateway.fetchOffers).toHaveBeenCalledTimes(1);
    expect(gateway.fetchOffers.mock.calls[0][0]).toEqual([query('R1'), query('R2')]);
    expect(gateway.fetchOffers.mock.calls[0][1].apiKey).toBe('test-secret');
    expect(results[0]).toMatchObject({ component_ref: 'R1', source: 'live' });
    expect(results[0].best_offer?.distributor_id).toBe('digikey');
    expect(results[1]).toMatchObject({ component_ref: 'R2', source: 'demo' });
  });

  it('should retry once on a transport failure', async () => {
    const gateway = new FakeGateway();
    gateway.fetchOffers
      .mockRejectedValueOnce(new PricingTransportError('connection closed'))
      .mockResolvedValueOnce([{ component_ref: 'R1', offers: [offer('mouser', 0.02, 10)] }]);
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.quote([query('R1')], liveConfig);

    expect(gateway.fetchOffers).toHaveBeenCalledTimes(2);
    expect(results[0].source).toBe('live');
  });

  it('should degrade to demo data on a protocol error without retrying', async () => {
    const gateway = new FakeGateway();
    gateway.fetchOffers.mockRejectedValue(new PricingProtocolError('unauthorized'));
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.quote([query('R1')], liveConfig);

    expect(gateway.fetchOffers).toHaveBeenCalledTimes(1);
    expect(results).toEqual([
      {
        component_ref: 'R1',
        offers: synthetic.quote(query('R1')).offers,
        best_offer: selectBestOffer(synthetic.quote(query('R1')).offers),
        source: 'demo',
      },
    ]);
    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toMatchObject({
      component: 'pricing',
      event: 'pricing_degraded_to_demo',
      error: 'unauthorized',
      severity: 'MEDIUM',
    });
  });

  it('should degrade to demo data when the pricing server never answers', async () => {
    const gateway = new FakeGateway();
    gateway.fetchOffers.mockImplementation(() => new Promise<QuotedPart[]>(() => undefined));
    const service = new PricingService(gateway, { timeoutMs: 30, synthetic });

    const results = await service.quote([query('R1')], liveConfig);

    expect(gateway.fetchOffers).toHaveBeenCalledTimes(2);
    expect(results[0].source).toBe('demo');
    expect(JSON.parse(String(errorSpy.mock.calls[0][0])).error).toBe('Pricing call timed out after 30ms');
  });

  it('should split large batches into calls the protocol accepts', async () => {
    const gateway = new FakeGateway();
    gateway.fetchOffers.mockImplementation(async (batch) =>
      batch.map((q) => ({ component_ref: q.component_ref, offers: [offer('mouser', 0.02, 10)] }))
    );
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });
    const queries = Array.from({ length: 120 }, (_, i) => query(`R${i + 1}`));

    const results = await service.quote(queries, liveConfig);

    expect(gateway.fetchOffers.mock.calls.map(([batch]) => batch.length)).toEqual([50, 50, 20]);
    expect(gateway.fetchOffers.mock.calls[1][0][0].component_ref).toBe('R51');
    expect(results).toHaveLength(120);
    expect(results.every((result) => result.source === 'live')).toBe(true);
  });

  it('should keep the batches that answered when another batch fails', async () => {
    const gateway = new FakeGateway();
    gateway.fetchOffers.mockImplementation(async (batch) => {
      if (batch[0].component_ref === 'R51') {
        throw new PricingProtocolError('upstream returned HTTP 502');
      }
      return batch.map((q) => ({ component_ref: q.component_ref, offers: [offer('mouser', 0.02, 10)] }));
    });
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });
    const queries = Array.from({ length: 60 }, (_, i) => query(`R${i + 1}`));

    const results = await service.quote(queries, liveConfig);

    expect(gateway.fetchOffers).toHaveBeenCalledTimes(2);
    expect(results.filter((result) => result.source === 'demo').map((result) => result.component_ref)).toEqual(
      Array.from({ length: 10 }, (_, i) => `R${i + 51}`)
    );
    expect(results.filter((result) => result.source === 'live')).toHaveLength(50);
    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toMatchObject({
      component: 'pricing',
      event: 'pricing_partially_degraded',
      error: 'upstream returned HTTP 502',
      components: 60,
      severity: 'MEDIUM',
    });
  });

  it('should suggest demo alternatives in demo mode', async () => {
    const gateway = new FakeGateway();
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.alternatives([query('R1'), query('R1')], demoConfig, 2);

    expect(gateway.fetchAlternatives).not.toHaveBeenCalled();
    expect(results).toEqual([{ ...synthetic.alternatives(query('R1'), 2), source: 'demo' }]);
  });

  it('should use live alternatives and fill unanswered components with demo parts', async () => {
    const gateway = new FakeGateway();
    gateway.fetchAlternatives.mockResolvedValue([
      {
        component_ref: 'U1',
        alternatives: [
          { mpn: 'LM2904DR', manufacturer: 'Texas Instruments', description: 'Dual op amp' },
          { mpn: 'LM358DT', manufacturer: 'STMicroelectronics', description: 'Dual op amp' },
        ],
      },
    ]);
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.alternatives([query('U1', 'LM358', 'SOIC-8'), query('R1')], liveConfig, 1);

    expect(gateway.fetchAlternatives.mock.calls[0][1]).toBe(1);
    expect(gateway.fetchAlternatives.mock.calls[0][2].apiKey).toBe('test-secret');
    expect(results).toEqual([
      {
        component_ref: 'U1',
        alternatives: [{ mpn: 'LM2904DR', manufacturer: 'Texas Instruments', description: 'Dual op amp' }],
        source: 'live',
      },
      { ...synthetic.alternatives(query('R1'), 1), source: 'demo' },
    ]);
  });

  it('should fall back to demo alternatives when the search fails', async () => {
    const gateway = new FakeGateway();
    gateway.fetchAlternatives.mockRejectedValue(new PricingProtocolError('unauthorized'));
    const service = new PricingService(gateway, { timeoutMs: 100, synthetic });

    const results = await service.alternatives([query('R1')], liveConfig);

    expect(gateway.fetchAlternatives).toHaveBeenCalledTimes(1);
    expect(results.map((result) => [result.component_ref, result.source, result.alternatives.length])).toEqual([
      ['R1', 'demo', 3],
    ]);
    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toMatchObject({
      component: 'pricing',
      event: 'alternatives_degraded_to_demo',
      error: 'unauthorized',
      severity: 'MEDIUM',
    });
  });

  it('should drop late results of a superseded request', async () => {
    const pending: Array<(parts: QuotedPart[]) => void> = [];
    const gateway = new FakeGateway();
    gateway.fetchOffers.mockImplementation(() => new Promise<QuotedPart[]>((resolve) => pending.push(resolve)));
    const service = new PricingService(gateway, { timeoutMs: 1000, synthetic });
    const ledger = new PricingLedger();

    const first = service.request([query('R1'), query('R2')], liveConfig, ledger);
    const second = service.request([query('R1'), query('R3')], liveConfig, ledger);
    await new Promise((resolve) => setImmediate(resolve));
    expect(pending).toHaveLength(2);

    pending[1]([
      { component_ref: 'R1', offers: [offer('mouser', 0.2, 10)] },
      { component_ref: 'R3', offers: [offer('mouser', 0.3, 10)] },
    ]);
    expect((await second.result).map((r) => r.component_ref)).toEqual(['R1', 'R3']);

    pending[0]([
      { component_ref: 'R1', offers: [offer('digikey', 0.1, 10)] },
      { component_ref: 'R2', offers: [offer('digikey', 0.15, 10)] },
    ]);
    expect((await first.result).map((r) => r.component_ref)).toEqual(['R2']);

    expect(ledger.resultsFor(['R1'])[0].best_offer?.unit_price).toBe(0.2);
  });
});
