import { describe, it, expect } from '@jest/globals';
import { createAvailRules } from '../../src/infra/config.js';
import { validateAvailRequest } from '../../src/services/availRequestValidator.js';
import { buildAvailResponse, renderAvailResponse } from '../../src/services/availResponseBuilder.js';
import { calculateSellingPrice } from '../../src/services/pricing.js';
import { NOW, destinations, validDocument } from '../helpers/availFixtures.js';

const rules = createAvailRules();

describe('calculateSellingPrice', () => {
  it('applies the markup percentage to the net price', () => {
    expect(calculateSellingPrice(132.42, 3.2)).toBeCloseTo(136.65744, 8);
  });

  it('returns the net price for a zero markup', () => {
    expect(calculateSellingPrice(200, 0)).toBe(200);
  });
});

describe('buildAvailResponse', () => {
  it('emits one priced offer per destination with sequential ids', () => {
    const req = validateAvailRequest(validDocument(), rules, NOW);
    const offers = buildAvailResponse(req, rules);

    expect(offers.map((o) => o.id)).toEqual(['A#1', 'A#2', 'A#3']);
    expect(offers[0]).toEqual({
      id: 'A#1',
      hotelCodeSupplier: '39971881',
      market: 'ES',
      price: {
        minimumSellingPrice: null,
        currency: 'USD',
        net: 132.42,
        selling_price: expect.closeTo(136.65744, 8),
        selling_currency: 'USD',
        markup: 3.2,
        exchange_rate: 1,
      },
    });
  });

  it('numbers ten destinations in order', () => {
    const req = validateAvailRequest(validDocument({ destinations: destinations(10) }), rules, NOW);
    const ids = buildAvailResponse(req, rules).map((o) => o.id);
    expect(ids[0]).toBe('A#1');
    expect(ids[9]).toBe('A#10');
  });

  it('sells in the resolved request currency and market', () => {
    const req = validateAvailRequest(validDocument({ currency: 'JPY', market: 'GB' }), rules, NOW);
    const [offer] = buildAvailResponse(req, rules);
    expect(offer.market).toBe('GB');
    expect(offer.price.selling_currency).toBe('EUR');
    expect(offer.price.currency).toBe('USD');
  });

  it('prices from the configured stub', () => {
    const custom = createAvailRules({ pricing: { netPrice: 100, markupPercentage: 10, hotelCodeSupplier: 'H-1' } });
    const req = validateAvailRequest(validDocument({ destinations: [{ code: 'PMI' }] }), custom, NOW);
    const [offer] = buildAvailResponse(req, custom);
    expect(offer.hotelCodeSupplier).toBe('H-1');
    expect(offer.price.net).toBe(100);
    expect(offer.price.markup).toBe(10);
    expect(offer.price.selling_price).toBeCloseTo(110, 10);
  });

  it('returns an empty list when there are no destinations', () => {
    const req = validateAvailRequest(validDocument({ destinations: [] }), rules, NOW);
    expect(buildAvailResponse(req, rules)).toEqual([]);
  });
});

describe('renderAvailResponse', () => {
  it('serializes with two-space indentation', () => {
    const req = validateAvailRequest(validDocument({ destinations: [{ code: 'PMI' }] }), rules, NOW);
    const lines = renderAvailResponse(buildAvailResponse(req, rules)).split('\n');
    expect(lines.slice(0, 5)).toEqual([
      '[',
      '  {',
      '    "id": "A#1",',
      '    "hotelCodeSupplier": "39971881",',
      '    "market": "ES",',
    ]);
    expect(lines[6]).toBe('      "minimumSellingPrice": null,');
  });

  it('renders an empty list as []', () => {
    expect(renderAvailResponse([])).toBe('[]');
  });
});
