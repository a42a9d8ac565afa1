import { afterEach, describe, expect, it, vi } from 'vitest';
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import {
  MarketPriceTool,
  calculateStatistics,
  cleanRecord,
  parsePrice,
  summarizeMarket,
  type MarketPriceOptions
} from '../tools/marketPrice.js';

function response(data: unknown, status = 200): AxiosResponse<unknown> {
  return { data, status, statusText: status === 200 ? 'OK' : 'Error', headers: {}, config: { headers: new AxiosHeaders() } };
}

const onionRecords = [
  {
    commodity: 'Onion',
    state: 'Maharashtra',
    district: 'Nashik',
    market: 'Lasalgaon',
    variety: 'Red',
    arrival_date: '15/01/2026',
    min_price: '1800',
    max_price: '2400',
    modal_price: '2100'
  },
  {
    commodity: 'Onion',
    state: 'Maharashtra',
    district: 'Nashik',
    market: 'Pimpalgaon',
    variety: 'Red',
    arrival_date: '15/01/2026',
    min_price: '1600',
    max_price: '2200',
    modal_price: '1900'
  }
];

function marketTool(overrides: Partial<MarketPriceOptions> = {}) {
  return new MarketPriceTool({
    apiUrl: 'https://prices.test/resource',
    apiKey: 'test-secret',
    timeoutMs: 1000,
    maxRetries: 0,
    ...overrides
  });
}

describe('market record helpers', () => {
  it('parses numeric prices and rejects blanks', () => {
    expect(parsePrice('2100')).toBe(2100);
    expect(parsePrice(1950.5)).toBe(1950.5);
    expect(parsePrice('')).toBeNull();
    expect(parsePrice('NR')).toBeNull();
    expect(parsePrice(undefined)).toBeNull();
  });

  it('fills missing fields with placeholders', () => {
    expect(cleanRecord({ commodity: ' Tomato ', modal_price: '900' })).toEqual({
      commodity: 'Tomato',
      state: 'Unknown',
      district: 'Unknown',
      market: 'Unknown',
      minPrice: null,
      maxPrice: null,
      modalPrice: 900,
      priceDate: 'Unknown',
      arrivalDate: 'Unknown',
      variety: 'Not specified',
      grade: 'Not specified'
    });
  });

  it('computes statistics over the prices that are present', () => {
    const stats = calculateStatistics([
      cleanRecord({ market: 'A', state: 'Punjab', modal_price: '100', min_price: '90' }),
      cleanRecord({ market: 'B', state: 'Punjab', modal_price: '201' }),
      cleanRecord({ market: 'B', state: 'Haryana' })
    ]);

    expect(stats).toEqual({
      totalRecords: 3,
      uniqueMarkets: 2,
      uniqueStates: 2,
      uniqueDistricts: 1,
      avgModalPrice: 150.5,
      minModalPrice: 100,
      maxModalPrice: 201,
      avgMinPrice: 90
    });
    expect(calculateStatistics([])).toBeNull();
  });

  it('keeps the price clause when the average modal price is zero', () => {
    const records = [cleanRecord({ market: 'Kolar', state: 'Karnataka', modal_price: '0' })];

    expect(summarizeMarket(records, calculateStatistics(records), { commodity: 'Tomato' })).toBe(
      'Found 1 market record(s) for Tomato with average modal price of ₹0/quintal (range: ₹0 - ₹0) across 1 market(s).'
    );
  });
});

describe('MarketPriceTool', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('queries the price API with filters and summarizes the records', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValueOnce(response({ records: onionRecords }));

    const result = await marketTool().getCommodityPrice({ commodity: 'Onion', state: 'Maharashtra' });

    expect(get).toHaveBeenCalledWith(
      'https://prices.test/resource',
      expect.objectContaining({
        params: {
          'api-key': 'test-secret',
          format: 'json',
          limit: 10,
          offset: 0,
          'filters[commodity]': 'Onion',
          'filters[state]': 'Maharashtra'
        }
      })
    );
    expect(result.success).toBe(true);
    expect(result.message).toBe(
      'Found 2 market record(s) for Onion with average modal price of ₹2000/quintal (range: ₹1900 - ₹2100) across 2 market(s) in Maharashtra.'
    );
    if (!result.success) {
      throw new Error('expected a successful lookup');
    }
    expect(result.data.metadata).toMatchObject({
      queryParams: { commodity: 'Onion', state: 'Maharashtra', district: null, market: null, limit: 10 },
      recordCount: 2
    });
    expect(result.data.records[0]).toMatchObject({ market: 'Lasalgaon', modalPrice: 2100, arrivalDate: '15/01/2026' });
  });

  it('clamps the record limit to 100', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValueOnce(response({ records: [] }));

    await marketTool().getCommodityPrice({ limit: 500 });

    expect(get.mock.calls[0][1]).toMatchObject({ params: { limit: 100 } });
  });

  it('explains how to broaden an empty search', async () => {
    vi.spyOn(axios, 'get').mockResolvedValueOnce(response({ records: [] }));

    const result = await marketTool().getCommodityPrice({ commodity: 'Saffron', state: 'Kerala' });

    expect(result).toMatchObject({ success: true, data: { records: [], metadata: { statistics: null } } });
    expect(result.message).toBe(
      "No market data found for commodity 'Saffron' and state 'Kerala'. Try broadening your search or checking the spelling."
    );
  });

  it('reports HTTP failures as a failed result instead of throwing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new AxiosError(
      'Request failed with status code 500',
      'ERR_BAD_RESPONSE',
      undefined,
      undefined,
      response({}, 500)
    );
    vi.spyOn(axios, 'get').mockRejectedValueOnce(failure);

    const result = await marketTool().getCommodityPrice({ commodity: 'Onion' });

    expect(result).toEqual({
      success: false,
      data: null,
      error: 'API responded with status 500',
      message: 'Failed to fetch market data from API. Please check your internet connection or try again later.'
    });
  });

  it('reports a missing API key without calling the API', async () => {
    const get = vi.spyOn(axios, 'get').mockRejectedValue(new Error('unexpected request'));

    const result = await marketTool({ apiKey: undefined }).getCommodityPrice({ commodity: 'Onion' });

    expect(result).toMatchObject({ success: false, error: 'DATA_GOV_IN_API_KEY is not configured' });
    expect(get).not.toHaveBeenCalled();
  });
});
