import axios from 'axios';
import { z } from 'zod';
import type { ToolDefinition } from '../../../shared/types.js';
import { describeError } from '../utils/errors.js';
import { TimeoutError, withRetry } from '../utils/resilience.js';
import { toolFailure, type ToolResponse } from './types.js';

export const MARKET_TOOL_NAME = 'get_commodity_price' as const;

export const marketPriceDefinition = {
  name: MARKET_TOOL_NAME,
  description:
    'Fetches live wholesale prices from Indian agricultural mandis (data.gov.in). ' +
    'Use it for current commodity prices, price comparisons across markets or regions, ' +
    'and market availability of a crop. Returns min/max/modal prices per quintal, markets and dates. ' +
    'If the farmer has not said which crop or which state they mean, ask them before calling this tool.',
  parameters: {
    commodity: {
      type: 'string',
      description: "Commodity name in title case, e.g. 'Tomato', 'Onion', 'Wheat'. Omit for all commodities.",
      required: false
    },
    state: {
      type: 'string',
      description: "Indian state in title case, e.g. 'Karnataka', 'Punjab'. Omit to search all states.",
      required: false
    },
    district: {
      type: 'string',
      description: "District within the state, e.g. 'Pune'. Omit to search all districts.",
      required: false
    },
    market: {
      type: 'string',
      description: "Specific mandi name, e.g. 'Azadpur'. Omit to search all markets.",
      required: false
    },
    limit: {
      type: 'integer',
      description: 'Maximum records to fetch, 1-100 (default 10). Use 20-50 for comparisons.',
      required: false
    }
  }
} satisfies ToolDefinition;

export const marketPriceArgs = z
  .object({
    commodity: z.string().optional(),
    state: z.string().optional(),
    district: z.string().optional(),
    market: z.string().optional(),
    limit: z.number().int().optional()
  })
  .strict();

export type MarketPriceArgs = z.infer<typeof marketPriceArgs>;

export interface MarketRecord {
  commodity: string;
  state: string;
  district: string;
  market: string;
  minPrice: number | null;
  maxPrice: number | null;
  modalPrice: number | null;
  priceDate: string;
  arrivalDate: string;
  variety: string;
  grade: string;
}

export interface MarketStatistics {
  totalRecords: number;
  uniqueMarkets: number;
  uniqueStates: number;
  uniqueDistricts: number;
  avgModalPrice?: number;
  minModalPrice?: number;
  maxModalPrice?: number;
  avgMinPrice?: number;
  avgMaxPrice?: number;
}

export interface MarketPriceData {
  records: MarketRecord[];
  metadata: {
    queryParams: {
      commodity: string | null;
      state: string | null;
      district: string | null;
      market: string | null;
      limit: number;
    };
    recordCount: number;
    statistics: MarketStatistics | null;
  };
}

const apiResponseSchema = z
  .object({
    records: z.array(z.record(z.unknown())).optional()
  })
  .passthrough();

export interface MarketPriceOptions {
  apiUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
}

const FETCH_FAILED_MESSAGE =
  'Failed to fetch market data from API. Please check your internet connection or try again later.';

function text(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return fallback;
}

export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function cleanRecord(raw: Record<string, unknown>): MarketRecord {
  return {
    commodity: text(raw.commodity, 'Unknown'),
    state: text(raw.state, 'Unknown'),
    district: text(raw.district, 'Unknown'),
    market: text(raw.market, 'Unknown'),
    minPrice: parsePrice(raw.min_price),
    maxPrice: parsePrice(raw.max_price),
    modalPrice: parsePrice(raw.modal_price),
    priceDate: text(raw.price_date, 'Unknown'),
    arrivalDate: text(raw.arrival_date, 'Unknown'),
    variety: text(raw.variety, 'Not specified'),
    grade: text(raw.grade, 'Not specified')
  };
}

const round2 = (value: number) => Math.round(value * 100) / 100;
const average = (values: number[]) => round2(values.reduce((sum, value) => sum + value, 0) / values.length);
const present = (values: Array<number | null>) => values.filter((value): value is number => value !== null);

export function calculateStatistics(records: MarketRecord[]): MarketStatistics | null {
  if (!records.length) {
    return null;
  }

  const stats: MarketStatistics = {
    totalRecords: records.length,
    uniqueMarkets: new Set(records.map((record) => record.market)).size,
    uniqueStates: new Set(records.map((record) => record.state)).size,
    uniqueDistricts: new Set(records.map((record) => record.district)).size
  };

  const modal = present(records.map((record) => record.modalPrice));
  if (modal.length) {
    stats.avgModalPrice = average(modal);
    stats.minModalPrice = Math.min(...modal);
    stats.maxModalPrice = Math.max(...modal);
  }
  const minimums = present(records.map((record) => record.minPrice));
  if (minimums.length) {
    stats.avgMinPrice = average(minimums);
  }
  const maximums = present(records.map((record) => record.maxPrice));
  if (maximums.length) {
    stats.avgMaxPrice = average(maximums);
  }

  return stats;
}

export function summarizeMarket(
  records: MarketRecord[],
  stats: MarketStatistics | null,
  filters: Omit<MarketPriceArgs, 'limit'>
): string {
  if (!records.length || !stats) {
    const applied = (['commodity', 'state', 'district', 'market'] as const)
      .filter((key) => filters[key])
      .map((key) => `${key} '${filters[key]}'`);
    const filterText = applied.length ? applied.join(' and ') : 'the specified criteria';
    return `No market data found for ${filterText}. Try broadening your search or checking the spelling.`;
  }

  const parts = [`Found ${records.length} market record(s)`];
  if (filters.commodity) {
    parts.push(`for ${filters.commodity}`);
  }
  if (stats.avgModalPrice !== undefined) {
    parts.push(
      `with average modal price of ₹${stats.avgModalPrice}/quintal (range: ₹${stats.minModalPrice} - ₹${stats.maxModalPrice})`
    );
  }
  parts.push(`across ${stats.uniqueMarkets} market(s)`);
  if (filters.state) {
    parts.push(`in ${filters.state}`);
  } else if (stats.uniqueStates > 1) {
    parts.push(`across ${stats.uniqueStates} states`);
  }
  return `${parts.join(' ')}.`;
}

function describeFetchError(error: unknown): string {
  if (error instanceof TimeoutError) {
    return 'API request timed out';
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'API request timed out';
    }
    if (error.response) {
      return `API responded with status ${error.response.status}`;
    }
  }
  return describeError(error);
}

/** Mandi price lookup against the data.gov.in daily price resource. */
export class MarketPriceTool {
  constructor(private readonly options: MarketPriceOptions) {}

  async getCommodityPrice(args: MarketPriceArgs): Promise<ToolResponse<MarketPriceData>> {
    const limit = Math.max(1, Math.min(args.limit ?? 10, 100));

    if (!this.options.apiKey) {
      return toolFailure('DATA_GOV_IN_API_KEY is not configured', FETCH_FAILED_MESSAGE);
    }

    const params: Record<string, string | number> = {
      'api-key': this.options.apiKey,
      format: 'json',
      limit,
      offset: 0
    };
    for (const key of ['commodity', 'state', 'district', 'market'] as const) {
      const value = args[key];
      if (value) {
        params[`filters[${key}]`] = value;
      }
    }

    let body: z.infer<typeof apiResponseSchema>;
    try {
      const response = await withRetry(
        'market.fetch',
        (signal) => axios.get<unknown>(this.options.apiUrl, { params, signal }),
        { maxRetries: this.options.maxRetries, timeoutMs: this.options.timeoutMs }
      );
      body = apiResponseSchema.parse(response.data);
    } catch (error) {
      const reason = describeFetchError(error);
      console.error('Market price request failed:', reason);
      return toolFailure(reason, FETCH_FAILED_MESSAGE);
    }

    const records = (body.records ?? []).map(cleanRecord);
    const statistics = calculateStatistics(records);

    return {
      success: true,
      data: {
        records,
        metadata: {
          queryParams: {
            commodity: args.commodity ?? null,
            state: args.state ?? null,
            district: args.district ?? null,
            market: args.market ?? null,
            limit
          },
          recordCount: records.length,
          statistics
        }
      },
      message: summarizeMarket(records, statistics, args)
    };
  }
}
