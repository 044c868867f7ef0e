import type { ProductLink, SoilRecord, SoilReport, WeatherRecord, WeatherReport } from '../types';
import { describeError, LocationNotFoundError, ToolTimeoutError } from '../lib/errors';
import { fetchWeatherReport, weatherFailure } from './weatherService';
import { fetchSoilReport, soilFailure } from './soilService';
import { fetchProducts, productSearchFallback } from './productSearchService';

export type ToolName = 'get_weather' | 'get_soil_type' | 'search_products';

export interface ToolPolicy {
  timeoutMs: number;
  retries: number;
}

/** The fixed registry of functions the orchestration layer may call. */
export interface AgriTools {
  get_weather(zipcode: string, signal: AbortSignal): Promise<WeatherReport>;
  get_soil_type(zipcode: string, signal: AbortSignal): Promise<SoilReport>;
  search_products(query: string, maxResults: number, signal: AbortSignal): Promise<ProductLink[]>;
}

export const createHttpTools = (serperApiKey: string): AgriTools => ({
  get_weather: fetchWeatherReport,
  get_soil_type: fetchSoilReport,
  search_products: (query, maxResults, signal) => fetchProducts(query, maxResults, serperApiKey, signal),
});

const withTimeout = async <R>(
  name: ToolName,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<R>
): Promise<R> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ToolTimeoutError(name, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([call(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Runs one tool invocation under the policy. Rejects with the last error once
 * every attempt has failed; an unknown zip code is never retried.
 */
export async function runTool<R>(
  name: ToolName,
  policy: ToolPolicy,
  call: (signal: AbortSignal) => Promise<R>
): Promise<R> {
  const attempts = policy.retries + 1;
  let lastError: unknown = new Error(`${name} was not attempted`);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await withTimeout(name, policy.timeoutMs, call);
    } catch (error) {
      lastError = error;
      console.warn(`Tool ${name} failed (attempt ${attempt}/${attempts}): ${describeError(error)}`);
      if (error instanceof LocationNotFoundError) break;
    }
  }
  throw lastError;
}

/** Tool calls that always resolve: failures come back as error records or fallback links. */
export class AgriToolbox {
  constructor(
    private readonly tools: AgriTools,
    private readonly policy: ToolPolicy
  ) {}

  async getWeather(zipcode: string): Promise<WeatherRecord> {
    try {
      return await runTool('get_weather', this.policy, signal => this.tools.get_weather(zipcode, signal));
    } catch (error) {
      return weatherFailure(zipcode, error);
    }
  }

  async getSoil(zipcode: string): Promise<SoilRecord> {
    try {
      return await runTool('get_soil_type', this.policy, signal => this.tools.get_soil_type(zipcode, signal));
    } catch (error) {
      return soilFailure(zipcode, error);
    }
  }

  async searchProducts(query: string, maxResults = 3): Promise<ProductLink[]> {
    try {
      return await runTool('search_products', this.policy, signal =>
        this.tools.search_products(query, maxResults, signal)
      );
    } catch {
      return productSearchFallback(query);
    }
  }
}
