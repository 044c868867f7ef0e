import type { ProductLink, SoilRecord, WeatherRecord } from '../types';
import {
  buildMonitoringPrompt,
  buildProductQueryPrompt,
  buildSoilImpactPrompt,
  buildTreatmentPrompt,
  buildWeatherTimingPrompt,
} from '../lib/prompts';
import { describeConditions, formatProductLinks, formatSoilDisplay, formatWeatherDisplay } from '../lib/displays';
import { describeError } from '../lib/errors';
import type { AgriToolbox } from '../services/agriToolbox';
import type { AgriSession } from './agriSession';
import type { ConversationLog } from './conversationLog';

export type MenuOption = 2 | 3 | 4 | 5;
export type MenuSelector = MenuOption | { question: string };

export const MENU_LABELS: Record<MenuOption, string> = {
  2: 'Soil Impact',
  3: 'Weather Timing',
  4: 'Monitoring',
  5: 'Full Report',
};

export const INVALID_OPTION = 'Invalid option. Please select 2-5.';

export const PRODUCT_KEYWORDS = [
  'Bt', 'spinosad', 'neem oil', 'pyrethrin', 'insecticidal soap',
  'copper fungicide', 'sulfur spray', 'diatomaceous earth',
  'horticultural oil', 'bacillus thuringiensis',
] as const;

const MAX_QUERIES = 3;
const RESULTS_PER_QUERY = 2;
const HEAVY_RULE = '═'.repeat(70);
const LIGHT_RULE = '─'.repeat(70);

export const isMenuOption = (value: number): value is MenuOption =>
  value === 2 || value === 3 || value === 4 || value === 5;

/** Model reply → search queries: one per line, list markers and quotes stripped. */
export function parseProductQueries(reply: string): string[] {
  return reply
    .split(/\r?\n/)
    .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').replace(/["*]/g, '').trim())
    .filter(line => line.length > 0)
    .slice(0, MAX_QUERIES);
}

export function keywordQueries(treatmentText: string): string[] {
  return PRODUCT_KEYWORDS
    .filter(keyword => new RegExp(`\\b${keyword}\\b`, 'i').test(treatmentText))
    .slice(0, 2)
    .map(keyword => `${keyword} organic pesticide`);
}

interface Conditions {
  weather: WeatherRecord;
  soil: SoilRecord;
}

/**
 * Answers menu selections and free-text questions over the session's channel.
 * Never rejects: a failing step puts its error text in place of its content.
 */
export class MenuDispatcher {
  constructor(
    private readonly session: AgriSession,
    private readonly toolbox: AgriToolbox
  ) {}

  async dispatch(selector: MenuSelector | number, log: ConversationLog): Promise<string> {
    if (typeof selector === 'object') {
      const answer = await this.converse(selector.question, 'Error answering question');
      log.append(selector.question, answer);
      return answer;
    }
    if (!isMenuOption(selector)) return INVALID_OPTION;

    const answer = await this.answer(selector);
    log.append(MENU_LABELS[selector], answer);
    return answer;
  }

  /** Advice first, then product queries; the toolbox runs the searches. */
  async recommendTreatment(conditions: Conditions = this.session.location): Promise<string> {
    const ctx = this.session.promptContext;
    const advice = await this.converse(
      buildTreatmentPrompt(ctx, describeConditions(conditions.weather, conditions.soil)),
      'Error generating treatment advice'
    );

    let queries: string[] = [];
    try {
      queries = parseProductQueries(await this.session.ask(buildProductQueryPrompt(ctx)));
    } catch (error) {
      console.error('Product query generation failed:', error);
    }
    if (queries.length === 0) queries = keywordQueries(advice);
    if (queries.length === 0) queries = [`${ctx.issue} treatment ${ctx.plantType}`];

    const products: ProductLink[] = [];
    for (const query of queries) {
      for (const product of await this.toolbox.searchProducts(query, RESULTS_PER_QUERY)) {
        if (!products.some(p => p.url === product.url)) products.push(product);
      }
    }

    return `**Treatment Recommendations:**\n\n${advice}\n\n${LIGHT_RULE}\n\n${formatProductLinks(products)}`;
  }

  private answer(option: MenuOption, prefetched: Partial<Conditions> = {}): Promise<string> {
    switch (option) {
      case 2:
        return this.soilImpact(prefetched.soil);
      case 3:
        return this.weatherTiming(prefetched.weather);
      case 4:
        return this.converse(buildMonitoringPrompt(this.session.promptContext), 'Error generating monitoring advice');
      case 5:
        return this.detailedReport();
    }
  }

  private async soilImpact(prefetched?: SoilRecord): Promise<string> {
    const soil = prefetched ?? await this.toolbox.getSoil(this.session.zipcode);
    const display = formatSoilDisplay(soil);
    const analysis = await this.converse(
      buildSoilImpactPrompt(this.session.promptContext, display),
      'Error generating analysis'
    );
    return `${display}\n\n${analysis}`;
  }

  private async weatherTiming(prefetched?: WeatherRecord): Promise<string> {
    const weather = prefetched ?? await this.toolbox.getWeather(this.session.zipcode);
    const display = formatWeatherDisplay(weather);
    const guidance = await this.converse(
      buildWeatherTimingPrompt(this.session.promptContext, display),
      'Error generating timing guidance'
    );
    return `${display}\n\n${guidance}`;
  }

  private async detailedReport(): Promise<string> {
    const weather = await this.toolbox.getWeather(this.session.zipcode);
    const soil = await this.toolbox.getSoil(this.session.zipcode);

    const treatment = await this.recommendTreatment({ weather, soil });
    const soilImpact = await this.answer(2, { soil });
    const weatherTiming = await this.answer(3, { weather });
    const monitoring = await this.answer(4);

    return `${HEAVY_RULE}
COMPREHENSIVE TREATMENT REPORT
${HEAVY_RULE}

## 1. TREATMENT RECOMMENDATIONS

${treatment}

${LIGHT_RULE}

## 2. SOIL IMPACT ANALYSIS

${soilImpact}

${LIGHT_RULE}

## 3. WEATHER-BASED TIMING

${weatherTiming}

${LIGHT_RULE}

## 4. MONITORING & PREVENTION

${monitoring}

${HEAVY_RULE}`;
  }

  private async converse(prompt: string, failureLabel: string): Promise<string> {
    try {
      return await this.session.ask(prompt);
    } catch (error) {
      console.error(`${failureLabel}:`, error);
      return `${failureLabel}: ${describeError(error)}`;
    }
  }
}
