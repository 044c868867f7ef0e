import { z } from 'zod';
import type { ProductLink } from '../types';
import { fetchJson } from './http';

const SERPER_URL = 'https://google.serper.dev/search';

const SerperResponseSchema = z.object({
  organic: z.array(z.object({
    title: z.string().default('Unknown Product'),
    link: z.string().default('#'),
    // Display-only extras; a malformed one must not discard the result.
    price: z.union([z.number(), z.string()]).optional().catch(undefined),
    rating: z.union([z.number(), z.string()]).optional().catch(undefined),
  })).default([]),
});

const formatPrice = (price: number | string) => typeof price === 'number' ? `$${price.toFixed(2)}` : price;
const formatRating = (rating: number | string) => typeof rating === 'number' ? `${rating} out of 5 stars` : rating;

export const marketplaceSearchUrl = (query: string) =>
  `https://www.amazon.com/s?k=${encodeURIComponent(query).replace(/%20/g, '+')}`;

/** Product pages need a 10-character ASIN; search pages need a keyword parameter. */
export function isValidMarketplaceUrl(url: string): boolean {
  if (!url || url === '#') return false;
  if (url.includes('/dp/')) return /\/dp\/[A-Z0-9]{10}/.test(url);
  if (url.includes('/gp/product/')) return /\/gp\/product\/[A-Z0-9]{10}/.test(url);
  return url.includes('/s?') && url.includes('k=');
}

export function parseSearchResults(payload: z.infer<typeof SerperResponseSchema>, query: string, maxResults: number): ProductLink[] {
  const products: ProductLink[] = [];
  for (const item of payload.organic) {
    if (products.length >= maxResults) break;
    if (!isValidMarketplaceUrl(item.link)) continue;
    const product: ProductLink = { name: item.title, url: item.link };
    if (item.price !== undefined) product.price = formatPrice(item.price);
    if (item.rating !== undefined) product.rating = formatRating(item.rating);
    products.push(product);
  }

  if (products.length === 0) {
    return [{ name: `View search results for: ${query}`, url: marketplaceSearchUrl(query) }];
  }
  return products;
}

/** Throws on transport or payload failure. */
export const fetchProducts = async (
  query: string,
  maxResults: number,
  apiKey: string,
  signal?: AbortSignal
): Promise<ProductLink[]> => {
  const data = await fetchJson(SERPER_URL, SerperResponseSchema, {
    method: 'POST',
    headers: { 'X-API-KEY': apiKey, 'Content-Type': 'application/json' },
    body: JSON.stringify({ q: `site:amazon.com ${query}`, num: maxResults + 2, gl: 'us' }),
    signal,
  });
  return parseSearchResults(data, query, maxResults);
};

export const productSearchFallback = (query: string): ProductLink[] => [
  { name: `Search results for: ${query}`, url: marketplaceSearchUrl(query) },
];
