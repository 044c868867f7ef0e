import { describe, it, expect, vi, afterEach } from "vitest";
import {
  fetchProducts,
  isValidMarketplaceUrl,
  marketplaceSearchUrl,
  parseSearchResults,
  productSearchFallback,
} from "./productSearchService";
import { jsonResponse } from "../test/fixtures";

describe("isValidMarketplaceUrl", () => {
  it.each([
    ["https://www.amazon.com/Neem-Oil/dp/B0ABCDEF12", true],
    ["https://www.amazon.com/dp/short", false],
    ["https://www.amazon.com/gp/product/B012345678", true],
    ["https://www.amazon.com/gp/product/b012345678", false],
    ["https://www.amazon.com/s?k=neem+oil", true],
    ["https://www.amazon.com/best-sellers", false],
    ["#", false],
    ["", false],
  ])("%s -> %s", (url, expected) => {
    expect(isValidMarketplaceUrl(url)).toBe(expected);
  });
});

describe("marketplaceSearchUrl", () => {
  it("joins words with plus signs", () => {
    expect(marketplaceSearchUrl("neem oil")).toBe("https://www.amazon.com/s?k=neem+oil");
  });
});

describe("parseSearchResults", () => {
  it("keeps valid links up to the limit", () => {
    const products = parseSearchResults({
      organic: [
        { title: "Bad", link: "https://example.com/neem" },
        { title: "Neem A", link: "https://www.amazon.com/dp/B000000001" },
        { title: "Neem B", link: "https://www.amazon.com/dp/B000000002" },
        { title: "Neem C", link: "https://www.amazon.com/dp/B000000003" },
      ],
    }, "neem oil", 2);
    expect(products).toEqual([
      { name: "Neem A", url: "https://www.amazon.com/dp/B000000001" },
      { name: "Neem B", url: "https://www.amazon.com/dp/B000000002" },
    ]);
  });

  it("carries price and rating when the result has them", () => {
    expect(parseSearchResults({
      organic: [{ title: "Neem A", link: "https://www.amazon.com/dp/B000000001", price: 12.5, rating: 4.6 }],
    }, "neem oil", 3)).toEqual([
      { name: "Neem A", url: "https://www.amazon.com/dp/B000000001", price: "$12.50", rating: "4.6 out of 5 stars" },
    ]);
  });

  it("keeps text prices as they are", () => {
    expect(parseSearchResults({
      organic: [{ title: "Neem A", link: "https://www.amazon.com/dp/B000000001", price: "$12.99", rating: "4.5/5" }],
    }, "neem oil", 3)).toEqual([
      { name: "Neem A", url: "https://www.amazon.com/dp/B000000001", price: "$12.99", rating: "4.5/5" },
    ]);
  });

  it("links to the search page when nothing is valid", () => {
    expect(parseSearchResults({ organic: [] }, "neem oil", 3)).toEqual([
      { name: "View search results for: neem oil", url: "https://www.amazon.com/s?k=neem+oil" },
    ]);
  });
});

describe("fetchProducts", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("queries the search API restricted to the marketplace", async () => {
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => jsonResponse({
      organic: [{ title: "Spinosad Spray", link: "https://www.amazon.com/dp/B000000009" }],
    }));
    vi.stubGlobal("fetch", fetchMock);

    const products = await fetchProducts("spinosad", 2, "test-secret");

    expect(products).toEqual([{ name: "Spinosad Spray", url: "https://www.amazon.com/dp/B000000009" }]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://google.serper.dev/search");
    expect(init?.headers).toEqual({ "X-API-KEY": "test-secret", "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({ q: "site:amazon.com spinosad", num: 4, gl: "us" });
  });
});

describe("fetchProducts payload tolerance", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("keeps every valid product when one carries an odd price or rating", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({
      organic: [
        { title: "Neem A", link: "https://www.amazon.com/dp/B000000001", price: { value: 12.99 } },
        { title: "Neem B", link: "https://www.amazon.com/dp/B000000002", price: "$12.99", rating: [4] },
      ],
    })));

    await expect(fetchProducts("neem oil", 3, "test-secret")).resolves.toEqual([
      { name: "Neem A", url: "https://www.amazon.com/dp/B000000001" },
      { name: "Neem B", url: "https://www.amazon.com/dp/B000000002", price: "$12.99" },
    ]);
  });
});

describe("productSearchFallback", () => {
  it("returns one search link", () => {
    expect(productSearchFallback("copper fungicide")).toEqual([
      { name: "Search results for: copper fungicide", url: "https://www.amazon.com/s?k=copper+fungicide" },
    ]);
  });
});
