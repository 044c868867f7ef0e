import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AgriToolbox, runTool } from "./agriToolbox";
import type { AgriTools, ToolPolicy } from "./agriToolbox";
import { LocationNotFoundError, ToolTimeoutError } from "../lib/errors";
import { sampleSoil, sampleWeather } from "../test/fixtures";

const policy = (retries: number, timeoutMs = 1000): ToolPolicy => ({ timeoutMs, retries });

describe("runTool", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("does not retry by default", async () => {
    const call = vi.fn(async () => {
      throw new Error("boom");
    });
    await expect(runTool("get_weather", policy(0), call)).rejects.toThrow("boom");
    expect(call).toHaveBeenCalledTimes(1);
  });

  it("retries up to the configured count", async () => {
    const call = vi.fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValueOnce("ok");
    await expect(runTool("search_products", policy(2), call)).resolves.toBe("ok");
    expect(call).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenCalledWith("Tool search_products failed (attempt 1/3): first");
  });

  it("never retries an unknown zip code", async () => {
    const call = vi.fn(async () => {
      throw new LocationNotFoundError("00000");
    });
    await expect(runTool("get_soil_type", policy(3), call)).rejects.toBeInstanceOf(LocationNotFoundError);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it("aborts a call that outlives the timeout", async () => {
    let received: AbortSignal | undefined;
    const call = (signal: AbortSignal) => {
      received = signal;
      return new Promise<string>(() => {});
    };
    await expect(runTool("get_weather", policy(0, 10), call)).rejects.toThrow(
      new ToolTimeoutError("get_weather", 10).message
    );
    expect(received?.aborted).toBe(true);
  });
});

describe("AgriToolbox", () => {
  const fakeTools = (): AgriTools => ({
    get_weather: vi.fn(async () => sampleWeather),
    get_soil_type: vi.fn(async () => sampleSoil),
    search_products: vi.fn(async (query: string) => [{ name: query, url: "https://www.amazon.com/s?k=x" }]),
  });

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("passes successful results through", async () => {
    const toolbox = new AgriToolbox(fakeTools(), policy(0));
    await expect(toolbox.getWeather("92336")).resolves.toEqual(sampleWeather);
    await expect(toolbox.getSoil("92336")).resolves.toEqual(sampleSoil);
  });

  it("turns an unknown zip into error records for weather and soil", async () => {
    const tools: AgriTools = {
      ...fakeTools(),
      get_weather: vi.fn(async () => {
        throw new LocationNotFoundError("00000");
      }),
      get_soil_type: vi.fn(async () => {
        throw new LocationNotFoundError("00000");
      }),
    };
    const toolbox = new AgriToolbox(tools, policy(2));

    const weather = await toolbox.getWeather("00000");
    const soil = await toolbox.getSoil("00000");

    expect(weather).toEqual({ error: "Could not find location for zip code 00000", zipcode: "00000" });
    expect(soil).toEqual({ error: "Could not find location for zip code 00000", zipcode: "00000" });
    expect("current" in weather).toBe(false);
    expect("soilProperties" in soil).toBe(false);
    expect(tools.get_weather).toHaveBeenCalledTimes(1);
  });

  it("falls back to a search link when product search fails", async () => {
    const tools: AgriTools = {
      ...fakeTools(),
      search_products: vi.fn(async () => {
        throw new Error("quota exceeded");
      }),
    };
    const toolbox = new AgriToolbox(tools, policy(0));
    await expect(toolbox.searchProducts("neem oil")).resolves.toEqual([
      { name: "Search results for: neem oil", url: "https://www.amazon.com/s?k=neem+oil" },
    ]);
  });

  it("defaults product search to three results", async () => {
    const tools = fakeTools();
    await new AgriToolbox(tools, policy(0)).searchProducts("neem oil");
    expect(tools.search_products).toHaveBeenCalledWith("neem oil", 3, expect.any(AbortSignal));
  });
});
