import { describe, it, expect } from "vitest";
import { describeConditions, formatProductLinks, formatSoilDisplay, formatWeatherDisplay } from "./displays";
import { sampleSoil, sampleWeather } from "../test/fixtures";

const weatherError = { error: "Could not find location for zip code 00000", zipcode: "00000" };

describe("formatWeatherDisplay", () => {
  it("renders current conditions and forecast periods", () => {
    expect(formatWeatherDisplay(sampleWeather)).toBe(`**Current Weather:**
- 📍 Location: Fontana, CA
- 🌡️ Temperature: 72°F
- ☁️ Conditions: Sunny
- 💨 Wind: 5 mph W

**3-Day Forecast:**
• Today: 72° - Sunny
• Tonight: 55° - Clear
`);
  });

  it("shows at most six periods", () => {
    const forecast = Array.from({ length: 9 }, (_, i) => ({ name: `P${i}`, temperature: 60, shortForecast: "Cloudy" }));
    const display = formatWeatherDisplay({ ...sampleWeather, forecast });
    expect(display.match(/^• /gm)).toHaveLength(6);
  });

  it("reports unavailable data for error records", () => {
    expect(formatWeatherDisplay(weatherError)).toBe("⚠️ Weather data unavailable");
  });
});

describe("formatSoilDisplay", () => {
  it("lists available percentages", () => {
    expect(formatSoilDisplay(sampleSoil)).toBe(`**Your Soil Type:**
- 🪨 Name: Tujunga loamy sand
- 📊 Texture: Sandy Loam
- 💧 Drainage: Somewhat excessively drained
- 🏖️ Sand: 88.2%
- 🧱 Clay: 4.7%
- 🌾 Silt: 7.1%
- 🧪 pH: 6.8
- 🌿 Organic Matter: 0.8%
`);
  });

  it("skips missing values and shows the coverage note", () => {
    const display = formatSoilDisplay({
      ...sampleSoil,
      soilProperties: { ...sampleSoil.soilProperties, sandPercent: null, ph: null },
      note: "This location may not have detailed SSURGO coverage",
    });
    expect(display).not.toContain("Sand:");
    expect(display).not.toContain("pH:");
    expect(display.endsWith("\n_This location may not have detailed SSURGO coverage_\n")).toBe(true);
  });

  it("reports unavailable data for error records", () => {
    expect(formatSoilDisplay(weatherError)).toBe("⚠️ Soil data unavailable");
  });
});

describe("formatProductLinks", () => {
  it("shows a placeholder when empty", () => {
    expect(formatProductLinks([])).toBe(
      "### 🛒 Recommended Products on Amazon\n\n*(Product links temporarily unavailable)*\n"
    );
  });

  it("numbers links and adds price details when known", () => {
    expect(formatProductLinks([
      { name: "Neem Oil", url: "https://www.amazon.com/dp/B000000001", price: "$12.99" },
      { name: "Spinosad", url: "https://www.amazon.com/s?k=spinosad" },
    ])).toBe(
      "### 🛒 Recommended Products on Amazon\n\n" +
      "**1. [Neem Oil](https://www.amazon.com/dp/B000000001)**\n   💰 $12.99 | ⭐ No rating\n\n" +
      "**2. [Spinosad](https://www.amazon.com/s?k=spinosad)**\n"
    );
  });
});

describe("describeConditions", () => {
  it("summarises weather and soil", () => {
    expect(describeConditions(sampleWeather, sampleSoil)).toBe(
      "Weather: Fontana, 72°F, Sunny\nSoil: Sandy Loam, Somewhat excessively drained drainage, pH 6.8"
    );
  });

  it("marks failed records unavailable", () => {
    expect(describeConditions(weatherError, weatherError)).toBe("Weather: unavailable\nSoil: unavailable");
  });
});
