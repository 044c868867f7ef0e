import type { DetectionResult, SoilReport, WeatherReport } from "../types";

export const armywormDetection: DetectionResult = {
  issue: "Fall Armyworm",
  severity: "Severe",
  plantType: "Unknown",
  subjectKind: "pest",
  rawAnalysis: "- **Insect Species**: Fall Armyworm\n- **Severity Level**: Severe",
};

export const sampleWeather: WeatherReport = {
  zipcode: "92336",
  location: { latitude: 34.1, longitude: -117.43, city: "Fontana", state: "CA" },
  current: {
    temperature: 72,
    temperatureUnit: "F",
    windSpeed: "5 mph",
    windDirection: "W",
    shortForecast: "Sunny",
    detailedForecast: "Sunny, with a high near 72.",
  },
  forecast: [
    { name: "Today", temperature: 72, shortForecast: "Sunny" },
    { name: "Tonight", temperature: 55, shortForecast: "Clear" },
  ],
};

export const sampleSoil: SoilReport = {
  zipcode: "92336",
  location: { latitude: 34.1, longitude: -117.43 },
  soilProperties: {
    soilName: "Tujunga loamy sand",
    soilSymbol: "TvC",
    componentName: "Tujunga",
    soilOrder: "Entisols",
    soilSubgroup: "Typic Xeropsamments",
    drainageClass: "Somewhat excessively drained",
    sandPercent: 88.2,
    siltPercent: 7.1,
    clayPercent: 4.7,
    soilTexture: "Sandy Loam",
    ph: 6.8,
    organicMatterPercent: 0.8,
  },
  dataSource: "USDA SSURGO via Soil Data Access",
};

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

export const textResponse = (body: string, status = 200) => new Response(body, { status });

export const requestUrl = (input: RequestInfo | URL): string =>
  typeof input === "string" ? input : input instanceof URL ? input.href : input.url;

/** Lets Ink process stdin and re-render. */
export const settle = (ms = 50) => new Promise<void>(resolve => setTimeout(resolve, ms));

export const KEYS = { enter: "\r", down: "\u001B[B" } as const;

const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

/** Last rendered frame without colour codes. */
export const plainFrame = (lastFrame: () => string | undefined) => (lastFrame() ?? "").replace(ANSI_PATTERN, "");
