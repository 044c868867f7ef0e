import { isLocationError } from '../types';
import type { ProductLink, SoilRecord, WeatherRecord } from '../types';

export const FORECAST_WINDOW = 6;

export function formatWeatherDisplay(weather: WeatherRecord): string {
  if (isLocationError(weather)) return '⚠️ Weather data unavailable';

  const { location, current, forecast } = weather;
  let display = `**Current Weather:**
- 📍 Location: ${location.city}, ${location.state}
- 🌡️ Temperature: ${current.temperature ?? 'N/A'}°${current.temperatureUnit}
- ☁️ Conditions: ${current.shortForecast}
- 💨 Wind: ${current.windSpeed} ${current.windDirection}

**3-Day Forecast:**
`;
  for (const period of forecast.slice(0, FORECAST_WINDOW)) {
    display += `• ${period.name}: ${period.temperature ?? 'N/A'}° - ${period.shortForecast}\n`;
  }
  return display;
}

export function formatSoilDisplay(soil: SoilRecord): string {
  if (isLocationError(soil)) return '⚠️ Soil data unavailable';

  const props = soil.soilProperties;
  let display = `**Your Soil Type:**
- 🪨 Name: ${props.soilName}
- 📊 Texture: ${props.soilTexture}
- 💧 Drainage: ${props.drainageClass}
`;
  if (props.sandPercent !== null) display += `- 🏖️ Sand: ${props.sandPercent}%\n`;
  if (props.clayPercent !== null) display += `- 🧱 Clay: ${props.clayPercent}%\n`;
  if (props.siltPercent !== null) display += `- 🌾 Silt: ${props.siltPercent}%\n`;
  if (props.ph !== null) display += `- 🧪 pH: ${props.ph}\n`;
  if (props.organicMatterPercent !== null) display += `- 🌿 Organic Matter: ${props.organicMatterPercent}%\n`;
  if (soil.note) display += `\n_${soil.note}_\n`;
  return display;
}

export function formatProductLinks(products: ProductLink[]): string {
  if (products.length === 0) {
    return '### 🛒 Recommended Products on Amazon\n\n*(Product links temporarily unavailable)*\n';
  }
  const lines = products.map((product, i) => {
    let entry = `**${i + 1}. [${product.name}](${product.url})**`;
    if (product.price || product.rating) {
      entry += `\n   💰 ${product.price ?? 'Price not available'} | ⭐ ${product.rating ?? 'No rating'}`;
    }
    return entry;
  });
  return `### 🛒 Recommended Products on Amazon\n\n${lines.join('\n\n')}\n`;
}

/** One-line conditions used inside prompts. */
export function describeConditions(weather: WeatherRecord, soil: SoilRecord): string {
  const weatherPart = isLocationError(weather)
    ? 'Weather: unavailable'
    : `Weather: ${weather.location.city}, ${weather.current.temperature ?? 'N/A'}°${weather.current.temperatureUnit}, ${weather.current.shortForecast}`;
  const soilPart = isLocationError(soil)
    ? 'Soil: unavailable'
    : `Soil: ${soil.soilProperties.soilTexture}, ${soil.soilProperties.drainageClass} drainage, pH ${soil.soilProperties.ph ?? 'N/A'}`;
  return `${weatherPart}\n${soilPart}`;
}
