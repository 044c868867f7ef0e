import type { Coordinates } from '../types';
import { LocationNotFoundError } from '../lib/errors';
import { fetchText } from './http';

const NDFD_URL = 'https://graphical.weather.gov/xml/SOAP_server/ndfdXMLclient.php';

/** Regex read of the single <latLonList> element; the payload is too small to need a parser. */
export function parseLatLonList(xml: string): Coordinates | null {
  const match = xml.match(/<latLonList>\s*([^<]*?)\s*<\/latLonList>/);
  if (!match) return null;

  const parts = match[1].split(',');
  if (parts.length !== 2) return null;

  const latitude = Number(parts[0]);
  const longitude = Number(parts[1]);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude) || parts.some(p => p.trim() === '')) {
    return null;
  }
  return { latitude, longitude };
}

/**
 * Resolves a US zip code to coordinates through the NWS NDFD service.
 * Throws LocationNotFoundError when the service knows no such zip.
 */
export const zipToCoordinates = async (zipcode: string, signal?: AbortSignal): Promise<Coordinates> => {
  const xml = await fetchText(`${NDFD_URL}?listZipCodeList=${encodeURIComponent(zipcode)}`, { signal });
  const coords = parseLatLonList(xml);
  if (!coords) throw new LocationNotFoundError(zipcode);
  return coords;
};
