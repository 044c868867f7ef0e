import { z } from 'zod';
import type { Coordinates, SoilProperties, SoilRecord, SoilReport } from '../types';
import { describeError, LocationNotFoundError } from '../lib/errors';
import { determineTexture, roundOne, toPercent } from '../lib/soilTexture';
import { zipToCoordinates } from './geocodingService';
import { fetchJson } from './http';

const SDA_URL = 'https://sdmdataaccess.nrcs.usda.gov/Tabular/post.rest';
export const SOIL_DATA_SOURCE = 'USDA SSURGO via Soil Data Access';

/**
 * Dominant component of the map unit under the point, surface horizon only.
 * Column order is relied on by mapSoilRow.
 */
export const buildSoilQuery = ({ latitude, longitude }: Coordinates) => `
SELECT TOP 1
    mu.muname AS soil_name,
    mu.musym AS soil_symbol,
    c.compname AS component_name,
    c.taxorder AS soil_order,
    c.taxsubgrp AS soil_subgroup,
    c.drainagecl AS drainage_class,
    ch.sandtotal_r AS sand_percent,
    ch.silttotal_r AS silt_percent,
    ch.claytotal_r AS clay_percent,
    ch.ph1to1h2o_r AS ph,
    ch.om_r AS organic_matter_percent
FROM mapunit AS mu
INNER JOIN component AS c ON mu.mukey = c.mukey
INNER JOIN chorizon AS ch ON c.cokey = ch.cokey
WHERE mu.mukey IN (
    SELECT * FROM SDA_Get_Mukey_from_intersection_with_WktWgs84('point(${longitude} ${latitude})')
)
AND c.comppct_r = (SELECT MAX(c2.comppct_r) FROM component AS c2 WHERE c2.mukey = mu.mukey)
AND ch.hzdept_r = 0
ORDER BY c.comppct_r DESC`;

const Cell = z.union([z.string(), z.number(), z.null()]);
const SdaResponseSchema = z.object({ Table: z.array(z.array(Cell)).optional() });
type SoilRow = z.infer<typeof Cell>[];

const textCell = (row: SoilRow, index: number): string => {
  const value = row[index];
  return value === undefined || value === null || value === '' ? 'Unknown' : String(value);
};

export function mapSoilRow(row: SoilRow): SoilProperties {
  const sand = toPercent(row[6]);
  const silt = toPercent(row[7]);
  const clay = toPercent(row[8]);

  return {
    soilName: textCell(row, 0),
    soilSymbol: textCell(row, 1),
    componentName: textCell(row, 2),
    soilOrder: textCell(row, 3),
    soilSubgroup: textCell(row, 4),
    drainageClass: textCell(row, 5),
    sandPercent: roundOne(sand),
    siltPercent: roundOne(silt),
    clayPercent: roundOne(clay),
    soilTexture: determineTexture(clay, sand, silt),
    ph: roundOne(toPercent(row[9])),
    organicMatterPercent: roundOne(toPercent(row[10])),
  };
}

const noCoverage = (zipcode: string, location: Coordinates): SoilReport => ({
  zipcode,
  location,
  soilProperties: {
    ...mapSoilRow([]),
    soilName: 'No detailed soil data available for this location',
  },
  dataSource: SOIL_DATA_SOURCE,
  note: 'This location may not have detailed SSURGO coverage',
});

/** Throws on any failure. */
export const fetchSoilReport = async (zipcode: string, signal?: AbortSignal): Promise<SoilReport> => {
  const location = await zipToCoordinates(zipcode, signal);

  const data = await fetchJson(SDA_URL, SdaResponseSchema, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ query: buildSoilQuery(location), format: 'JSON' }),
    signal,
  });

  const row = data.Table?.[0];
  if (!row) return noCoverage(zipcode, location);

  return {
    zipcode,
    location,
    soilProperties: mapSoilRow(row),
    dataSource: SOIL_DATA_SOURCE,
  };
};

export const soilFailure = (zipcode: string, error: unknown): SoilRecord => ({
  error: error instanceof LocationNotFoundError
    ? error.message
    : `Failed to fetch soil data: ${describeError(error)}`,
  zipcode,
});
