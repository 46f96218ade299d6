/**
 * Attach city-centroid coordinates to the raw fuel price CSV so the spatial
 * index can load it.
 *
 * Run with: npm run prepare:data [-- <input.csv> <output.csv>]
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger } from '../logger.js';
import { GEOCODED_STATIONS_FILENAME, decodeCsvBuffer, parseCsv, toCsvLine } from '../stations/csv.js';
import { createCentroidLookup, geocodeStationRows, readCentroidsFile } from '../stations/geocodeStations.js';

const log = createLogger('prepare-data');
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DATA_DIR = path.resolve(__dirname, '../../../data');

async function main() {
  const inputPath = path.resolve(process.argv[2] ?? path.join(DATA_DIR, 'fuel-prices-for-be-assessment.csv'));
  const outputPath = path.resolve(process.argv[3] ?? path.join(DATA_DIR, GEOCODED_STATIONS_FILENAME));

  const centroids = await readCentroidsFile(path.join(DATA_DIR, 'us-city-centroids.json'));
  const lookup = createCentroidLookup(centroids);

  log.info({ inputPath, centroids: centroids.length }, 'Reading raw station prices');
  const { headers, rows } = parseCsv(decodeCsvBuffer(await fs.readFile(inputPath)));
  const result = geocodeStationRows(rows, lookup);

  const outputHeaders = [...headers.filter((h) => h !== 'latitude' && h !== 'longitude'), 'latitude', 'longitude'];
  const lines = [
    toCsvLine(outputHeaders),
    ...result.rows.map((row) => toCsvLine(outputHeaders.map((h) => row[h] ?? ''))),
  ];

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${lines.join('\n')}\n`, 'utf8');

  const total = result.geocoded + result.failed;
  log.info(
    {
      total,
      geocoded: result.geocoded,
      failed: result.failed,
      successRate: total > 0 ? Number(((result.geocoded / total) * 100).toFixed(1)) : 0,
      outputPath,
    },
    'Geocoding finished',
  );
}

main().catch((error) => {
  log.error({ err: error }, 'Data preparation failed');
  process.exitCode = 1;
});
