/**
 * Reads the bundled zone feature collection
 */

import { readFile } from 'fs/promises';
import { Logger } from '../utils/logger';
import { WeatherHubError, WeatherHubErrorType } from '../utils/error-handler';
import { zonesResponseSchema } from './schemas';
import { Zone } from './types';
import { selectZones } from './zones';

/**
 * Zones with observation stations, first occurrence of each key kept.
 * A missing file yields no zones.
 */
export async function readZonesFile(filePath: string, logger: Logger): Promise<Zone[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (caught) {
    if (isMissingFile(caught)) {
      logger.warn('Zones file not found', { path: filePath }, 'readZonesFile');
      return [];
    }
    throw caught;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new WeatherHubError('Zones file is not valid JSON', WeatherHubErrorType.CONFIGURATION_ERROR, 'readZonesFile', {
      path: filePath
    });
  }

  const parsed = zonesResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WeatherHubError(
      'Zones file is not a zone feature collection',
      WeatherHubErrorType.CONFIGURATION_ERROR,
      'readZonesFile',
      { path: filePath, issues: parsed.error.issues.length }
    );
  }

  return selectZones(parsed.data);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
