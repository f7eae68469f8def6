/**
 * Filter service client
 *
 * Talks to the SVO Filter Profile Service, which answers every query with
 * a VOTable document:
 * - `?WavelengthEff_min=..&WavelengthEff_max=..` lists the filters in a range
 * - `?ID=facility/instrument.filter` returns one transmission curve
 *
 * Errors are reported as the service sends them; retrying is left to the
 * caller.
 */

import type { FilterDataSource } from '../cache/types.js';
import type { Table } from '../cache/table.js';
import { parseVOTableDocument } from '../cache/votable.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { ApiRequestError } from './errors.js';
import type { FilterServiceConfig, ServiceQuery } from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_SERVICE_URL = 'https://svo2.cab.inta-csic.es/theory/fps/fps.php';
export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_WAVELENGTH_EFF_MIN = 0;
export const DEFAULT_WAVELENGTH_EFF_MAX = 1e9;

// =============================================================================
// Types
// =============================================================================

/**
 * Filter service client
 */
export interface FilterServiceClient extends FilterDataSource {
  /** Run an arbitrary query and return the table of the response */
  query(params: ServiceQuery): Promise<Table>;

  getConfig(): { baseUrl: string; timeoutMs: number };
}

// =============================================================================
// Configuration Resolution
// =============================================================================

/**
 * Resolve the service URL from config or environment
 */
export function resolveServiceUrl(configUrl?: string): string {
  if (configUrl) return configUrl;
  if (process.env.FILTER_CACHE_SERVICE_URL) return process.env.FILTER_CACHE_SERVICE_URL;
  return DEFAULT_SERVICE_URL;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a filter service client
 */
export function createClient(config: FilterServiceConfig = {}): FilterServiceClient {
  const baseUrl = resolveServiceUrl(config.baseUrl);
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const wavelengthEffMin = config.wavelengthEffMin ?? DEFAULT_WAVELENGTH_EFF_MIN;
  const wavelengthEffMax = config.wavelengthEffMax ?? DEFAULT_WAVELENGTH_EFF_MAX;
  const log = config.logger ?? defaultLogger;

  /**
   * GET the service with query params and return the response body
   */
  async function request(params: ServiceQuery): Promise<{ url: string; body: string }> {
    const url = new URL(baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    const target = url.toString();

    log.debug('HTTP Request', { method: 'GET', url: target });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const startTime = Date.now();
      let response: Response;
      try {
        response = await fetch(target, { method: 'GET', signal: controller.signal });
      } catch (err) {
        const message = controller.signal.aborted
          ? `Request timed out after ${timeoutMs}ms`
          : `Request failed: ${err instanceof Error ? err.message : String(err)}`;
        throw new ApiRequestError(message, 0, target, { cause: err });
      }

      log.debug(`HTTP Response ${response.status}: ${target}`, {
        durationMs: Date.now() - startTime,
      });

      if (!response.ok) {
        const detail = await response.text().then(
          (text) => text.substring(0, 200),
          () => ''
        );
        throw new ApiRequestError(
          `Filter service error (${response.status})${detail ? `: ${detail}` : ''}`,
          response.status,
          target
        );
      }

      return { url: target, body: await response.text() };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function query(params: ServiceQuery): Promise<Table> {
    const { url, body } = await request(params);
    const document = parseVOTableDocument(body, url);

    const failure = document.infos.find(
      (info) => info.name === 'QUERY_STATUS' && info.value === 'ERROR'
    );
    if (failure) {
      throw new ApiRequestError(
        `Filter service rejected the query: ${failure.text || 'unknown error'}`,
        200,
        url
      );
    }

    if (!document.table) {
      throw new ApiRequestError('Filter service returned no table', 200, url);
    }

    return document.table;
  }

  return {
    query,

    async fetchIndex(): Promise<Table> {
      return query({
        WavelengthEff_min: wavelengthEffMin,
        WavelengthEff_max: wavelengthEffMax,
      });
    },

    async fetchTransmission(canonicalId: string): Promise<Table> {
      return query({ ID: canonicalId });
    },

    getConfig() {
      return { baseUrl, timeoutMs };
    },
  };
}
