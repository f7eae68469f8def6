/**
 * Filter service client types
 */

import type { Logger } from '../utils/logger.js';

/**
 * Filter service client configuration
 */
export interface FilterServiceConfig {
  /** Endpoint of the filter service (defaults to the SVO Filter Profile Service) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Lower bound of the effective wavelength range queried for the index, in Angstrom */
  wavelengthEffMin?: number;
  /** Upper bound of the effective wavelength range queried for the index, in Angstrom */
  wavelengthEffMax?: number;
  /** Logger for request tracing */
  logger?: Logger;
}

/**
 * Query parameters understood by the filter service
 */
export type ServiceQuery = Record<string, string | number>;
