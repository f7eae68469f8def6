/**
 * Filter service client module
 *
 * Provides:
 * - createClient for the VOTable-speaking filter service
 * - ApiRequestError for transport and service failures
 */

export {
  createClient,
  resolveServiceUrl,
  DEFAULT_SERVICE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_WAVELENGTH_EFF_MIN,
  DEFAULT_WAVELENGTH_EFF_MAX,
} from './client.js';

export type { FilterServiceClient } from './client.js';

export { ApiRequestError } from './errors.js';

export type { FilterServiceConfig, ServiceQuery } from './types.js';
