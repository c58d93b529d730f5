/**
 * Configuration exports
 */

export {
  FIVETRAN_PAGE_SIZE,
  DEFAULT_RETRY_AFTER_MS,
  DEFAULT_FIVETRAN_API_BASE_URL,
  ConfigurationError,
  getFivetranConfig,
  type FivetranConfig,
} from './fivetran.js';
