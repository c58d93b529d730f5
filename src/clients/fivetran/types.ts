/**
 * Fivetran REST API types
 */

/**
 * One page of a cursor-paginated collection
 */
export interface Page<T> {
  items: T[];
  /**
   * Continuation token; null when this is the last page
   *
   * Read from `data.next_cursor` of the envelope
   * `{ "data": { "items": [...], "next_cursor": "..." } }`
   */
  nextCursor: string | null;
}

/**
 * Destination group (GET /groups)
 */
export interface FivetranGroup {
  id: string;
  name: string;
  created_at?: string;
}

/**
 * Connector (GET /groups/{groupId}/connectors, GET /connectors/{connectorId})
 */
export interface FivetranConnector {
  id: string;
  group_id: string;
  /** Connector type code, e.g. 'postgres' or 'salesforce' */
  service: string;
  schema: string;
  paused?: boolean;
  sync_frequency?: number;
  status?: {
    setup_state?: string;
    sync_state?: string;
  };
}
