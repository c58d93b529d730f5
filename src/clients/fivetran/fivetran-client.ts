/**
 * Fivetran API Client
 *
 * Typed access to the Fivetran collections used for connection imports.
 * Every call goes through one PaginatedFetcher, and therefore through one
 * shared rate-limited dispatcher and response cache.
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { PaginatedFetcher } from './paginated-fetcher.js';
import type { PaginatedItemStream } from './paginated-item-stream.js';
import type { FivetranConnector, FivetranGroup } from './types.js';

export interface FivetranClientDependencies {
  /**
   * Fetcher for paginated and single-object endpoints
   * If not provided, a PaginatedFetcher on the singleton dispatcher is created
   */
  fetcher?: PaginatedFetcher;
}

export class FivetranClient {
  private static instance: FivetranClient | null = null;

  private readonly fetcher: PaginatedFetcher;
  private readonly logger: ServiceLogger;

  constructor(dependencies: FivetranClientDependencies = {}) {
    this.logger = createServiceLogger('FivetranClient');
    this.fetcher = dependencies.fetcher ?? new PaginatedFetcher();
  }

  /**
   * Get singleton instance of FivetranClient
   */
  static getInstance(): FivetranClient {
    if (!FivetranClient.instance) {
      FivetranClient.instance = new FivetranClient();
    }
    return FivetranClient.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    FivetranClient.instance = null;
  }

  /**
   * Stream all groups visible to the account
   */
  listGroups(signal?: AbortSignal): PaginatedItemStream<FivetranGroup> {
    log.methodEntry(this.logger, 'listGroups');
    return this.fetcher.fetchItems<FivetranGroup>('groups', signal);
  }

  /**
   * Stream the connectors of one group
   *
   * @param groupId - Fivetran group ID
   */
  listGroupConnectors(groupId: string, signal?: AbortSignal): PaginatedItemStream<FivetranConnector> {
    log.methodEntry(this.logger, 'listGroupConnectors', { groupId });
    return this.fetcher.fetchItems<FivetranConnector>(
      `groups/${encodeURIComponent(groupId)}/connectors`,
      signal
    );
  }

  /**
   * Get one connector
   *
   * @param connectorId - Fivetran connector ID
   * @throws HttpRequestError if the API answers with a non-success status
   * @throws MalformedResponseError if the body has no connector object
   */
  async getConnector(connectorId: string, signal?: AbortSignal): Promise<FivetranConnector> {
    log.methodEntry(this.logger, 'getConnector', { connectorId });
    const connector = await this.fetcher.fetchItem<FivetranConnector>(
      `connectors/${encodeURIComponent(connectorId)}`,
      signal
    );
    log.methodExit(this.logger, 'getConnector', { connectorId, service: connector.service });
    return connector;
  }
}
