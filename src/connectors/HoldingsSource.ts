/**
 * Holdings Source interface
 * Boundary through which per-entity holdings are fetched from an external provider
 */

import { RawEntityRecord, TrackedEntity } from '../models/Holdings';

export interface IHoldingsSource {
  /**
   * Human-readable source name used in logs
   */
  readonly name: string;

  /**
   * Fetches the current holdings record of one entity
   */
  fetchEntity(entity: TrackedEntity): Promise<RawEntityRecord>;
}
