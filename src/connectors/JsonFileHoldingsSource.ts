/**
 * JSON File Holdings Source
 * Serves per-entity records from a snapshot file keyed by entity id
 */

import { readFile } from 'fs/promises';
import { RawEntityRecord, RawHoldings, TrackedEntity } from '../models/Holdings';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { IHoldingsSource } from './HoldingsSource';

const COMPONENT = 'JsonFileHoldingsSource';

export class JsonFileHoldingsSource implements IHoldingsSource {
  readonly name: string;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.name = `file:${filePath}`;
  }

  async fetchEntity(entity: TrackedEntity): Promise<RawEntityRecord> {
    const records = await this.readSnapshot();

    if (!Object.prototype.hasOwnProperty.call(records, entity.id)) {
      throw new ApplicationError(
        `Entity ${entity.id} is not present in ${this.filePath}`,
        'ENTITY_NOT_FOUND',
        ErrorCategory.EXTERNAL_SERVICE,
        ErrorSeverity.LOW,
        { operation: 'fetchEntity', component: COMPONENT, entityId: entity.id, timestamp: new Date() },
        { isRetryable: false }
      );
    }

    return records[entity.id];
  }

  /**
   * Reads the whole file; record shapes are checked later by the aggregator
   */
  async readSnapshot(): Promise<RawHoldings> {
    const text = await readFile(this.filePath, 'utf8');

    let records: RawHoldings;
    try {
      records = JSON.parse(text);
    } catch (error) {
      throw new ApplicationError(
        `Malformed snapshot file ${this.filePath}`,
        'MALFORMED_SNAPSHOT',
        ErrorCategory.VALIDATION,
        ErrorSeverity.HIGH,
        { operation: 'readSnapshot', component: COMPONENT, timestamp: new Date() },
        { originalError: error instanceof Error ? error : undefined }
      );
    }

    if (typeof records !== 'object' || records === null || Array.isArray(records)) {
      throw new ApplicationError(
        `Snapshot file ${this.filePath} must contain an object keyed by entity id`,
        'MALFORMED_SNAPSHOT',
        ErrorCategory.VALIDATION,
        ErrorSeverity.HIGH,
        { operation: 'readSnapshot', component: COMPONENT, timestamp: new Date() }
      );
    }

    return records;
  }
}
