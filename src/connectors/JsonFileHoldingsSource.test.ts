import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonFileHoldingsSource } from './JsonFileHoldingsSource';
import { ApplicationError, ErrorCategory } from '../utils/ErrorHandler';

describe('JsonFileHoldingsSource', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'holdings-source-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  const sourceWith = async (content: string): Promise<JsonFileHoldingsSource> => {
    const filePath = join(workDir, 'holdings.json');
    await writeFile(filePath, content, 'utf8');
    return new JsonFileHoldingsSource(filePath);
  };

  it('should return the record of a tracked entity', async () => {
    const source = await sourceWith('{"kraken": {"assets": {"BTC": {"value_usd": 10}}}}');

    await expect(source.fetchEntity({ id: 'kraken', category: 'exchange' })).resolves.toEqual({
      assets: { BTC: { value_usd: 10 } }
    });
  });

  it('should fail without retry for an entity missing from the file', async () => {
    const source = await sourceWith('{"kraken": {}}');

    const failure = await source.fetchEntity({ id: 'fidelity', category: 'institution' }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ApplicationError);
    expect(failure).toMatchObject({ code: 'ENTITY_NOT_FOUND', isRetryable: false });
  });

  it('should report malformed JSON as a validation error', async () => {
    const source = await sourceWith('{not json');

    const failure = await source.readSnapshot().catch((error: unknown) => error);

    expect(failure).toMatchObject({ code: 'MALFORMED_SNAPSHOT', category: ErrorCategory.VALIDATION });
  });

  it('should reject a file that is not keyed by entity', async () => {
    const source = await sourceWith('[]');

    await expect(source.readSnapshot()).rejects.toThrow('must contain an object keyed by entity id');
  });
});
