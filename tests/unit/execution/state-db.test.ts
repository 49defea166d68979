import { InvalidPayloadError } from '../../../src/errors.js';
import {
  isTerminalState,
  latestExecution,
  parseStateToken,
  payloadIdToBucketKey,
  payloadIdToKey,
} from '../../../src/execution/state-db.js';

describe('state records', () => {
  describe('payloadIdToKey', () => {
    it('should split the id at the workflow marker', () => {
      expect(payloadIdToKey('sentinel-2/workflow-cog/S2A_123/S2A_456')).toEqual({
        collections_workflow: 'sentinel-2_cog',
        itemids: 'S2A_123/S2A_456',
      });
    });

    it('should keep multiple collections joined by slashes', () => {
      expect(payloadIdToKey('a/b/workflow-mosaic/item-1')).toEqual({
        collections_workflow: 'a/b_mosaic',
        itemids: 'item-1',
      });
    });

    it('should keep a force suffix in the item ids', () => {
      expect(payloadIdToKey('c/workflow-w/item_force-1700000000000000000').itemids).toBe(
        'item_force-1700000000000000000'
      );
    });

    it('should reject an id without a workflow', () => {
      expect(() => payloadIdToKey('just/some/path')).toThrow(InvalidPayloadError);
    });
  });

  it('should place stored inputs under payloads/<id>/input.json', () => {
    expect(payloadIdToBucketKey('c/workflow-w/a', 'test-payloads')).toEqual({
      bucket: 'test-payloads',
      key: 'payloads/c/workflow-w/a/input.json',
    });
  });

  describe('parseStateToken', () => {
    it('should take the text before the first underscore', () => {
      expect(parseStateToken({ state_updated: 'RUNNING_2024-05-01T10:00:00+00:00' })).toBe('RUNNING');
    });

    it('should read missing records and fields as UNKNOWN', () => {
      expect(parseStateToken(undefined)).toBe('UNKNOWN');
      expect(parseStateToken({})).toBe('UNKNOWN');
    });
  });

  it('should recognise exactly the terminal states', () => {
    expect(['COMPLETED', 'FAILED', 'ABORTED'].every(isTerminalState)).toBe(true);
    expect(['INIT', 'RUNNING', 'PROCESSING', 'UNKNOWN', 'completed'].some(isTerminalState)).toBe(false);
  });

  it('should pick the most recent execution', () => {
    expect(latestExecution({ executions: ['arn:first', 'arn:second'] })).toBe('arn:second');
    expect(latestExecution({ executions: [] })).toBeUndefined();
    expect(latestExecution(undefined)).toBeUndefined();
  });
});
