/**
 * AwsExecutionClient against SDK clients whose middleware stack answers in
 * process. Requests never get past the initialize step.
 */

import { createHash } from 'crypto';
import { AwsSession } from '../../../src/aws/session.js';
import { NotFoundError, TransportError } from '../../../src/errors.js';
import { AwsExecutionClient } from '../../../src/execution/aws-client.js';
import { TEST_RESOURCES } from '../../helpers/fakes.js';

function serviceError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

describe('AwsExecutionClient', () => {
  let session: AwsSession;
  let client: AwsExecutionClient;
  let inputs: unknown[];

  beforeEach(() => {
    session = new AwsSession({ profile: null, region: 'us-east-1' });
    client = new AwsExecutionClient(session, TEST_RESOURCES);
    inputs = [];
  });

  afterEach(() => {
    session.destroy();
  });

  it('should send the body to the queue and return the message id', async () => {
    session.sqs.middlewareStack.add(
      () => async (args) => {
        inputs.push(args.input);
        const md5 = createHash('md5').update('{"id":"p-1"}').digest('hex');
        return { output: { MessageId: 'msg-1', MD5OfMessageBody: md5, $metadata: {} }, response: {} };
      },
      { step: 'initialize', name: 'inProcessQueue', priority: 'high' }
    );

    const receipt = await client.submit(TEST_RESOURCES.queueUrl, '{"id":"p-1"}');

    expect(receipt.messageId).toBe('msg-1');
    expect(inputs).toEqual([{ QueueUrl: TEST_RESOURCES.queueUrl, MessageBody: '{"id":"p-1"}' }]);
  });

  it('should wrap a queue failure in TransportError', async () => {
    session.sqs.middlewareStack.add(
      () => async () => {
        throw serviceError('AccessDenied', 'not allowed');
      },
      { step: 'initialize', name: 'inProcessQueue', priority: 'high' }
    );

    await expect(client.submit(TEST_RESOURCES.queueUrl, '{}')).rejects.toThrow(
      new TransportError('SendMessage', 'not allowed')
    );
  });

  it('should map a missing object to NotFoundError', async () => {
    session.s3.middlewareStack.add(
      () => async () => {
        throw serviceError('NoSuchKey', 'The specified key does not exist.');
      },
      { step: 'initialize', name: 'inProcessStore', priority: 'high' }
    );

    const read = client.getObject('test-payloads', 'payloads/p-1/input.json');

    await expect(read).rejects.toBeInstanceOf(NotFoundError);
    await expect(read).rejects.toMatchObject({ kind: 'object', target: 's3://test-payloads/payloads/p-1/input.json' });
  });

  it('should describe an execution', async () => {
    const arn = 'arn:aws:states:us-east-1:000000000000:execution:test-cog:run-1';
    session.sfn.middlewareStack.add(
      () => async (args) => {
        inputs.push(args.input);
        return {
          output: {
            executionArn: arn,
            stateMachineArn: 'arn:aws:states:us-east-1:000000000000:stateMachine:test-cog',
            status: 'SUCCEEDED',
            startDate: new Date(0),
            output: '{"ok":true}',
            $metadata: {},
          },
          response: {},
        };
      },
      { step: 'initialize', name: 'inProcessStates', priority: 'high' }
    );

    const detail = await client.describeExecution(arn);

    expect(inputs).toEqual([{ executionArn: arn }]);
    expect(detail.arn).toBe(arn);
    expect(detail.status).toBe('SUCCEEDED');
    expect(detail.output).toBe('{"ok":true}');
    expect(detail.input).toBeUndefined();
  });
});
