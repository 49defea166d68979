import { GetObjectCommand, PutObjectCommand, type GetObjectCommandOutput } from '@aws-sdk/client-s3';
import { DescribeExecutionCommand } from '@aws-sdk/client-sfn';
import { SendMessageCommand } from '@aws-sdk/client-sqs';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import type { AwsSession } from '../aws/session.js';
import type { Deployment } from '../deployment/deployment.js';
import { DeploymentError, NotFoundError, TransportError } from '../errors.js';
import { getErrorMessage, hasErrorName } from '../utils/error-utils.js';
import {
  resolveResources,
  type ExecutionClient,
  type ExecutionDetail,
  type ExecutionResources,
  type SubmissionReceipt,
} from './client.js';
import { latestExecution, payloadIdToKey, stateRecordSchema, type StateRecord } from './state-db.js';

async function transport<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof DeploymentError) throw error;
    throw new TransportError(operation, getErrorMessage(error), { cause: error });
  }
}

/**
 * ExecutionClient over SQS, S3, DynamoDB and Step Functions.
 */
export class AwsExecutionClient implements ExecutionClient {
  constructor(
    private readonly session: AwsSession,
    readonly resources: ExecutionResources
  ) {}

  async submit(queueUrl: string, body: string): Promise<SubmissionReceipt> {
    const response = await transport('SendMessage', () =>
      this.session.sqs.send(new SendMessageCommand({ QueueUrl: queueUrl, MessageBody: body }))
    );
    return { messageId: response.MessageId, raw: { ...response } };
  }

  async putObject(bucket: string, key: string, body: string): Promise<void> {
    await transport('PutObject', () =>
      this.session.s3.send(
        new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: 'application/json' })
      )
    );
  }

  async getObject(bucket: string, key: string): Promise<string> {
    let response: GetObjectCommandOutput;
    try {
      response = await this.session.s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      if (hasErrorName(error, 'NoSuchKey')) {
        throw new NotFoundError(`Object not found: s3://${bucket}/${key}`, 'object', `s3://${bucket}/${key}`, [], [], {
          cause: error,
        });
      }
      throw new TransportError('GetObject', getErrorMessage(error), { cause: error });
    }

    if (!response.Body) {
      return '';
    }
    const body = response.Body;
    return transport('GetObject', () => body.transformToString('utf-8'));
  }

  /**
   * Read errors are not wrapped here; the runner decides how a failed read
   * mid-poll is reported.
   */
  async getStatusRecord(payloadId: string): Promise<StateRecord | undefined> {
    const response = await this.session.dynamo.send(
      new GetCommand({ TableName: this.resources.stateTable, Key: { ...payloadIdToKey(payloadId) } })
    );
    if (!response.Item) {
      return undefined;
    }

    const result = stateRecordSchema.safeParse(response.Item);
    if (!result.success) {
      throw new TransportError('GetItem', `unexpected state record for ${payloadId}: ${result.error.message}`);
    }
    return result.data;
  }

  async getExecutionArnFor(payloadId: string): Promise<string> {
    const record = await transport('GetItem', () => this.getStatusRecord(payloadId));
    const arn = latestExecution(record);
    if (!arn) {
      throw new NotFoundError(`No execution recorded for payload ${payloadId}`, 'execution', payloadId);
    }
    return arn;
  }

  async describeExecution(arn: string): Promise<ExecutionDetail> {
    const response = await transport('DescribeExecution', () =>
      this.session.sfn.send(new DescribeExecutionCommand({ executionArn: arn }))
    );
    return {
      arn,
      status: response.status,
      input: response.input,
      output: response.output,
      raw: { ...response },
    };
  }
}

export interface ExecutionClientOptions {
  /** Prefix of the operational variable names in the deployment environment */
  envPrefix?: string;
}

/**
 * Client addressing a deployment's resources through its own session.
 * User vars are layered on, so a user override of a resource address wins.
 */
export async function createExecutionClient(
  deployment: Deployment,
  options: ExecutionClientOptions = {}
): Promise<AwsExecutionClient> {
  const resources = resolveResources(deployment.effectiveEnv(true), options.envPrefix);
  const session = await deployment.getSession();
  return new AwsExecutionClient(session, resources);
}
