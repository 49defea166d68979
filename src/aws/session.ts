/**
 * Authenticated AWS session for one credential profile.
 *
 * Clients are created on first use and cached for the life of the session,
 * so a Deployment that owns a session reuses its connections across calls.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { LambdaClient } from '@aws-sdk/client-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { SFNClient } from '@aws-sdk/client-sfn';
import { SQSClient } from '@aws-sdk/client-sqs';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { fromIni, fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ConfigurationError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';

type CredentialProvider = ReturnType<typeof fromIni> | ReturnType<typeof fromNodeProviderChain>;

export interface SessionOptions {
  /** Named profile from the shared config/credentials files; null uses the default chain */
  profile: string | null;
  region?: string;
}

export interface CallerIdentity {
  account?: string;
  arn?: string;
  userId?: string;
}

export class AwsSession {
  readonly profile: string | null;
  readonly region?: string;
  private readonly credentials: CredentialProvider;

  private lambdaClient?: LambdaClient;
  private sqsClient?: SQSClient;
  private s3Client?: S3Client;
  private dynamoClient?: DynamoDBDocumentClient;
  private sfnClient?: SFNClient;
  private stsClient?: STSClient;

  constructor(options: SessionOptions) {
    this.profile = options.profile;
    this.region = options.region;
    this.credentials = options.profile ? fromIni({ profile: options.profile }) : fromNodeProviderChain();
  }

  private get clientConfig(): { region?: string; credentials: CredentialProvider } {
    return this.region ? { region: this.region, credentials: this.credentials } : { credentials: this.credentials };
  }

  get lambda(): LambdaClient {
    if (!this.lambdaClient) {
      this.lambdaClient = new LambdaClient(this.clientConfig);
    }
    return this.lambdaClient;
  }

  get sqs(): SQSClient {
    if (!this.sqsClient) {
      this.sqsClient = new SQSClient(this.clientConfig);
    }
    return this.sqsClient;
  }

  get s3(): S3Client {
    if (!this.s3Client) {
      this.s3Client = new S3Client(this.clientConfig);
    }
    return this.s3Client;
  }

  /** Document client: items come back as plain JS values */
  get dynamo(): DynamoDBDocumentClient {
    if (!this.dynamoClient) {
      this.dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient(this.clientConfig));
    }
    return this.dynamoClient;
  }

  get sfn(): SFNClient {
    if (!this.sfnClient) {
      this.sfnClient = new SFNClient(this.clientConfig);
    }
    return this.sfnClient;
  }

  get sts(): STSClient {
    if (!this.stsClient) {
      this.stsClient = new STSClient(this.clientConfig);
    }
    return this.stsClient;
  }

  /**
   * Resolve credentials by asking STS who we are. Fails with a
   * ConfigurationError when the profile has no usable credentials.
   */
  async validate(): Promise<CallerIdentity> {
    try {
      const identity = await this.sts.send(new GetCallerIdentityCommand({}));
      return { account: identity.Account, arn: identity.Arn, userId: identity.UserId };
    } catch (error) {
      const label = this.profile ? `profile "${this.profile}"` : 'default credentials';
      throw new ConfigurationError(`Could not authenticate with ${label}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /** Release the sockets of every client created so far. */
  destroy(): void {
    for (const client of [
      this.lambdaClient,
      this.sqsClient,
      this.s3Client,
      this.dynamoClient,
      this.sfnClient,
      this.stsClient,
    ]) {
      client?.destroy();
    }
  }
}

/**
 * Opens an authenticated session for a profile. Injected wherever a session
 * is needed so tests can substitute one that never touches the network.
 */
export type SessionFactory = (profile: string | null) => Promise<AwsSession>;

export function createSessionFactory(options: { region?: string } = {}): SessionFactory {
  return async (profile) => {
    const session = new AwsSession({ profile, region: options.region });
    await session.validate();
    return session;
  };
}
