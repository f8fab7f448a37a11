import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';

export interface AwsCredentialsStatus {
  readonly valid: boolean;
  readonly accountId?: string;
  readonly arn?: string;
  readonly error?: string;
}

/**
 * Resolves the caller identity from the default credential chain, so the
 * terminal front end can fail fast before any API Gateway call.
 */
export class StsCredentialsChecker {
  private client: STSClient;

  constructor(region: string, client?: STSClient) {
    this.client = client ?? new STSClient({ region });
  }

  async validateCredentials(): Promise<AwsCredentialsStatus> {
    try {
      const response = await this.client.send(new GetCallerIdentityCommand({}));

      return {
        valid: true,
        accountId: response.Account,
        arn: response.Arn,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return {
        valid: false,
        error: `AWS credentials are invalid or expired: ${errorMessage}`,
      };
    }
  }
}

export function createStsCredentialsChecker(region: string): StsCredentialsChecker {
  return new StsCredentialsChecker(region);
}
