import { describe, test, expect, vi } from 'vitest';
import { STSClient } from '@aws-sdk/client-sts';
import { StsCredentialsChecker } from './credentials-checker.js';

function createChecker() {
  const client = new STSClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
  });
  const send = vi.spyOn(client, 'send');
  return { checker: new StsCredentialsChecker('us-east-1', client), send };
}

describe('StsCredentialsChecker', () => {
  test('reports the caller identity', async () => {
    const { checker, send } = createChecker();
    send.mockImplementation(async () => ({
      Account: '123456789012',
      Arn: 'arn:aws:iam::123456789012:user/operator',
    }));

    await expect(checker.validateCredentials()).resolves.toEqual({
      valid: true,
      accountId: '123456789012',
      arn: 'arn:aws:iam::123456789012:user/operator',
    });
  });

  test('reports invalid credentials without throwing', async () => {
    const { checker, send } = createChecker();
    send.mockImplementation(async () => {
      throw Object.assign(new Error('The security token included in the request is expired'), {
        name: 'ExpiredTokenException',
      });
    });

    await expect(checker.validateCredentials()).resolves.toEqual({
      valid: false,
      error: 'AWS credentials are invalid or expired: The security token included in the request is expired',
    });
  });
});
