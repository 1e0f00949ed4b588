import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';

let client: SecretsManagerClient | null = null;

function getClient(): SecretsManagerClient {
  if (client == null) {
    client = new SecretsManagerClient();
  }
  return client;
}

export class SecretsManager {
  static async fetchSecret(secretName: string): Promise<string | null> {
    const secret = await getClient().send(new GetSecretValueCommand({ SecretId: secretName }));
    return secret.SecretString ?? null;
  }

  /**
   * Fetch a secret stored as a JSON document. The shape is not checked here, validate it at the call site.
   */
  static async fetchSecretJson(secretName: string): Promise<unknown> {
    const secretString = await SecretsManager.fetchSecret(secretName);
    return secretString != null ? JSON.parse(secretString) : null;
  }
}
