/**
 * Credential providers for the EC2 client
 */

import type { CredentialsConfig } from "../types";
import { ProviderError } from "../core/errors";

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface CredentialProvider {
  readonly source: string;
  /**
   * Credentials to hand to the EC2 client, or undefined to let the SDK's
   * default chain (environment, shared config, instance role) find them
   */
  resolve(): AwsCredentials | undefined;
}

export class DefaultChainCredentialProvider implements CredentialProvider {
  readonly source = "default";

  resolve(): AwsCredentials | undefined {
    return undefined;
  }
}

/**
 * Reads AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY / AWS_SESSION_TOKEN from
 * the given environment map
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  readonly source = "environment";

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  resolve(): AwsCredentials {
    const accessKeyId = this.env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = this.env.AWS_SECRET_ACCESS_KEY;

    if (!accessKeyId || !secretAccessKey) {
      throw new ProviderError(
        "CredentialsNotFound",
        "AWS credentials not found. Set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY, or use credentials.source: default.",
      );
    }

    const sessionToken = this.env.AWS_SESSION_TOKEN;
    return { accessKeyId, secretAccessKey, ...(sessionToken && { sessionToken }) };
  }
}

export class StaticCredentialProvider implements CredentialProvider {
  readonly source = "static";

  constructor(private readonly credentials: AwsCredentials) {}

  resolve(): AwsCredentials {
    return { ...this.credentials };
  }
}

export function createCredentialProvider(
  config: CredentialsConfig,
  env: NodeJS.ProcessEnv = process.env,
): CredentialProvider {
  switch (config.source) {
    case "default":
      return new DefaultChainCredentialProvider();

    case "environment":
      return new EnvironmentCredentialProvider(env);

    case "static": {
      if (!config.accessKeyId || !config.secretAccessKey) {
        throw new ProviderError(
          "CredentialsNotFound",
          "credentials.accessKeyId and credentials.secretAccessKey are required when credentials.source is 'static'",
        );
      }
      return new StaticCredentialProvider({
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
        ...(config.sessionToken && { sessionToken: config.sessionToken }),
      });
    }
  }
}
