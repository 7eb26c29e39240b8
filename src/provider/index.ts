/**
 * Provider module exports
 */

import type { ComputeProvider, VolsnapConfig } from "../types";
import { createCredentialProvider } from "./credentials";
import { Ec2Provider } from "./ec2";

export {
  type AwsCredentials,
  type CredentialProvider,
  createCredentialProvider,
  DefaultChainCredentialProvider,
  EnvironmentCredentialProvider,
  StaticCredentialProvider,
} from "./credentials";
export { createEc2Api, type Ec2Api, Ec2Provider, type Ec2ProviderOptions } from "./ec2";
export { IMDS_ENDPOINT, resolveLocalInstanceId } from "./instance-metadata";

/**
 * Create the compute provider based on config
 */
export function createComputeProvider(config: VolsnapConfig): ComputeProvider {
  return new Ec2Provider({
    region: config.region,
    credentials: createCredentialProvider(config.credentials),
    ...(config.endpoint && { endpoint: config.endpoint }),
  });
}
