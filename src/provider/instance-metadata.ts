/**
 * EC2 instance metadata service (IMDSv2) lookups
 */

import { ProviderError } from "../core/errors";
import { logger } from "../utils/logger";

export const IMDS_ENDPOINT = "http://169.254.169.254";
const TOKEN_TTL_SECONDS = 60;
const REQUEST_TIMEOUT_MS = 2000;

export interface InstanceMetadataOptions {
  endpoint?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

async function request(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new ProviderError(
      "InstanceMetadataUnavailable",
      `Instance metadata service unreachable (${url}): ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new ProviderError(
      "InstanceMetadataUnavailable",
      `Instance metadata request failed (${url}): HTTP ${response.status}`,
    );
  }

  return (await response.text()).trim();
}

/**
 * Id of the instance this process runs on
 */
export async function resolveLocalInstanceId(options: InstanceMetadataOptions = {}): Promise<string> {
  const endpoint = options.endpoint ?? IMDS_ENDPOINT;
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;

  const token = await request(
    fetchImpl,
    `${endpoint}/latest/api/token`,
    {
      method: "PUT",
      headers: { "X-aws-ec2-metadata-token-ttl-seconds": String(TOKEN_TTL_SECONDS) },
    },
    timeoutMs,
  );

  const instanceId = await request(
    fetchImpl,
    `${endpoint}/latest/meta-data/instance-id`,
    { headers: { "X-aws-ec2-metadata-token": token } },
    timeoutMs,
  );

  if (!instanceId) {
    throw new ProviderError("InstanceMetadataUnavailable", "Instance metadata returned an empty instance id");
  }

  logger.debug(`Local instance id: ${instanceId}`);
  return instanceId;
}
