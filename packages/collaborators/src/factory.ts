import type { Collaborators, RetryPolicy, Sleep } from "@meridian/core";
import { HttpAuditClient } from "./audit-client.js";
import { HttpChainClient } from "./chain-client.js";
import { HttpClient } from "./http/index.js";
import { MatrixChannelClient } from "./matrix-channel.js";

export interface CollaboratorsConfig {
  readonly matrix: { readonly homeserver: string; readonly accessToken: string };
  readonly chain: { readonly url: string; readonly didNamespace: string };
  readonly audit: {
    readonly messageUrl?: string;
    readonly approvalUrl?: string;
    readonly permissionInitUrl?: string;
    readonly subAgentUrl?: string;
  };
  readonly timeoutMs: number;
  /** Retry policy for audit reports; channel and chain calls are retried by their callers. */
  readonly retry: RetryPolicy;
  readonly sleep?: Sleep;
}

/**
 * Build the HTTP-backed collaborators.
 */
export function createHttpCollaborators(config: CollaboratorsConfig): Collaborators {
  const sleep = config.sleep === undefined ? {} : { sleep: config.sleep };
  // The delivery pipeline and the DID refresher own retries for these two.
  const single = { maxAttempts: 1 };

  const channel = new HttpClient({
    service: "matrix",
    baseUrl: config.matrix.homeserver,
    bearerToken: config.matrix.accessToken,
    timeout: config.timeoutMs,
    retry: single,
    ...sleep,
  });
  const chain = new HttpClient({
    service: "chain",
    baseUrl: config.chain.url,
    timeout: config.timeoutMs,
    retry: single,
    ...sleep,
  });
  const audit = new HttpClient({
    service: "audit",
    timeout: config.timeoutMs,
    retry: {
      maxAttempts: config.retry.maxAttempts,
      initialDelay: config.retry.baseDelayMs,
      maxDelay: config.retry.maxDelayMs,
      backoffMultiplier: config.retry.multiplier,
    },
    ...sleep,
  });

  return {
    channel: new MatrixChannelClient(channel),
    chain: new HttpChainClient(chain, config.chain.didNamespace),
    audit: new HttpAuditClient(audit, config.audit),
  };
}
