/**
 * @meridian/collaborators
 *
 * HTTP clients for the hub's external collaborators: the Matrix homeserver,
 * the chain DID service and the audit/policy service.
 */

export {
  type HttpClientConfig,
  HttpClient,
  type HttpRetryOptions,
  type RequestOptions,
} from "./http/index.js";
export { type AuditEndpoints, HttpAuditClient } from "./audit-client.js";
export { formatDid, HttpChainClient } from "./chain-client.js";
export { type CollaboratorsConfig, createHttpCollaborators } from "./factory.js";
export { AUDIT_CONTENT_KEY, MatrixChannelClient, type MatrixChannelOptions } from "./matrix-channel.js";
