/**
 * @meridian/hub
 *
 * Message and identity hub: room provisioning, message translation,
 * agent-to-agent delivery, approvals, registration flows and the HTTP API,
 * composed over one persistence backend.
 */

export {
  type ApprovalCoordinatorOptions,
  approvalCard,
  ApprovalCoordinator,
  type ApprovalState,
  DEFAULT_REPLY_WINDOW_MS,
  replyDecision,
  type ReplyInput,
  type ResolveInput,
  type SubmitResult,
} from "./approval-coordinator.js";
export { type RunningHub, type StartOptions, main, startHub } from "./cli.js";
export { type DeliveryOrdering, HUB_VERSION, type HubConfig, loadConfig } from "./config.js";
export {
  type DeliveryPipelineOptions,
  DeliveryPipeline,
  type DeliveryQuery,
  type SendRequest,
  type SendResult,
} from "./delivery-pipeline.js";
export { createCollaborators, createHub, type Hub, type HubOptions } from "./hub.js";
export { HubServer, type HubServerOptions } from "./http/hub-server.js";
export {
  type HumanRegistration,
  type HumanRegistrationResult,
  RegistrationService,
  type RegistrationServiceOptions,
  type SubAgentRegistration,
  type SubAgentRegistrationResult,
} from "./registration-service.js";
export { type Attempted, attemptWithRetry, type AttemptOptions } from "./retry.js";
export { RoomManager, type RoomManagerOptions } from "./room-manager.js";
export { type IdentityResolver, Translator } from "./translator.js";
