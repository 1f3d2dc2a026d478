export { BackgroundTasks } from "./background-tasks.js";

export { KeyedSerialExecutor } from "./keyed-serial-executor.js";
export { type Clock, defaultClock, defaultSleep, isoNow, type Sleep } from "./clock-types.js";

export type {
  ApprovalAuditEvent,
  AuditCollaborator,
  ChainCollaborator,
  ChannelCollaborator,
  Collaborators,
  CreateRoomRequest,
  MessageAuditEvent,
  PermissionInitNotice,
  SendMessageRequest,
  SubAgentNotice,
} from "./collaborator-types.js";

export {
  cloneJson,
  isJsonObject,
  type JsonObject,
  JsonObjectSchema,
  type JsonPrimitive,
  jsonEquals,
  type JsonValue,
  JsonValueSchema,
  stableStringify,
} from "./json.js";

export {
  type AuditFields,
  type CardAction,
  CardActionSchema,
  type CardElement,
  CardElementSchema,
  type ChannelContent,
  ChannelContentSchema,
  type ChannelEvent,
  ChannelEventSchema,
  type ChannelMsgtype,
  ChannelMsgtypeSchema,
  type ChannelPayload,
  type NativeMessage,
  type NativeMessageInput,
  NativeMessageSchema,
  type PostElement,
  PostElementSchema,
  type Translation,
  type TranslationWarning,
} from "./message-types.js";

export {
  type Agent,
  AgentSchema,
  type AgentStatus,
  AgentStatusSchema,
  type ApprovalCard,
  ApprovalCardSchema,
  type ApprovalDecision,
  ApprovalDecisionSchema,
  type ApprovalRequest,
  ApprovalRequestSchema,
  type ApprovalResult,
  ApprovalResultSchema,
  type Binding,
  BindingSchema,
  type DeliveryRecord,
  DeliveryRecordSchema,
  type DeliveryStatus,
  DeliveryStatusSchema,
  type DidRegistration,
  DidRegistrationSchema,
  type IdentityLink,
  IdentityLinkSchema,
  type IdentityNamespace,
  MAX_ID_LENGTH,
  type Owner,
  type OwnerChange,
  OwnerChangeSchema,
  OwnerSchema,
  type PairingCodeRecord,
  PairingCodeRecordSchema,
  type PairingConsumption,
  PairingConsumptionSchema,
  type PresenceRecord,
  PresenceRecordSchema,
  type RegistrationInitiator,
  RegistrationInitiatorSchema,
  type RelationshipEdge,
  RelationshipEdgeSchema,
  type Room,
  type RoomPolicy,
  RoomPolicySchema,
  type RoomRecord,
  RoomRecordSchema,
  SYSTEM_SENDER,
} from "./record-types.js";

export { backoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry-policy.js";
