export { createFakeClock, createRecordingSleep, type FakeClock, type RecordingSleep } from "./clock.js";
export {
  createDeferred,
  createMockCollaborators,
  type Deferred,
  MockAuditCollaborator,
  MockChainCollaborator,
  MockChannelCollaborator,
  type MockCollaborators,
} from "./collaborators.js";
export { FakeSqlClient, type FakeSqlClientOptions } from "./fake-sql.js";
