export { PresenceEngine } from "./engine";
export {
  DEFAULT_PRESENCE_OPTIONS,
  PRESENCE_STATUSES,
  REQUESTABLE_STATUSES,
  isRequestableStatus,
  type ConnectionId,
  type PresenceChange,
  type PresenceOptions,
  type PresenceSnapshotEntry,
  type PresenceStatus,
  type RequestableStatus,
  type StatusRequestResult,
  type TrackedStatus,
  type UserPresence,
} from "./types";
