export const PRESENCE_STATUSES = ["online", "idle", "dnd", "offline"] as const;
export type PresenceStatus = (typeof PRESENCE_STATUSES)[number];

/** Statuses a client may ask for. Offline is reached by disconnecting. */
export const REQUESTABLE_STATUSES = ["online", "idle", "dnd"] as const;
export type RequestableStatus = (typeof REQUESTABLE_STATUSES)[number];

/** Statuses held by a user present in the registry. */
export type TrackedStatus = RequestableStatus;

export type ConnectionId = string;

export interface UserPresence {
  userId: string;
  displayName: string;
  isAgent: boolean;
  status: TrackedStatus;
  connections: Set<ConnectionId>;
  lastHeartbeat: number;
}

export interface PresenceChange {
  userId: string;
  displayName: string;
  status: PresenceStatus;
  isAgent: boolean;
}

export type PresenceSnapshotEntry = PresenceChange;

export type StatusRequestResult =
  | { ok: true; status: TrackedStatus; changed: boolean }
  | { ok: false; reason: "invalid_status" | "not_tracked" };

export interface PresenceOptions {
  gracePeriodMs: number;
  idleTimeoutMs: number;
  agentInactivityTimeoutMs: number;
}

export const DEFAULT_PRESENCE_OPTIONS: PresenceOptions = {
  gracePeriodMs: 30_000,
  idleTimeoutMs: 5 * 60_000,
  agentInactivityTimeoutMs: 5 * 60_000,
};

export function isRequestableStatus(value: unknown): value is RequestableStatus {
  return typeof value === "string" && (REQUESTABLE_STATUSES as readonly string[]).includes(value);
}
