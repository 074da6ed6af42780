import { EventStream, type EventHandler } from "../infra/event-stream";
import { TimerManager } from "../infra/timer-manager";
import { logger } from "../logger";
import {
  DEFAULT_PRESENCE_OPTIONS,
  isRequestableStatus,
  type ConnectionId,
  type PresenceChange,
  type PresenceOptions,
  type PresenceSnapshotEntry,
  type PresenceStatus,
  type StatusRequestResult,
  type UserPresence,
} from "./types";

type PresenceTimerKind = "grace" | "idle" | "agent";

/**
 * In-memory presence registry for every connected user.
 *
 * Each public method runs to completion without yielding, so the
 * "last connection gone" and "still disconnected at grace expiry" decisions
 * are made and committed in one step against the same registry state that
 * connect/disconnect mutate.
 */
export class PresenceEngine {
  private readonly users = new Map<string, UserPresence>();
  private readonly timers = new TimerManager<PresenceTimerKind>("presence");
  private readonly changes = new EventStream<PresenceChange>("presence");
  private readonly options: PresenceOptions;

  constructor(options: Partial<PresenceOptions> = {}) {
    this.options = { ...DEFAULT_PRESENCE_OPTIONS, ...options };
  }

  onStatusChange(handler: EventHandler<PresenceChange>): () => void {
    return this.changes.subscribe(handler);
  }

  connect(
    userId: string,
    connectionId: ConnectionId,
    displayName: string,
    isAgent = false,
  ): void {
    this.timers.cancel(userId, "grace");

    let presence = this.users.get(userId);
    const previous: PresenceStatus = presence?.status ?? "offline";
    if (!presence) {
      presence = {
        userId,
        displayName,
        isAgent,
        status: "online",
        connections: new Set(),
        lastHeartbeat: Date.now(),
      };
      this.users.set(userId, presence);
    }

    presence.connections.add(connectionId);
    presence.displayName = displayName;
    presence.isAgent = isAgent;
    presence.lastHeartbeat = Date.now();
    presence.status = "online";

    this.resetIdleTimer(presence);

    logger.debug(
      { userId, connectionId, connections: presence.connections.size },
      "Presence connection added",
    );

    if (previous !== "online") {
      this.transition(presence, "online", previous);
    }
  }

  disconnect(userId: string, connectionId: ConnectionId): boolean {
    const presence = this.users.get(userId);
    if (!presence) {
      return true;
    }

    const removed = presence.connections.delete(connectionId);
    if (presence.connections.size > 0) {
      return false;
    }
    if (!removed) {
      return true;
    }

    this.timers.cancel(userId, "idle");
    this.timers.start(userId, "grace", this.options.gracePeriodMs, () =>
      this.expireGracePeriod(userId),
    );
    logger.debug(
      { userId, connectionId, gracePeriodMs: this.options.gracePeriodMs },
      "Last connection closed; grace period started",
    );
    return true;
  }

  heartbeat(userId: string): void {
    const presence = this.users.get(userId);
    if (!presence) {
      return;
    }

    presence.lastHeartbeat = Date.now();
    if (presence.status === "idle") {
      presence.status = "online";
      this.transition(presence, "online", "idle");
    }
    this.resetIdleTimer(presence);
  }

  requestStatus(userId: string, desired: unknown): StatusRequestResult {
    if (!isRequestableStatus(desired)) {
      logger.warn({ userId, desired }, "Rejected presence status request");
      return { ok: false, reason: "invalid_status" };
    }

    const presence = this.users.get(userId);
    if (!presence) {
      logger.debug({ userId, desired }, "Status request for untracked user ignored");
      return { ok: false, reason: "not_tracked" };
    }

    const previous = presence.status;
    switch (desired) {
      case "online": {
        presence.lastHeartbeat = Date.now();
        presence.status = "online";
        this.resetIdleTimer(presence);
        break;
      }
      case "idle": {
        if (previous === "dnd") {
          return { ok: true, status: previous, changed: false };
        }
        this.timers.cancel(userId, "idle");
        presence.status = "idle";
        break;
      }
      case "dnd": {
        this.timers.cancel(userId, "idle");
        presence.status = "dnd";
        break;
      }
    }

    if (previous === presence.status) {
      return { ok: true, status: presence.status, changed: false };
    }
    this.transition(presence, presence.status, previous);
    return { ok: true, status: presence.status, changed: true };
  }

  forceOffline(userId: string): boolean {
    this.timers.cancelAll(userId);
    const presence = this.users.get(userId);
    if (!presence) {
      return false;
    }
    this.users.delete(userId);
    this.transition(presence, "offline", presence.status);
    return true;
  }

  /**
   * Keeps an API-key account online without a socket. Each touch restarts the
   * agent inactivity window; grace and idle timers do not apply to such users.
   */
  touchAgentActivity(userId: string, displayName: string): void {
    let presence = this.users.get(userId);
    const previous: PresenceStatus = presence?.status ?? "offline";
    if (!presence) {
      presence = {
        userId,
        displayName,
        isAgent: true,
        status: "online",
        connections: new Set(),
        lastHeartbeat: Date.now(),
      };
      this.users.set(userId, presence);
    }

    presence.displayName = displayName;
    presence.isAgent = true;
    presence.lastHeartbeat = Date.now();
    if (presence.status === "idle") {
      presence.status = "online";
    }

    this.timers.cancel(userId, "grace");
    this.timers.start(userId, "agent", this.options.agentInactivityTimeoutMs, () =>
      this.expireAgentActivity(userId),
    );
    this.resetIdleTimer(presence);

    if (previous !== presence.status) {
      this.transition(presence, presence.status, previous);
    }
  }

  getStatus(userId: string): PresenceStatus {
    return this.users.get(userId)?.status ?? "offline";
  }

  isTracked(userId: string): boolean {
    return this.users.has(userId);
  }

  getConnectionCount(userId: string): number {
    return this.users.get(userId)?.connections.size ?? 0;
  }

  snapshot(): PresenceSnapshotEntry[] {
    return Array.from(this.users.values(), (presence) => ({
      userId: presence.userId,
      displayName: presence.displayName,
      status: presence.status,
      isAgent: presence.isAgent,
    }));
  }

  dispose(): void {
    this.timers.cancelAll();
    this.changes.clear();
  }

  private expireGracePeriod(userId: string): void {
    const presence = this.users.get(userId);
    if (!presence || presence.connections.size > 0) {
      return;
    }
    if (this.timers.has(userId, "agent")) {
      return;
    }
    this.commitOffline(presence);
  }

  private expireAgentActivity(userId: string): void {
    const presence = this.users.get(userId);
    if (!presence || presence.connections.size > 0) {
      return;
    }
    this.commitOffline(presence);
  }

  private expireIdleTimer(userId: string): void {
    const presence = this.users.get(userId);
    if (!presence || presence.status !== "online" || presence.connections.size === 0) {
      return;
    }

    const elapsed = Date.now() - presence.lastHeartbeat;
    if (elapsed < this.options.idleTimeoutMs) {
      this.timers.start(userId, "idle", this.options.idleTimeoutMs - elapsed, () =>
        this.expireIdleTimer(userId),
      );
      return;
    }

    presence.status = "idle";
    this.transition(presence, "idle", "online");
  }

  private resetIdleTimer(presence: UserPresence): void {
    this.timers.cancel(presence.userId, "idle");
    if (presence.status === "dnd" || presence.connections.size === 0) {
      return;
    }
    const userId = presence.userId;
    this.timers.start(userId, "idle", this.options.idleTimeoutMs, () =>
      this.expireIdleTimer(userId),
    );
  }

  private commitOffline(presence: UserPresence): void {
    this.timers.cancelAll(presence.userId);
    this.users.delete(presence.userId);
    this.transition(presence, "offline", presence.status);
  }

  private transition(
    presence: UserPresence,
    status: PresenceStatus,
    previous: PresenceStatus,
  ): void {
    logger.info(
      { userId: presence.userId, displayName: presence.displayName, from: previous, to: status },
      "Presence status changed",
    );
    this.changes.publish({
      userId: presence.userId,
      displayName: presence.displayName,
      status,
      isAgent: presence.isAgent,
    });
  }
}
