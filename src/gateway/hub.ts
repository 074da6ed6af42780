import { randomUUID } from "node:crypto";
import type { PresenceEngine } from "../presence";
import type { VoiceRelay, VoiceRoomEvent } from "../voice";
import type { AuthenticatedUser } from "./auth";
import { describeError, logger } from "../logger";
import {
  encodeServerFrame,
  parseClientFrame,
  type ClientFrame,
  type ServerFrame,
} from "./protocol";

/** The slice of a WebSocket the hub writes to. */
export interface GatewaySocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

interface GatewayConnection {
  id: string;
  user: AuthenticatedUser;
  socket: GatewaySocket;
}

function toRoomFrame(event: VoiceRoomEvent): ServerFrame {
  switch (event.type) {
    case "joined":
      return { type: "voice_user_joined", roomId: event.roomId, participant: event.participant };
    case "left":
      return { type: "voice_user_left", roomId: event.roomId, userId: event.userId };
    case "mute":
      return {
        type: "voice_mute_changed",
        roomId: event.roomId,
        userId: event.userId,
        muted: event.muted,
      };
    case "deafen":
      return {
        type: "voice_deafen_changed",
        roomId: event.roomId,
        userId: event.userId,
        deafened: event.deafened,
      };
  }
}

/**
 * Binds authenticated sockets to the presence engine and the voice relay, and
 * fans their events back out as server frames.
 */
export class GatewayHub {
  private readonly connections = new Map<string, GatewayConnection>();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    private readonly presence: PresenceEngine,
    private readonly voice: VoiceRelay,
    private readonly createConnectionId: () => string = randomUUID,
  ) {
    this.unsubscribers.push(
      presence.onStatusChange((change) => {
        this.broadcast({ type: "status_changed", ...change });
      }),
      voice.onRoomEvent((event) => {
        const frame = toRoomFrame(event);
        for (const connectionId of event.recipients) {
          this.sendTo(connectionId, frame);
        }
      }),
      voice.onSignal((signal) => {
        this.sendTo(signal.targetConnectionId, {
          type: "voice_signal",
          kind: signal.kind,
          fromUserId: signal.fromUserId,
          payload: signal.payload,
        });
      }),
    );
  }

  attach(socket: GatewaySocket, user: AuthenticatedUser): string {
    const id = this.createConnectionId();
    // Registered after connect so the caller gets the snapshot instead of its own status event.
    this.presence.connect(user.userId, id, user.displayName, user.isAgent);
    this.connections.set(id, { id, user, socket });
    logger.info({ connectionId: id, userId: user.userId }, "Gateway connection attached");

    this.sendTo(id, { type: "online_users", users: this.presence.snapshot() });
    return id;
  }

  handleMessage(connectionId: string, raw: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      logger.debug({ connectionId }, "Frame for unknown connection dropped");
      return;
    }

    const parsed = parseClientFrame(raw);
    if (!parsed.ok) {
      logger.warn({ connectionId, error: parsed.message }, "Invalid client frame");
      this.sendTo(connectionId, {
        type: "error",
        code: "invalid_payload",
        message: parsed.message,
      });
      return;
    }

    this.dispatch(connection, parsed.frame);
  }

  detach(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return;
    }

    this.voice.handleDisconnect(connectionId);
    this.connections.delete(connectionId);
    this.presence.disconnect(connection.user.userId, connectionId);
    logger.info(
      { connectionId, userId: connection.user.userId },
      "Gateway connection detached",
    );
  }

  /**
   * Closes every socket the user holds and takes them offline at once, with no
   * grace period. Returns false when the user was not tracked.
   */
  signOut(userId: string, reason = "signed_out"): boolean {
    for (const connection of [...this.connections.values()]) {
      if (connection.user.userId !== userId) {
        continue;
      }
      this.voice.handleDisconnect(connection.id);
      this.connections.delete(connection.id);
      try {
        connection.socket.close(1000, reason);
      } catch (error) {
        logger.warn(
          { connectionId: connection.id, error: describeError(error) },
          "Failed to close gateway socket",
        );
      }
    }

    const wasTracked = this.presence.forceOffline(userId);
    logger.info({ userId, wasTracked }, "User signed out");
    return wasTracked;
  }

  /** API traffic from agent accounts counts as presence activity. */
  touchAgentActivity(user: AuthenticatedUser): boolean {
    if (!user.isAgent) {
      return false;
    }
    this.presence.touchAgentActivity(user.userId, user.displayName);
    return true;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  close(code = 1001, reason = "server_shutdown"): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    for (const connection of this.connections.values()) {
      try {
        connection.socket.close(code, reason);
      } catch (error) {
        logger.warn(
          { connectionId: connection.id, error: describeError(error) },
          "Failed to close gateway socket",
        );
      }
    }
    this.connections.clear();
  }

  private dispatch(connection: GatewayConnection, frame: ClientFrame): void {
    const { id, user } = connection;
    switch (frame.type) {
      case "heartbeat": {
        this.presence.heartbeat(user.userId);
        return;
      }
      case "set_status": {
        const result = this.presence.requestStatus(user.userId, frame.status);
        if (!result.ok) {
          this.sendTo(id, {
            type: "error",
            code: result.reason,
            message:
              result.reason === "invalid_status"
                ? `Status "${frame.status}" cannot be requested`
                : "User is not tracked",
          });
        }
        return;
      }
      case "voice_join": {
        const participants = this.voice.joinRoom(frame.roomId, user.userId, id, user.displayName);
        this.sendTo(id, { type: "voice_roster", roomId: frame.roomId, participants });
        return;
      }
      case "voice_leave": {
        this.voice.leaveRoom(frame.roomId, id);
        return;
      }
      case "voice_signal": {
        this.voice.relaySignal(frame.kind, user.userId, frame.toUserId, frame.payload);
        return;
      }
      case "voice_mute": {
        if (!this.voice.setMuted(frame.roomId, id, frame.muted)) {
          this.sendNotInRoom(id, frame.roomId);
        }
        return;
      }
      case "voice_deafen": {
        if (!this.voice.setDeafened(frame.roomId, id, frame.deafened)) {
          this.sendNotInRoom(id, frame.roomId);
        }
        return;
      }
      case "ice_servers": {
        this.sendTo(id, { type: "ice_servers", servers: this.voice.getIceServers() });
        return;
      }
    }
  }

  private sendNotInRoom(connectionId: string, roomId: string): void {
    this.sendTo(connectionId, {
      type: "error",
      code: "not_in_room",
      message: `Not a participant of room "${roomId}"`,
    });
  }

  private broadcast(frame: ServerFrame): void {
    const data = encodeServerFrame(frame);
    for (const connection of this.connections.values()) {
      this.write(connection, data);
    }
  }

  private sendTo(connectionId: string, frame: ServerFrame): void {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return;
    }
    this.write(connection, encodeServerFrame(frame));
  }

  private write(connection: GatewayConnection, data: string): void {
    try {
      connection.socket.send(data);
    } catch (error) {
      logger.warn(
        { connectionId: connection.id, error: describeError(error) },
        "Failed to write gateway frame",
      );
    }
  }
}
