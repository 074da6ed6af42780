import { EventStream, type EventHandler } from "../infra/event-stream";
import { logger } from "../logger";
import { buildIceServers } from "./ice-servers";
import {
  DEFAULT_ICE_SERVER_SETTINGS,
  type IceServer,
  type IceServerSettings,
  type SignalDelivery,
  type SignalKind,
  type VoiceParticipant,
  type VoiceParticipantView,
  type VoiceRoomEvent,
} from "./types";

type VoiceRoom = Map<string, VoiceParticipant>;

function toView(participant: VoiceParticipant): VoiceParticipantView {
  return {
    userId: participant.userId,
    displayName: participant.displayName,
    isMuted: participant.isMuted,
    isDeafened: participant.isDeafened,
  };
}

/**
 * Voice room rosters and WebRTC signaling routes. Rooms live only while they
 * have members; signals are routed by scanning the live rooms, which are the
 * single record of who is reachable.
 */
export class VoiceRelay {
  private readonly rooms = new Map<string, VoiceRoom>();
  private readonly roomEvents = new EventStream<VoiceRoomEvent>("voice-room");
  private readonly signals = new EventStream<SignalDelivery>("voice-signal");
  private readonly iceServers: IceServer[];

  constructor(iceServerSettings: IceServerSettings = DEFAULT_ICE_SERVER_SETTINGS) {
    this.iceServers = buildIceServers(iceServerSettings);
  }

  onRoomEvent(handler: EventHandler<VoiceRoomEvent>): () => void {
    return this.roomEvents.subscribe(handler);
  }

  onSignal(handler: EventHandler<SignalDelivery>): () => void {
    return this.signals.subscribe(handler);
  }

  joinRoom(
    roomId: string,
    userId: string,
    connectionId: string,
    displayName: string,
  ): VoiceParticipantView[] {
    let room = this.rooms.get(roomId);
    if (!room) {
      room = new Map();
      this.rooms.set(roomId, room);
    }

    const participant: VoiceParticipant = {
      userId,
      displayName,
      connectionId,
      isMuted: false,
      isDeafened: false,
    };
    room.set(connectionId, participant);

    logger.info({ roomId, userId, members: room.size }, "User joined voice room");

    this.roomEvents.publish({
      type: "joined",
      roomId,
      recipients: this.otherConnections(room, connectionId),
      participant: toView(participant),
    });

    return Array.from(room.values(), toView);
  }

  leaveRoom(roomId: string, connectionId: string): boolean {
    const room = this.rooms.get(roomId);
    const participant = room?.get(connectionId);
    if (!room || !participant) {
      return false;
    }

    this.removeParticipant(roomId, room, participant);
    logger.info({ roomId, userId: participant.userId }, "User left voice room");
    return true;
  }

  relaySignal(kind: SignalKind, fromUserId: string, toUserId: string, payload: string): boolean {
    const target = this.findParticipant(toUserId);
    if (!target) {
      logger.warn({ kind, fromUserId, toUserId }, "Dropped voice signal for unreachable user");
      return false;
    }

    logger.debug({ kind, fromUserId, toUserId }, "Relaying voice signal");
    this.signals.publish({
      kind,
      fromUserId,
      toUserId,
      targetConnectionId: target.connectionId,
      payload,
    });
    return true;
  }

  setMuted(roomId: string, connectionId: string, muted: boolean): boolean {
    const room = this.rooms.get(roomId);
    const participant = room?.get(connectionId);
    if (!room || !participant) {
      return false;
    }
    if (participant.isMuted === muted) {
      return true;
    }

    participant.isMuted = muted;
    logger.debug({ roomId, userId: participant.userId, muted }, "Voice mute changed");
    this.roomEvents.publish({
      type: "mute",
      roomId,
      recipients: this.otherConnections(room, connectionId),
      userId: participant.userId,
      muted,
    });
    return true;
  }

  setDeafened(roomId: string, connectionId: string, deafened: boolean): boolean {
    const room = this.rooms.get(roomId);
    const participant = room?.get(connectionId);
    if (!room || !participant) {
      return false;
    }
    if (participant.isDeafened === deafened) {
      return true;
    }

    participant.isDeafened = deafened;
    logger.debug({ roomId, userId: participant.userId, deafened }, "Voice deafen changed");
    this.roomEvents.publish({
      type: "deafen",
      roomId,
      recipients: this.otherConnections(room, connectionId),
      userId: participant.userId,
      deafened,
    });
    return true;
  }

  /** Removes the connection from every room it joined; returns the affected room ids. */
  handleDisconnect(connectionId: string): string[] {
    const affected: string[] = [];
    for (const [roomId, room] of [...this.rooms]) {
      const participant = room.get(connectionId);
      if (!participant) {
        continue;
      }
      this.removeParticipant(roomId, room, participant);
      affected.push(roomId);
    }

    if (affected.length > 0) {
      logger.info({ connectionId, roomIds: affected }, "Connection dropped from voice rooms");
    }
    return affected;
  }

  getRoomRoster(roomId: string): VoiceParticipantView[] {
    const room = this.rooms.get(roomId);
    return room ? Array.from(room.values(), toView) : [];
  }

  hasRoom(roomId: string): boolean {
    return this.rooms.has(roomId);
  }

  roomIds(): string[] {
    return [...this.rooms.keys()];
  }

  /** Copy of the first participant entry held by `userId`, across all rooms. */
  findParticipantByUserId(userId: string): VoiceParticipant | undefined {
    const participant = this.findParticipant(userId);
    return participant ? { ...participant } : undefined;
  }

  getIceServers(): IceServer[] {
    return this.iceServers.map((server) => ({ ...server, urls: [...server.urls] }));
  }

  dispose(): void {
    this.rooms.clear();
    this.roomEvents.clear();
    this.signals.clear();
  }

  private findParticipant(userId: string): VoiceParticipant | undefined {
    for (const room of this.rooms.values()) {
      for (const participant of room.values()) {
        if (participant.userId === userId) {
          return participant;
        }
      }
    }
    return undefined;
  }

  private removeParticipant(roomId: string, room: VoiceRoom, participant: VoiceParticipant): void {
    room.delete(participant.connectionId);
    if (room.size === 0) {
      this.rooms.delete(roomId);
    }

    this.roomEvents.publish({
      type: "left",
      roomId,
      recipients: this.otherConnections(room, participant.connectionId),
      userId: participant.userId,
    });
  }

  private otherConnections(room: VoiceRoom, excludeConnectionId: string): string[] {
    const connections: string[] = [];
    for (const connectionId of room.keys()) {
      if (connectionId !== excludeConnectionId) {
        connections.push(connectionId);
      }
    }
    return connections;
  }
}
