export type SignalKind = "offer" | "answer" | "ice_candidate";

export const SIGNAL_KINDS: readonly SignalKind[] = ["offer", "answer", "ice_candidate"];

export interface VoiceParticipant {
  userId: string;
  displayName: string;
  connectionId: string;
  isMuted: boolean;
  isDeafened: boolean;
}

/** What other clients may see of a participant. */
export type VoiceParticipantView = Omit<VoiceParticipant, "connectionId">;

type RoomEventBase = {
  roomId: string;
  /** Connection ids of the other members at the time of the change. */
  recipients: string[];
};

export type VoiceRoomEvent =
  | (RoomEventBase & { type: "joined"; participant: VoiceParticipantView })
  | (RoomEventBase & { type: "left"; userId: string })
  | (RoomEventBase & { type: "mute"; userId: string; muted: boolean })
  | (RoomEventBase & { type: "deafen"; userId: string; deafened: boolean });

export interface SignalDelivery {
  kind: SignalKind;
  fromUserId: string;
  toUserId: string;
  targetConnectionId: string;
  payload: string;
}

export interface IceServer {
  urls: string[];
  username?: string;
  credential?: string;
}

export interface IceServerSettings {
  stunUrls: string[];
  turnUrl?: string;
  turnUsername?: string;
  turnCredential?: string;
}

export const DEFAULT_ICE_SERVER_SETTINGS: IceServerSettings = {
  stunUrls: ["stun:stun.l.google.com:19302"],
};
