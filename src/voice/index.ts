export { VoiceRelay } from "./relay";
export { buildIceServers } from "./ice-servers";
export {
  DEFAULT_ICE_SERVER_SETTINGS,
  SIGNAL_KINDS,
  type IceServer,
  type IceServerSettings,
  type SignalDelivery,
  type SignalKind,
  type VoiceParticipant,
  type VoiceParticipantView,
  type VoiceRoomEvent,
} from "./types";
