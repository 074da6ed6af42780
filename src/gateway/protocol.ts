import { z } from "zod";
import type { PresenceChange, PresenceSnapshotEntry } from "../presence";
import type { IceServer, SignalKind, VoiceParticipantView } from "../voice";

const RoomIdSchema = z.string().trim().min(1).max(128);

export const ClientFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("heartbeat") }).strict(),
  // Validated by the presence engine so that rejected values get a typed reason.
  z.object({ type: z.literal("set_status"), status: z.string() }).strict(),
  z.object({ type: z.literal("voice_join"), roomId: RoomIdSchema }).strict(),
  z.object({ type: z.literal("voice_leave"), roomId: RoomIdSchema }).strict(),
  z
    .object({
      type: z.literal("voice_signal"),
      kind: z.enum(["offer", "answer", "ice_candidate"]),
      toUserId: z.string().min(1),
      payload: z.string(),
    })
    .strict(),
  z.object({ type: z.literal("voice_mute"), roomId: RoomIdSchema, muted: z.boolean() }).strict(),
  z
    .object({ type: z.literal("voice_deafen"), roomId: RoomIdSchema, deafened: z.boolean() })
    .strict(),
  z.object({ type: z.literal("ice_servers") }).strict(),
]);

export type ClientFrame = z.infer<typeof ClientFrameSchema>;

export type GatewayErrorCode =
  | "invalid_payload"
  | "invalid_status"
  | "not_tracked"
  | "not_in_room";

export type ServerFrame =
  | { type: "online_users"; users: PresenceSnapshotEntry[] }
  | ({ type: "status_changed" } & PresenceChange)
  | { type: "voice_roster"; roomId: string; participants: VoiceParticipantView[] }
  | { type: "voice_user_joined"; roomId: string; participant: VoiceParticipantView }
  | { type: "voice_user_left"; roomId: string; userId: string }
  | { type: "voice_mute_changed"; roomId: string; userId: string; muted: boolean }
  | { type: "voice_deafen_changed"; roomId: string; userId: string; deafened: boolean }
  | { type: "voice_signal"; kind: SignalKind; fromUserId: string; payload: string }
  | { type: "ice_servers"; servers: IceServer[] }
  | { type: "error"; code: GatewayErrorCode; message: string };

export type ParsedFrame =
  | { ok: true; frame: ClientFrame }
  | { ok: false; message: string };

export function parseClientFrame(raw: string): ParsedFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, message: "Frame is not valid JSON" };
  }

  const result = ClientFrameSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, message: `${where}${issue?.message ?? "Invalid frame"}` };
  }
  return { ok: true, frame: result.data };
}

export function encodeServerFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}
