import { describe, expect, it } from "vitest";
import { encodeServerFrame, parseClientFrame } from "./protocol";

describe("parseClientFrame", () => {
  it("accepts each client frame type", () => {
    const frames = [
      { type: "heartbeat" },
      { type: "set_status", status: "dnd" },
      { type: "voice_join", roomId: "general" },
      { type: "voice_leave", roomId: "general" },
      { type: "voice_signal", kind: "offer", toUserId: "bob", payload: "v=0" },
      { type: "voice_mute", roomId: "general", muted: true },
      { type: "voice_deafen", roomId: "general", deafened: false },
      { type: "ice_servers" },
    ];

    for (const frame of frames) {
      expect(parseClientFrame(JSON.stringify(frame))).toEqual({ ok: true, frame });
    }
  });

  it("lets any status string through to the presence engine", () => {
    expect(parseClientFrame(`{"type":"set_status","status":"offline"}`)).toEqual({
      ok: true,
      frame: { type: "set_status", status: "offline" },
    });
  });

  it("rejects malformed JSON", () => {
    expect(parseClientFrame("{not json")).toEqual({
      ok: false,
      message: "Frame is not valid JSON",
    });
  });

  it("rejects unknown frame types", () => {
    const result = parseClientFrame(`{"type":"shout"}`);
    expect(result.ok).toBe(false);
  });

  it("rejects unknown signal kinds", () => {
    const result = parseClientFrame(
      `{"type":"voice_signal","kind":"renegotiate","toUserId":"bob","payload":""}`,
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.message.startsWith("kind: ")).toBe(true);
    }
  });

  it("rejects blank room ids and extra fields", () => {
    expect(parseClientFrame(`{"type":"voice_join","roomId":"  "}`).ok).toBe(false);
    expect(parseClientFrame(`{"type":"heartbeat","extra":1}`).ok).toBe(false);
  });

  it("trims room ids", () => {
    expect(parseClientFrame(`{"type":"voice_leave","roomId":" general "}`)).toEqual({
      ok: true,
      frame: { type: "voice_leave", roomId: "general" },
    });
  });
});

describe("encodeServerFrame", () => {
  it("serializes frames as JSON", () => {
    expect(encodeServerFrame({ type: "voice_user_left", roomId: "general", userId: "alice" })).toBe(
      `{"type":"voice_user_left","roomId":"general","userId":"alice"}`,
    );
  });
});
