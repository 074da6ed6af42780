import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SignalDelivery, VoiceRoomEvent } from "./types";
import { logger } from "../logger";
import { VoiceRelay } from "./relay";

describe("VoiceRelay", () => {
  let relay: VoiceRelay;
  let events: VoiceRoomEvent[];
  let signals: SignalDelivery[];

  beforeEach(() => {
    relay = new VoiceRelay();
    events = [];
    signals = [];
    relay.onRoomEvent((event) => events.push(event));
    relay.onSignal((signal) => signals.push(signal));
  });

  afterEach(() => {
    relay.dispose();
    vi.restoreAllMocks();
  });

  describe("joinRoom", () => {
    it("creates the room and returns the roster without connection ids", () => {
      const roster = relay.joinRoom("general", "alice", "conn-a", "Alice");

      expect(relay.hasRoom("general")).toBe(true);
      expect(roster).toEqual([
        { userId: "alice", displayName: "Alice", isMuted: false, isDeafened: false },
      ]);
      expect(events).toEqual([
        {
          type: "joined",
          roomId: "general",
          recipients: [],
          participant: { userId: "alice", displayName: "Alice", isMuted: false, isDeafened: false },
        },
      ]);
    });

    it("notifies the existing members of a new participant", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      const roster = relay.joinRoom("general", "bob", "conn-b", "Bob");

      expect(roster.map((p) => p.userId)).toEqual(["alice", "bob"]);
      expect(events[1]).toEqual({
        type: "joined",
        roomId: "general",
        recipients: ["conn-a"],
        participant: { userId: "bob", displayName: "Bob", isMuted: false, isDeafened: false },
      });
    });

    it("replaces the entry when the same connection joins twice", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      relay.setMuted("general", "conn-a", true);
      const roster = relay.joinRoom("general", "alice", "conn-a", "Alice");

      expect(roster).toEqual([
        { userId: "alice", displayName: "Alice", isMuted: false, isDeafened: false },
      ]);
      expect(relay.getRoomRoster("general")).toHaveLength(1);
    });
  });

  describe("two connections from one user", () => {
    it("keeps one entry per connection and removes the room after the last leaves", () => {
      relay.joinRoom("general", "bob", "conn-1", "Bob");
      relay.joinRoom("general", "bob", "conn-2", "Bob");
      expect(relay.getRoomRoster("general")).toEqual([
        { userId: "bob", displayName: "Bob", isMuted: false, isDeafened: false },
        { userId: "bob", displayName: "Bob", isMuted: false, isDeafened: false },
      ]);

      expect(relay.handleDisconnect("conn-1")).toEqual(["general"]);
      expect(relay.hasRoom("general")).toBe(true);
      expect(relay.getRoomRoster("general")).toHaveLength(1);

      expect(relay.leaveRoom("general", "conn-2")).toBe(true);
      expect(relay.hasRoom("general")).toBe(false);
      expect(relay.getRoomRoster("general")).toEqual([]);
    });
  });

  describe("leaveRoom", () => {
    it("notifies the remaining members", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      relay.joinRoom("general", "bob", "conn-b", "Bob");
      events.length = 0;

      relay.leaveRoom("general", "conn-a");

      expect(events).toEqual([
        { type: "left", roomId: "general", recipients: ["conn-b"], userId: "alice" },
      ]);
      expect(relay.getRoomRoster("general").map((p) => p.userId)).toEqual(["bob"]);
    });

    it("deletes the room when the last member leaves", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      events.length = 0;

      relay.leaveRoom("general", "conn-a");

      expect(relay.roomIds()).toEqual([]);
      expect(events).toEqual([
        { type: "left", roomId: "general", recipients: [], userId: "alice" },
      ]);
    });

    it("returns false for unknown rooms and connections", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      events.length = 0;

      expect(relay.leaveRoom("lobby", "conn-a")).toBe(false);
      expect(relay.leaveRoom("general", "conn-z")).toBe(false);
      expect(events).toEqual([]);
    });
  });

  describe("relaySignal", () => {
    it("forwards the payload verbatim to the target's connection", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      relay.joinRoom("general", "bob", "conn-b", "Bob");
      const sdp = "v=0\r\no=- 46117317 2 IN IP4 127.0.0.1\r\n";

      expect(relay.relaySignal("offer", "alice", "bob", sdp)).toBe(true);

      expect(signals).toEqual([
        {
          kind: "offer",
          fromUserId: "alice",
          toUserId: "bob",
          targetConnectionId: "conn-b",
          payload: sdp,
        },
      ]);
    });

    it("finds targets in any room", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      relay.joinRoom("music", "carol", "conn-c", "Carol");

      relay.relaySignal("ice_candidate", "alice", "carol", "candidate:1 1 udp 1 10.0.0.1 5000 typ host");

      expect(signals[0]?.targetConnectionId).toBe("conn-c");
    });

    it("drops signals for users in no room and logs a warning", () => {
      const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => undefined);
      relay.joinRoom("general", "alice", "conn-a", "Alice");

      expect(relay.relaySignal("answer", "alice", "nobody", "sdp")).toBe(false);
      expect(signals).toEqual([]);
      expect(warnSpy).toHaveBeenCalledWith(
        { kind: "answer", fromUserId: "alice", toUserId: "nobody" },
        "Dropped voice signal for unreachable user",
      );
    });
  });

  describe("mute and deafen", () => {
    beforeEach(() => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      relay.joinRoom("general", "bob", "conn-b", "Bob");
      events.length = 0;
    });

    it("updates the flag and notifies everyone else in the room", () => {
      expect(relay.setMuted("general", "conn-a", true)).toBe(true);
      expect(relay.setDeafened("general", "conn-a", true)).toBe(true);

      expect(relay.getRoomRoster("general")[0]).toEqual({
        userId: "alice",
        displayName: "Alice",
        isMuted: true,
        isDeafened: true,
      });
      expect(events).toEqual([
        { type: "mute", roomId: "general", recipients: ["conn-b"], userId: "alice", muted: true },
        {
          type: "deafen",
          roomId: "general",
          recipients: ["conn-b"],
          userId: "alice",
          deafened: true,
        },
      ]);
    });

    it("does not emit when the flag is unchanged", () => {
      relay.setMuted("general", "conn-a", false);
      relay.setDeafened("general", "conn-b", false);

      expect(events).toEqual([]);
    });

    it("returns false for participants that are not in the room", () => {
      expect(relay.setMuted("general", "conn-x", true)).toBe(false);
      expect(relay.setDeafened("lobby", "conn-a", true)).toBe(false);
      expect(events).toEqual([]);
    });
  });

  describe("handleDisconnect", () => {
    it("leaves every room the connection was in, one event per room", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      relay.joinRoom("general", "bob", "conn-b", "Bob");
      relay.joinRoom("music", "alice", "conn-a", "Alice");
      relay.joinRoom("games", "carol", "conn-c", "Carol");
      events.length = 0;

      expect(relay.handleDisconnect("conn-a")).toEqual(["general", "music"]);

      expect(events).toEqual([
        { type: "left", roomId: "general", recipients: ["conn-b"], userId: "alice" },
        { type: "left", roomId: "music", recipients: [], userId: "alice" },
      ]);
      expect(relay.roomIds()).toEqual(["general", "games"]);
    });

    it("does nothing for an unknown connection", () => {
      relay.joinRoom("general", "alice", "conn-a", "Alice");
      events.length = 0;

      expect(relay.handleDisconnect("conn-z")).toEqual([]);
      expect(events).toEqual([]);
    });
  });

  describe("getIceServers", () => {
    it("serves the default STUN server", () => {
      expect(relay.getIceServers()).toEqual([{ urls: ["stun:stun.l.google.com:19302"] }]);
    });

    it("serves configured TURN credentials", () => {
      const configured = new VoiceRelay({
        stunUrls: [],
        turnUrl: "turn:relay.example:3478",
        turnUsername: "parlor",
        turnCredential: "test-secret",
      });

      expect(configured.getIceServers()).toEqual([
        { urls: ["turn:relay.example:3478"], username: "parlor", credential: "test-secret" },
      ]);
    });
  });

  it("returns an empty roster for unknown rooms", () => {
    expect(relay.getRoomRoster("nowhere")).toEqual([]);
    expect(relay.findParticipantByUserId("nobody")).toBeUndefined();
  });

  it("hands out copies of participant entries", () => {
    relay.joinRoom("general", "alice", "conn-a", "Alice");
    const found = relay.findParticipantByUserId("alice");
    expect(found).toEqual({
      userId: "alice",
      displayName: "Alice",
      connectionId: "conn-a",
      isMuted: false,
      isDeafened: false,
    });
    if (found) {
      found.connectionId = "conn-z";
      found.isMuted = true;
    }

    relay.relaySignal("offer", "bob", "alice", "sdp");

    expect(signals[0]?.targetConnectionId).toBe("conn-a");
    expect(relay.getRoomRoster("general")[0]?.isMuted).toBe(false);
    expect(relay.leaveRoom("general", "conn-a")).toBe(true);
  });
});
