import { describe, expect, it } from "vitest";
import { buildIceServers } from "./ice-servers";

describe("buildIceServers", () => {
  it("groups STUN urls into one entry", () => {
    expect(
      buildIceServers({ stunUrls: ["stun:one.example:3478", "stun:two.example:3478"] }),
    ).toEqual([{ urls: ["stun:one.example:3478", "stun:two.example:3478"] }]);
  });

  it("adds a TURN entry with credentials when a TURN url is set", () => {
    expect(
      buildIceServers({
        stunUrls: ["stun:one.example:3478"],
        turnUrl: "turn:relay.example:3478",
        turnUsername: "parlor",
        turnCredential: "test-secret",
      }),
    ).toEqual([
      { urls: ["stun:one.example:3478"] },
      { urls: ["turn:relay.example:3478"], username: "parlor", credential: "test-secret" },
    ]);
  });

  it("skips blank urls", () => {
    expect(buildIceServers({ stunUrls: ["  "], turnUrl: "" })).toEqual([]);
  });
});
