import type { PresenceOptions } from "../presence";
import type { IceServerSettings } from "../voice";
import type { ParlorConfig } from "./schema";
import { DEFAULT_PRESENCE_OPTIONS } from "../presence";
import { DEFAULT_ICE_SERVER_SETTINGS } from "../voice";
import { parseDurationMs } from "./duration";

export interface ServerOptions {
  host: string;
  port: number;
  path: string;
  allowOrigins: string[];
}

export const DEFAULT_SERVER_OPTIONS: ServerOptions = {
  host: "0.0.0.0",
  port: 5080,
  path: "/ws",
  allowOrigins: [],
};

function durationOr(value: string | number | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  return parseDurationMs(value) ?? fallback;
}

export function resolvePresenceOptions(config: ParlorConfig): PresenceOptions {
  const presence = config.presence ?? {};
  return {
    gracePeriodMs: durationOr(presence.gracePeriod, DEFAULT_PRESENCE_OPTIONS.gracePeriodMs),
    idleTimeoutMs: durationOr(presence.idleTimeout, DEFAULT_PRESENCE_OPTIONS.idleTimeoutMs),
    agentInactivityTimeoutMs: durationOr(
      presence.agentInactivityTimeout,
      DEFAULT_PRESENCE_OPTIONS.agentInactivityTimeoutMs,
    ),
  };
}

export function resolveIceServerSettings(config: ParlorConfig): IceServerSettings {
  const ice = config.voice?.iceServers;
  if (!ice) {
    return DEFAULT_ICE_SERVER_SETTINGS;
  }
  return {
    stunUrls: ice.stunUrls ?? DEFAULT_ICE_SERVER_SETTINGS.stunUrls,
    turnUrl: ice.turnUrl,
    turnUsername: ice.turnUsername,
    turnCredential: ice.turnCredential,
  };
}

export function resolveServerOptions(config: ParlorConfig): ServerOptions {
  const server = config.server ?? {};
  return {
    host: server.host ?? DEFAULT_SERVER_OPTIONS.host,
    port: server.port ?? DEFAULT_SERVER_OPTIONS.port,
    path: server.path ?? DEFAULT_SERVER_OPTIONS.path,
    allowOrigins: server.allowOrigins ?? DEFAULT_SERVER_OPTIONS.allowOrigins,
  };
}
