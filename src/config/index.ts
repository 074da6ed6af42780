export { loadConfig, parseConfigText, resolveConfigPath, type ConfigLoadResult } from "./loader";
export {
  ParlorConfigSchema,
  type AuthConfig,
  type AuthUserConfig,
  type ParlorConfig,
  type PresenceConfig,
  type ServerConfig,
  type VoiceConfig,
} from "./schema";
export {
  DEFAULT_SERVER_OPTIONS,
  resolveIceServerSettings,
  resolvePresenceOptions,
  resolveServerOptions,
  type ServerOptions,
} from "./resolve";
export { parseDurationMs } from "./duration";
