export { GatewayHub, type GatewaySocket } from "./hub";
export { GatewayServer, type GatewayServerDeps } from "./server";
export {
  StaticUserDirectory,
  extractToken,
  type AuthenticatedUser,
  type UserDirectory,
} from "./auth";
export {
  ClientFrameSchema,
  encodeServerFrame,
  parseClientFrame,
  type ClientFrame,
  type GatewayErrorCode,
  type ServerFrame,
} from "./protocol";
