import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import type { ServerOptions } from "../config";
import type { PresenceEngine } from "../presence";
import type { VoiceRelay } from "../voice";
import type { GatewayHub } from "./hub";
import { describeError, logger } from "../logger";
import { TOKEN_HEADER, extractToken, type AuthenticatedUser, type UserDirectory } from "./auth";

export interface GatewayServerDeps {
  hub: GatewayHub;
  presence: PresenceEngine;
  voice: VoiceRelay;
  directory: UserDirectory;
}

export function isOriginAllowed(origin: string | undefined, allowOrigins: string[]): boolean {
  if (!origin || allowOrigins.length === 0) {
    return true;
  }
  return allowOrigins.includes(origin);
}

export function decodeRawFrame(raw: RawData): string {
  if (Buffer.isBuffer(raw)) {
    return raw.toString("utf8");
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  return Buffer.from(raw).toString("utf8");
}

/** HTTP listener that upgrades the gateway path to WebSocket and serves the small REST surface. */
export class GatewayServer {
  private server: Server | null = null;
  private wsServer: WebSocketServer | null = null;

  constructor(
    private readonly options: ServerOptions,
    private readonly deps: GatewayServerDeps,
  ) {}

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.warn({ error: describeError(error) }, "Gateway request failed");
        if (!res.headersSent) {
          this.writeJson(req, res, 500, { error: "internal_error" });
        }
      });
    });
    this.server = server;

    this.wsServer = new WebSocketServer({ noServer: true });
    server.on("upgrade", (req, socket, head) => {
      void this.handleUpgrade(req, socket, head);
    });

    const { host, port } = this.options;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    logger.info({ host, port: this.getPort(), path: this.options.path }, "Gateway listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    this.deps.hub.close();
    this.wsServer?.close();
    this.wsServer = null;

    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    logger.info("Gateway stopped");
  }

  getPort(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return null;
    }
    return address.port;
  }

  private async handleUpgrade(
    req: IncomingMessage,
    socket: Parameters<WebSocketServer["handleUpgrade"]>[1],
    head: Parameters<WebSocketServer["handleUpgrade"]>[2],
  ): Promise<void> {
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      if (url.pathname !== this.options.path) {
        socket.destroy();
        return;
      }

      if (!isOriginAllowed(req.headers.origin, this.options.allowOrigins)) {
        socket.write("HTTP/1.1 403 Forbidden\r\nConnection: close\r\n\r\n");
        socket.destroy();
        return;
      }

      const user = await this.authenticate(req, url);
      if (!user) {
        socket.write("HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n");
        socket.destroy();
        return;
      }

      const wsServer = this.wsServer;
      if (!wsServer) {
        socket.write("HTTP/1.1 503 Service Unavailable\r\nConnection: close\r\n\r\n");
        socket.destroy();
        return;
      }

      wsServer.handleUpgrade(req, socket, head, (ws) => {
        this.attachSocket(ws, user);
      });
    } catch (error) {
      logger.warn({ error: describeError(error) }, "Gateway upgrade failed");
      socket.destroy();
    }
  }

  private attachSocket(ws: WebSocket, user: AuthenticatedUser): void {
    const { hub } = this.deps;
    const connectionId = hub.attach(
      {
        send: (data) => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.send(data);
          }
        },
        close: (code, reason) => ws.close(code, reason),
      },
      user,
    );

    ws.on("message", (raw) => {
      hub.handleMessage(connectionId, decodeRawFrame(raw));
    });
    ws.on("close", () => {
      hub.detach(connectionId);
    });
    ws.on("error", (error) => {
      logger.warn({ connectionId, error: describeError(error) }, "Gateway socket error");
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    if (method === "OPTIONS") {
      this.writeCorsHeaders(req, res);
      res.statusCode = 204;
      res.end();
      return;
    }

    if (method === "GET" && url.pathname === "/health") {
      this.writeJson(req, res, 200, { ok: true, connections: this.deps.hub.connectionCount });
      return;
    }

    if (!url.pathname.startsWith("/api/")) {
      this.writeJson(req, res, 404, { error: "not_found" });
      return;
    }

    const user = await this.authenticate(req, url);
    if (!user) {
      this.writeJson(req, res, 401, { error: "unauthorized" });
      return;
    }
    // Any authenticated API call by an agent account keeps it present.
    if (url.pathname !== "/api/presence/sign-out") {
      this.deps.hub.touchAgentActivity(user);
    }

    if (method === "GET" && url.pathname === "/api/presence") {
      this.writeJson(req, res, 200, { users: this.deps.presence.snapshot() });
      return;
    }

    if (method === "GET" && url.pathname === "/api/voice/ice-servers") {
      this.writeJson(req, res, 200, { servers: this.deps.voice.getIceServers() });
      return;
    }

    if (method === "POST" && url.pathname === "/api/presence/sign-out") {
      const signedOut = this.deps.hub.signOut(user.userId);
      this.writeJson(req, res, 200, { ok: true, signedOut });
      return;
    }

    if (method === "POST" && url.pathname === "/api/agents/activity") {
      if (!user.isAgent) {
        this.writeJson(req, res, 403, { error: "not_an_agent" });
        return;
      }
      this.writeJson(req, res, 200, {
        ok: true,
        status: this.deps.presence.getStatus(user.userId),
      });
      return;
    }

    this.writeJson(req, res, 404, { error: "not_found" });
  }

  private async authenticate(req: IncomingMessage, url: URL): Promise<AuthenticatedUser | null> {
    const token = extractToken(req.headers, url);
    if (!token) {
      return null;
    }
    return this.deps.directory.authenticate(token);
  }

  private writeJson(
    req: IncomingMessage,
    res: ServerResponse,
    statusCode: number,
    body: Record<string, unknown>,
  ): void {
    this.writeCorsHeaders(req, res);
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(JSON.stringify(body));
  }

  private writeCorsHeaders(req: IncomingMessage, res: ServerResponse): void {
    const origin = req.headers.origin;
    if (!origin || !isOriginAllowed(origin, this.options.allowOrigins)) {
      return;
    }
    res.setHeader("access-control-allow-origin", origin);
    res.setHeader("vary", "Origin");
    res.setHeader("access-control-allow-headers", `Content-Type, Authorization, ${TOKEN_HEADER}`);
    res.setHeader("access-control-allow-methods", "GET,POST,OPTIONS");
  }
}
