import type { IceServer, IceServerSettings } from "./types";

export function buildIceServers(settings: IceServerSettings): IceServer[] {
  const servers: IceServer[] = [];
  const stunUrls = settings.stunUrls.map((url) => url.trim()).filter(Boolean);
  if (stunUrls.length > 0) {
    servers.push({ urls: stunUrls });
  }

  const turnUrl = settings.turnUrl?.trim();
  if (turnUrl) {
    servers.push({
      urls: [turnUrl],
      username: settings.turnUsername ?? "",
      credential: settings.turnCredential ?? "",
    });
  }
  return servers;
}
