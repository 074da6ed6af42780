import type { IncomingHttpHeaders } from "node:http";
import type { AuthUserConfig } from "../config";

export interface AuthenticatedUser {
  userId: string;
  displayName: string;
  isAgent: boolean;
}

/** Resolves a bearer token to the account it belongs to. */
export interface UserDirectory {
  authenticate(token: string): Promise<AuthenticatedUser | null>;
}

/** Accounts declared under `auth.users` in the config file. */
export class StaticUserDirectory implements UserDirectory {
  private readonly byToken = new Map<string, AuthenticatedUser>();

  constructor(users: AuthUserConfig[] = []) {
    for (const user of users) {
      this.byToken.set(user.token, {
        userId: user.userId,
        displayName: user.displayName,
        isAgent: user.isAgent ?? false,
      });
    }
  }

  async authenticate(token: string): Promise<AuthenticatedUser | null> {
    const user = this.byToken.get(token);
    return user ? { ...user } : null;
  }

  get size(): number {
    return this.byToken.size;
  }
}

export const TOKEN_HEADER = "x-parlor-token";

/** Bearer header first, then the explicit token header, then the `token` query parameter. */
export function extractToken(headers: IncomingHttpHeaders, url: URL): string | null {
  const auth = headers.authorization;
  if (typeof auth === "string" && auth.startsWith("Bearer ")) {
    const bearer = auth.slice(7).trim();
    if (bearer) {
      return bearer;
    }
  }

  const explicit = headers[TOKEN_HEADER];
  if (typeof explicit === "string" && explicit.trim()) {
    return explicit.trim();
  }

  const query = url.searchParams.get("token")?.trim();
  return query ? query : null;
}
