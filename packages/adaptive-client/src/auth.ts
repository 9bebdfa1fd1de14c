// packages/adaptive-client/src/auth.ts
//
// Request authentication shared by both clients. API-key mode sends the
// key on every request; token mode exchanges it for a bearer token on the
// legacy surface and refreshes the token shortly before it expires.

import type { AuthToken } from "shared-types";
import type { ClientConfig } from "./config";
import { DEFAULTS } from "./config";

export type TokenAction = "authenticate" | "refresh" | "none";

export function tokenAction(token: AuthToken | null, nowMs: number, marginMs: number = DEFAULTS.tokenRefreshMarginMs): TokenAction {
  if (!token) return "authenticate";
  return token.expires.getTime() - nowMs <= marginMs ? "refresh" : "none";
}

/** Headers every request of the session carries. */
export function sessionHeaders(config: ClientConfig): Record<string, string> {
  return config.authMode === "api-key" ? { "x-api-key": config.apiKey } : {};
}

export function bearer(token: AuthToken): Record<string, string> {
  return { Authorization: `Bearer ${token.token}` };
}
