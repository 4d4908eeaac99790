import { timingSafeEqual } from "node:crypto";
import jwt, { type JwtPayload } from "jsonwebtoken";
import type { SessionRequest } from "@nearlink/contracts";

export type SocketRole = SessionRequest["role"];

export interface SocketClaims {
  clientId: string;
  role: SocketRole;
}

export interface IssuedSocketToken {
  token: string;
  expiresAtMs: number;
}

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

// A UI token never opens the bridge socket, and the other way round.
const AUDIENCE: Record<SocketRole, string> = {
  ui: "nearlink:events",
  bridge: "nearlink:bridge",
};

export function bearerToken(headerValue: string | undefined): string | undefined {
  const [scheme, token, ...rest] = (headerValue ?? "").split(" ");
  if (scheme !== "Bearer" || !token || rest.length > 0) {
    return undefined;
  }
  return token;
}

export function assertControlAuth(headerValue: string | undefined, expectedToken: string): void {
  const token = bearerToken(headerValue);
  if (token === undefined) {
    throw new AuthError("Missing bearer token");
  }
  const given = Buffer.from(token);
  const expected = Buffer.from(expectedToken);
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
    throw new AuthError("Bearer token rejected");
  }
}

export function issueSocketToken(
  claims: SocketClaims,
  secret: string,
  ttlSec: number,
  nowMs = Date.now(),
): IssuedSocketToken {
  const issuedAtSec = Math.floor(nowMs / 1000);
  const token = jwt.sign({ role: claims.role, iat: issuedAtSec }, secret, {
    algorithm: "HS256",
    expiresIn: ttlSec,
    audience: AUDIENCE[claims.role],
    subject: claims.clientId,
  });
  return { token, expiresAtMs: (issuedAtSec + ttlSec) * 1000 };
}

/** Accepts only a token minted for `role`; throws AuthError otherwise. */
export function verifySocketToken(token: string, secret: string, role: SocketRole): SocketClaims {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"], audience: AUDIENCE[role] });
  } catch (error) {
    throw new AuthError(error instanceof Error ? error.message : "Invalid socket token");
  }
  if (typeof decoded === "string" || typeof decoded.sub !== "string" || decoded.sub.length === 0) {
    throw new AuthError("Invalid socket claims");
  }
  if (decoded["role"] !== role) {
    throw new AuthError("Invalid socket claims");
  }
  return { clientId: decoded.sub, role };
}

export function socketTokenFromUrl(url: string): string {
  return new URL(url, "http://localhost").searchParams.get("token") ?? "";
}
