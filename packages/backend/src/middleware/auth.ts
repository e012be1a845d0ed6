import { timingSafeEqual } from "node:crypto";
import type { RequestHandler } from "express";
import type { AgentResponse } from "@docent/shared";

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

/** Rejects requests without the configured bearer token. An empty token disables the check. */
export function createBearerAuth(expectedToken: string): RequestHandler {
  const expected = Buffer.from(expectedToken, "utf8");

  return (req, res, next) => {
    if (expected.length === 0) {
      next();
      return;
    }

    const match = BEARER_PREFIX.exec(req.headers.authorization ?? "");
    const presented = Buffer.from(match?.[1]?.trim() ?? "", "utf8");
    if (presented.length === expected.length && timingSafeEqual(presented, expected)) {
      next();
      return;
    }

    const body: AgentResponse = {
      success: false,
      message: "Invalid authorization credentials"
    };
    res.status(401).json(body);
  };
}
