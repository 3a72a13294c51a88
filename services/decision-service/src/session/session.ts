import type { FastifyInstance, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";

export const SESSION_HEADER = "x-session-id";
export const MAX_SESSION_ID_LENGTH = 128;

// Ids end up in log lines, response headers and DB keys
export const SESSION_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

type HeaderValue = string | string[] | undefined;

export function isValidSessionId(value: string): boolean {
  return value.length > 0 && value.length <= MAX_SESSION_ID_LENGTH && SESSION_ID_PATTERN.test(value);
}

/**
 * Returns the caller's session id when it is usable. A missing or malformed
 * header starts a new session.
 */
export function resolveSessionId(header: HeaderValue): { sessionId: string; issued: boolean } {
  const candidate = (Array.isArray(header) ? header[0] : header)?.trim();
  if (candidate && isValidSessionId(candidate)) {
    return { sessionId: candidate, issued: false };
  }
  return { sessionId: uuidv4(), issued: true };
}

export function getSessionIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return resolveSessionId(request.headers[SESSION_HEADER]).sessionId;
}

export function withSessionId(log: Logger, sessionId: string): Logger {
  return log.child({ sessionId });
}

/** Pins one session id per request and echoes it back to the caller. */
export function registerSessionHook(app: FastifyInstance): void {
  app.addHook("onRequest", (request, reply, done) => {
    const raw = request.headers[SESSION_HEADER];
    const { sessionId, issued } = resolveSessionId(raw);
    if (issued && raw !== undefined) {
      logger.debug({ sessionId }, "Ignored malformed session header");
    }
    request.headers[SESSION_HEADER] = sessionId;
    reply.header(SESSION_HEADER, sessionId);
    done();
  });
}
