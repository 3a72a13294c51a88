import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z, ZodError } from "zod";
import type { DecisionRun, HistoryEntry } from "../decision/decision-types";
import { DecisionServiceError, DecisionValidationError, ExtractionUnavailableError } from "../errors";
import { logger } from "../logger";
import { createDecisionServices } from "../services";
import type { DecisionServices } from "../services";
import {
  getSessionIdFromRequest,
  MAX_SESSION_ID_LENGTH,
  registerSessionHook,
  SESSION_ID_PATTERN,
  withSessionId
} from "../session/session";

const extractSchema = z.object({
  text: z.string()
});

const decisionSchema = z.object({
  scenario: z.string(),
  options: z.array(z.string())
});

const overrideSchema = z.object({
  option: z.string().min(1)
});

const threadParamsSchema = z.object({
  threadId: z.string().min(1)
});

const sessionParamsSchema = z.object({
  sessionId: z.string().max(MAX_SESSION_ID_LENGTH).regex(SESSION_ID_PATTERN)
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional()
});

function serializeRun(run: DecisionRun) {
  return {
    threadId: run.threadId,
    sessionId: run.sessionId,
    ...run.record,
    transitions: run.transitions,
    createdAt: run.createdAt.toISOString(),
    updatedAt: run.updatedAt.toISOString()
  };
}

function serializeHistory(entry: HistoryEntry) {
  return {
    threadId: entry.threadId,
    ...entry.record,
    recordedAt: entry.recordedAt.toISOString()
  };
}

function requestLogger(request: FastifyRequest) {
  return withSessionId(logger, getSessionIdFromRequest(request));
}

function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown) {
  const sessionId = getSessionIdFromRequest(request);
  if (error instanceof ZodError) {
    return reply.code(400).send({
      message: "Invalid request",
      issues: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
      sessionId
    });
  }
  if (error instanceof DecisionValidationError) {
    return reply.code(error.statusCode).send({ message: error.message, issues: error.issues, sessionId });
  }
  if (error instanceof DecisionServiceError) {
    if (error.statusCode >= 500) {
      withSessionId(logger, sessionId).error({ error }, error.message);
    }
    return reply.code(error.statusCode).send({ message: error.message, sessionId });
  }
  withSessionId(logger, sessionId).error({ error }, "Unhandled request error");
  return reply.code(500).send({ message: "Internal server error", sessionId });
}

export async function registerRoutes(app: FastifyInstance, services: DecisionServices = createDecisionServices()): Promise<void> {
  const { workflow, extractor } = services;

  registerSessionHook(app);
  app.setErrorHandler((error, request, reply) => {
    const isDomainError = error instanceof DecisionServiceError || error instanceof ZodError;
    if (!isDomainError && error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ message: error.message, sessionId: getSessionIdFromRequest(request) });
    }
    return sendError(request, reply, error);
  });

  app.post("/v1/decisions/extract", async (request, reply) => {
    const body = extractSchema.parse(request.body ?? {});
    if (!extractor) {
      throw new ExtractionUnavailableError();
    }
    const result = await extractor.extract(body.text);
    if (!result) {
      reply.code(422);
      return {
        message: "Could not extract a decision from your message. Please try rephrasing with clearer options.",
        sessionId: getSessionIdFromRequest(request)
      };
    }
    return { result, sessionId: getSessionIdFromRequest(request) };
  });

  app.post("/v1/decisions", async (request, reply) => {
    const body = decisionSchema.parse(request.body ?? {});
    const sessionId = getSessionIdFromRequest(request);
    const run = await workflow.start(sessionId, body, requestLogger(request));
    reply.code(201);
    return serializeRun(run);
  });

  app.get("/v1/decisions/:threadId", async (request) => {
    const { threadId } = threadParamsSchema.parse(request.params);
    return serializeRun(await workflow.get(threadId));
  });

  app.get("/v1/decisions/:threadId/review", async (request) => {
    const { threadId } = threadParamsSchema.parse(request.params);
    return workflow.review(threadId);
  });

  app.post("/v1/decisions/:threadId/approve", async (request) => {
    const { threadId } = threadParamsSchema.parse(request.params);
    const run = await workflow.resolve(threadId, { kind: "approve" }, requestLogger(request));
    return serializeRun(run);
  });

  app.post("/v1/decisions/:threadId/override", async (request) => {
    const { threadId } = threadParamsSchema.parse(request.params);
    const { option } = overrideSchema.parse(request.body ?? {});
    const run = await workflow.resolve(threadId, { kind: "override", option }, requestLogger(request));
    return serializeRun(run);
  });

  app.get("/v1/sessions/:sessionId", async (request) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const summary = await workflow.getSession(sessionId);
    return {
      sessionId,
      active: summary.active ? serializeRun(summary.active) : null,
      historyCount: summary.historyCount,
      recentHistory: summary.recentHistory.map(serializeHistory)
    };
  });

  app.get("/v1/sessions/:sessionId/history", async (request) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const { limit } = historyQuerySchema.parse(request.query ?? {});
    const decisions = await workflow.listHistory(sessionId, limit);
    return { sessionId, decisions: decisions.map(serializeHistory) };
  });
}
