import cors from "@fastify/cors";
import Fastify, { type FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { UpstreamError, ValidationError, type ValidationIssue } from "../core/errors.js";
import type { ChatService } from "../runtime/chat-service.js";

export const SESSION_HEADER = "X-Session-Id";

const UNPARSEABLE_BODY_CODES: ReadonlySet<string> = new Set([
  "FST_ERR_CTP_INVALID_JSON_BODY",
  "FST_ERR_CTP_EMPTY_JSON_BODY",
]);

const UNPARSEABLE_BODY_ISSUE: ValidationIssue = {
  loc: ["body"],
  msg: "request body must be valid JSON",
  type: "json_invalid",
};

export interface BuildAppOptions {
  chat: ChatService;
  logger: Logger;
  corsOrigins: string[];
}

function readSessionToken(request: FastifyRequest): string | undefined {
  const raw = request.headers[SESSION_HEADER.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === "string" ? value : undefined;
}

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({ logger: options.logger });
  const { chat } = options;

  await app.register(cors, {
    origin: options.corsOrigins,
    credentials: true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    exposedHeaders: [SESSION_HEADER],
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.code(422).send({ detail: error.issues });
    }
    if (UNPARSEABLE_BODY_CODES.has(error.code) || error instanceof SyntaxError) {
      return reply.code(422).send({ detail: [UNPARSEABLE_BODY_ISSUE] });
    }
    if (error instanceof UpstreamError) {
      return reply.code(502).send({ detail: error.message });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "unhandled request error");
      return reply.code(500).send({ detail: "Internal Server Error" });
    }
    return reply.code(statusCode).send({ detail: error.message });
  });

  app.get("/", async () => ({ message: "Healthy" }));

  app.get("/session", async () => ({ session_id: chat.newSessionId() }));

  app.post("/chat", async (request, reply) => {
    const turn = await chat.ask({ sessionToken: readSessionToken(request), body: request.body });
    // reached only when the turn succeeded
    if (turn.created) {
      reply.header(SESSION_HEADER, turn.sessionId).code(201);
    }
    return { session_id: turn.sessionId, answer: turn.answer };
  });

  app.get("/history", async (request, reply) => {
    const history = chat.history(readSessionToken(request));
    if (history.created) {
      reply.header(SESSION_HEADER, history.sessionId).code(201);
    }
    return {
      session_id: history.sessionId,
      messages: history.messages.map((m) => ({ role: m.role, content: m.content, timestamp: m.timestamp })),
    };
  });

  app.delete("/history", async (request, reply) => {
    chat.clear(readSessionToken(request));
    return reply.code(204).send();
  });

  return app;
}
