import http from "http";
import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { GestureExecutor } from "../motion/executor";
import { Logger } from "../utils/logger";
import { Responder, SpeechOutput } from "../types";
import { describeSendFailure } from "../commands/handler";
import {
  ChatBodySchema,
  GestureBodySchema,
  MoodBodySchema,
  ServoBodySchema,
  SpeakBodySchema,
  describeIssue,
} from "../commands/schemas";

export type HttpDeps = {
  executor: GestureExecutor;
  speech: SpeechOutput | null;
  responder: Responder | null;
  logger: Logger;
  corsOrigins: string[];
};

type Handler = (req: Request, res: Response) => Promise<void>;

function parseBody<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.infer<S> | null {
  const parsed = schema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({ success: false, error: describeIssue(parsed.error) });
    return null;
  }
  return parsed.data;
}

export function createHttpApp(deps: HttpDeps): express.Application {
  const { executor, speech, responder, logger } = deps;
  const app = express();

  app.use(cors({ origin: deps.corsOrigins.includes("*") ? "*" : deps.corsOrigins }));
  app.use(express.json({ limit: "64kb" }));
  app.use((req, res, next) => {
    res.locals.requestId = uuidv4();
    logger.debug("HTTP request", { id: res.locals.requestId, method: req.method, path: req.path });
    next();
  });

  const route =
    (handler: Handler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };

  app.get("/health", (req, res) => {
    const linkState = executor.snapshot().linkState;
    res.json({ status: "healthy", arduino_connected: linkState !== "disconnected", link_state: linkState });
  });

  app.get("/api/state", (req, res) => {
    res.json(executor.snapshot());
  });

  app.post(
    "/api/servo",
    route(async (req, res) => {
      const body = parseBody(ServoBodySchema, req, res);
      if (!body) return;
      const result = await executor.setServo(body.servo, body.angle);
      res.json(result.ok ? { success: true } : { success: false, error: describeSendFailure(result) });
    })
  );

  app.post(
    "/api/gesture",
    route(async (req, res) => {
      const body = parseBody(GestureBodySchema, req, res);
      if (!body) return;
      const result = await executor.perform(body.gesture);
      res.json(result.ok ? { success: true } : { success: false, error: "Unknown gesture" });
    })
  );

  app.post(
    "/api/mood",
    route(async (req, res) => {
      const body = parseBody(MoodBodySchema, req, res);
      if (!body) return;
      const result = await executor.performMood(body.mood);
      res.json(result.ok ? { success: true } : { success: false, error: "Unknown mood" });
    })
  );

  app.post(
    "/api/speak",
    route(async (req, res) => {
      const body = parseBody(SpeakBodySchema, req, res);
      if (!body) return;
      if (!speech) {
        res.json({ success: false, error: "speech_unavailable" });
        return;
      }
      res.json({ success: await speech.speak(body.text) });
    })
  );

  app.post(
    "/api/chat",
    route(async (req, res) => {
      const body = parseBody(ChatBodySchema, req, res);
      if (!body) return;
      if (!responder) {
        res.json({ success: false, error: "speech_unavailable" });
        return;
      }
      const reply = await responder.reply(body.message);
      await executor.react(reply.gesture);
      if (body.speak && speech && reply.speech) {
        await speech.speak(reply.speech);
      }
      res.json({ success: true, response: reply.speech, gesture: reply.gesture });
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // express.json() reports malformed bodies through here.
    const status = err instanceof SyntaxError ? 400 : 500;
    logger.error("HTTP request failed", { id: res.locals.requestId, path: req.path, message: String(err) });
    res.status(status).json({ success: false, error: status === 400 ? "Malformed JSON" : "Internal error" });
  });

  return app;
}

export function startHttpServer(
  app: express.Application,
  host: string,
  port: number,
  logger: Logger
): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once("error", reject);
    server.listen(port, host, () => {
      logger.info("HTTP server listening", { host, port });
      resolve(server);
    });
  });
}

export function stopHttpServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
