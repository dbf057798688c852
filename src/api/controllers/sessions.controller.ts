/**
 * Sessions Controller
 *
 * Starts, stops and reports on scraping sessions, and streams their
 * progress as server-sent events.
 */
import type { NextFunction, Request, Response } from "express";
import { logger } from "../../monitoring/logger";
import { validateSessionRequest } from "../../processing/data-validator";
import { enqueueSession } from "../../queue/queue.producer";
import {
  SessionNotFoundError,
  ValidationFailedError,
  errorMessage,
} from "../../shared/errors/scrape.errors";
import type { SessionEvent } from "../../shared/types/session.types";
import { TERMINAL_STATUSES } from "../../shared/types/session.types";
import type { ApiContext } from "../context";

function isQueuedRequest(body: unknown): boolean {
  return typeof body === "object" && body !== null && "queued" in body && body.queued === true;
}

function writeEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

export function sessionsController(ctx: ApiContext) {
  return {
    /**
     * POST /sessions
     *
     * Start a session now, or queue it when the body sets `queued: true`.
     * Body: { agency, database, startPage?, maxPages?, endPage?, country?,
     *         dateFrom?, dateTo?, actionTypes?, stopOnExisting?, ... }
     */
    async start(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        if (isQueuedRequest(req.body)) {
          if (!ctx.sessionQueue) {
            throw new ValidationFailedError("Queued sessions need Redis");
          }
          const request = validateSessionRequest(req.body);
          const jobId = await enqueueSession(ctx.sessionQueue, request, "api");
          res.status(202).json({ jobId, queued: true });
          return;
        }

        const handle = await ctx.sessions.start(req.body);
        handle.done.catch((error: unknown) => {
          logger.error({ sessionId: handle.sessionId, error: errorMessage(error) }, "Session crashed");
        });

        res.status(202).json({ sessionId: handle.sessionId, status: "running" });
      } catch (error) {
        next(error);
      }
    },

    /** POST /sessions/:id/stop */
    stop(req: Request, res: Response, next: NextFunction): void {
      const sessionId = req.params.id;
      if (ctx.sessions.stop(sessionId) === "not_found") {
        next(new SessionNotFoundError(sessionId));
        return;
      }
      res.status(202).json({ sessionId, status: "stopping" });
    },

    /** GET /sessions/:id */
    async get(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const session = await ctx.sessions.get(req.params.id);
        if (!session) throw new SessionNotFoundError(req.params.id);
        res.json(session);
      } catch (error) {
        next(error);
      }
    },

    /** GET /sessions: sessions running in this process */
    listActive(_req: Request, res: Response): void {
      res.json({ sessions: ctx.sessions.listActive() });
    },

    /**
     * GET /sessions/:id/events
     *
     * Server-sent events: a `snapshot` first, then one event per progress
     * update. The stream closes after the terminal event. The subscription
     * is opened before the snapshot is read; events that arrive meanwhile
     * are held and written after it.
     */
    async events(req: Request, res: Response, next: NextFunction): Promise<void> {
      const sessionId = req.params.id;
      const held: SessionEvent[] = [];
      let streaming = false;
      let closed = false;

      const forward = (event: SessionEvent): void => {
        if (closed) return;
        writeEvent(res, event.type, event);
        if (TERMINAL_STATUSES.has(event.status)) close();
      };
      const unsubscribe = ctx.sessions.subscribe(sessionId, (event: SessionEvent) => {
        if (streaming) forward(event);
        else held.push(event);
      });
      const close = (): void => {
        if (closed) return;
        closed = true;
        unsubscribe();
        res.end();
      };

      try {
        const session = await ctx.sessions.get(sessionId);
        if (!session) throw new SessionNotFoundError(sessionId);

        res.setHeader("Content-Type", "text/event-stream");
        res.setHeader("Cache-Control", "no-cache");
        res.setHeader("Connection", "keep-alive");
        res.setHeader("X-Accel-Buffering", "no");
        res.flushHeaders();

        writeEvent(res, "snapshot", session);
        if (TERMINAL_STATUSES.has(session.status)) {
          close();
          return;
        }

        streaming = true;
        held.forEach(forward);
        if (!closed && !ctx.sessions.isActive(sessionId)) {
          close();
          return;
        }
        req.on("close", close);
      } catch (error) {
        unsubscribe();
        next(error);
      }
    },
  };
}
