import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import type { StreamOrchestrator } from "../orchestrator/streamOrchestrator";
import type { Logger } from "../observability/logger";
import { componentLogger } from "../observability/logger";
import { validateCancelRequest } from "../validation/schemas";
import { formatSseFrame } from "../wire/records";
import { CancelTimeoutError, errorMessage } from "../errors";

export interface RunsRouterOptions {
  heartbeatMs?: number;
  logger?: Logger;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function isEndFrame(event: string): boolean {
  return event.split("|")[0] === "end";
}

export function createRunsRouter(orchestrator: StreamOrchestrator, options: RunsRouterOptions = {}): Router {
  const heartbeatMs = options.heartbeatMs ?? 15000;
  const log = options.logger ?? componentLogger("runs-routes");
  const router = Router();

  // GET /runs/:runId/stream -> SSE replay + live tail, resumable with Last-Event-ID
  router.get(
    "/:runId/stream",
    handle(async (req, res) => {
      const { runId } = req.params;
      const run = await orchestrator.describeRun(runId);
      if (!run) return res.status(404).json({ error: "run not found" });

      const lastEventId = nonEmpty(req.header("Last-Event-ID")) ?? nonEmpty(req.query.last_event_id);

      res.set({
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive"
      });
      res.flushHeaders();

      const controller = new AbortController();
      const heartbeat = setInterval(() => {
        res.write(`: keep-alive ${Date.now()}\n\n`);
      }, heartbeatMs);
      res.on("close", () => {
        clearInterval(heartbeat);
        controller.abort();
      });

      let terminal = false;
      try {
        for await (const frame of orchestrator.streamRunExecution(run, lastEventId, { signal: controller.signal })) {
          res.write(formatSseFrame(frame));
          if (isEndFrame(frame.event)) terminal = true;
        }
        if (terminal) await orchestrator.cleanupRun(runId);
      } catch (err) {
        log.error({ msg: "stream failed", runId, err: errorMessage(err) });
        if (!res.writableEnded) {
          res.write(formatSseFrame({ event: "error", data: { error: "StreamFailed", message: errorMessage(err) } }));
        }
      } finally {
        clearInterval(heartbeat);
        res.end();
      }
      return undefined;
    })
  );

  // GET /runs/:runId/events?after=<eventId> -> stored events
  router.get(
    "/:runId/events",
    handle(async (req, res) => {
      const { runId } = req.params;
      const run = await orchestrator.describeRun(runId);
      if (!run) return res.status(404).json({ error: "run not found" });
      const events = await orchestrator.getStoredEvents(runId, nonEmpty(req.query.after));
      return res.json({ runId, events });
    })
  );

  // DELETE /runs/:runId/events -> drop the stored history
  router.delete(
    "/:runId/events",
    handle(async (req, res) => {
      await orchestrator.deleteEvents(req.params.runId);
      return res.status(204).end();
    })
  );

  // POST /runs/:runId/cancel -> cancel or interrupt, optionally waiting for the run to settle
  router.post(
    "/:runId/cancel",
    handle(async (req, res) => {
      const { runId } = req.params;
      const body: unknown = req.body ?? {};
      const validation = validateCancelRequest(body);
      if (!validation.valid) {
        return res.status(400).json({ error: "validation failed", details: validation.errors });
      }
      const run = await orchestrator.describeRun(runId);
      if (!run) return res.status(404).json({ error: "run not found" });

      const { action = "cancel", wait = false, timeoutMs } = validation.value;
      const stop = { wait, timeoutMs };
      try {
        const status =
          action === "interrupt" ? await orchestrator.interruptRun(runId, stop) : await orchestrator.cancelRun(runId, stop);
        return res.status(200).json({ runId, status });
      } catch (err) {
        if (!(err instanceof CancelTimeoutError)) throw err;
        const status = await orchestrator.getRunStatus(runId);
        return res.status(202).json({ runId, status, settled: false });
      }
    })
  );

  // GET /runs/:runId -> status, streaming state and stored-event summary
  router.get(
    "/:runId",
    handle(async (req, res) => {
      const { runId } = req.params;
      const run = await orchestrator.describeRun(runId);
      if (!run) return res.status(404).json({ error: "run not found" });
      return res.json({
        runId,
        status: run.status ?? null,
        state: orchestrator.getStreamState(runId),
        streaming: orchestrator.isRunStreaming(runId),
        info: await orchestrator.getRunInfo(runId)
      });
    })
  );

  return router;
}
