import { createServer, type Server } from "node:http";
import { describeError, MalformedPayloadError } from "../errors";
import type { Logger } from "../logger";
import { malformedStatus, readJsonBody, requestPath, sendJson, type JsonResponse } from "../net/http";
import { parseStepCommand } from "../protocol/types";
import type { WorkerAgent } from "./agent";

/** Accepts a step command and answers before the step is computed. */
export async function handleWorkerRequest(
  agent: WorkerAgent,
  method: string,
  path: string,
  readBody: () => Promise<unknown>,
  logger: Logger
): Promise<JsonResponse> {
  if (method === "GET" && path === "/health") {
    return {
      status: 200,
      body: {
        zoneId: agent.zoneId,
        registered: agent.isRegistered,
        step: agent.lastStep,
        activeVehicles: agent.engine.activeVehicles
      }
    };
  }
  if (method === "POST" && path === "/step") {
    let step: number;
    try {
      step = parseStepCommand(await readBody()).step;
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        return { status: malformedStatus(error), body: { error: error.message } };
      }
      throw error;
    }
    agent.onStepCommand(step).catch((error: unknown) => {
      logger.error(`step ${step} failed: ${describeError(error)}`);
    });
    return { status: 202, body: { accepted: true, step } };
  }
  return { status: 404, body: { error: `No route for ${method} ${path}` } };
}

/** The agent is resolved per request since its address depends on the bound port. */
export function createWorkerServer(getAgent: () => WorkerAgent | null, logger: Logger): Server {
  return createServer((req, res) => {
    const method = req.method ?? "GET";
    const path = requestPath(req);
    const agent = getAgent();
    if (!agent) {
      sendJson(res, { status: 503, body: { error: "Worker is starting." } });
      return;
    }
    handleWorkerRequest(agent, method, path, () => readJsonBody(req), logger)
      .then((response) => sendJson(res, response))
      .catch((error: unknown) => {
        logger.error(`request ${method} ${path} failed:`, error);
        if (!res.headersSent) {
          sendJson(res, { status: 500, body: { error: describeError(error) } });
        }
      });
  });
}
