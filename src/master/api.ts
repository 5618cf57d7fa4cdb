import { describeError, MalformedPayloadError, RegistrationConflictError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { malformedStatus, type JsonResponse } from "../net/http";
import { parseRegistrationRequest, parseReportRequest, type ReportRequest, type ReportResult } from "../protocol/types";
import type { Aggregator } from "./aggregator";
import type { StepCoordinator } from "./coordinator";
import type { Registry } from "./registry";

export interface MasterApiDeps {
  registry: Registry;
  coordinator: StepCoordinator;
  aggregator: Aggregator;
  logger?: Logger;
}

/**
 * Transport-independent request handling for the master. Every handler returns
 * a status and a JSON body; nothing a worker sends can throw past `handle`.
 */
export class MasterApi {
  private registry: Registry;
  private coordinator: StepCoordinator;
  private aggregator: Aggregator;
  private logger: Logger;

  constructor(deps: MasterApiDeps) {
    this.registry = deps.registry;
    this.coordinator = deps.coordinator;
    this.aggregator = deps.aggregator;
    this.logger = deps.logger ?? createLogger("master");
  }

  async handle(method: string, path: string, readBody: () => Promise<unknown>): Promise<JsonResponse> {
    try {
      if (method === "POST" && path === "/register") {
        return this.register(await readBody());
      }
      if (method === "POST" && path === "/report") {
        return this.report(await readBody());
      }
      if (method === "GET" && path === "/status") {
        return this.status();
      }
      if (method === "GET" && path === "/history") {
        return { status: 200, body: { series: this.aggregator.series() } };
      }
      const removeMatch = /^\/workers\/([^/]+)$/.exec(path);
      if (method === "DELETE" && removeMatch) {
        return this.removeWorker(decodeURIComponent(removeMatch[1]));
      }
      return { status: 404, body: { error: `No route for ${method} ${path}` } };
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        return { status: malformedStatus(error), body: { error: error.message } };
      }
      this.logger.error(`${method} ${path} failed:`, error);
      return { status: 500, body: { error: describeError(error) } };
    }
  }

  register(raw: unknown): JsonResponse {
    const request = parseRegistrationRequest(raw);
    try {
      const record = this.registry.register(request.zoneId, request.address, request.workerId);
      const joinStep = this.coordinator.joinStep;
      this.logger.info(`zone ${record.zoneId} registered from ${record.address} (${record.recordId}), joins at step ${joinStep}`);
      return {
        status: 200,
        body: { accepted: true, zoneId: record.zoneId, recordId: record.recordId, joinStep }
      };
    } catch (error) {
      if (error instanceof RegistrationConflictError) {
        this.logger.warn(error.message);
        return { status: 409, body: { accepted: false, reason: error.message } };
      }
      throw error;
    }
  }

  report(raw: unknown): JsonResponse {
    let request: ReportRequest;
    try {
      request = parseReportRequest(raw);
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) {
        throw error;
      }
      const zoneId = readField(raw, "zoneId");
      const step = readField(raw, "step");
      if (typeof zoneId === "string") {
        this.coordinator.rejectReport(zoneId, typeof step === "number" ? step : undefined);
      }
      this.logger.warn(`rejected report from ${typeof zoneId === "string" ? zoneId : "unknown zone"}: ${error.message}`);
      const body: ReportResult & { error: string } = {
        received: true,
        status: "rejected",
        resync: true,
        error: error.message
      };
      return { status: 400, body };
    }
    const status = this.coordinator.submitReport(request);
    const body: ReportResult = { received: true, status };
    return { status: 200, body };
  }

  removeWorker(zoneId: string): JsonResponse {
    const record = this.registry.remove(zoneId);
    if (!record) {
      return { status: 404, body: { error: `Zone ${zoneId} is not registered.` } };
    }
    this.logger.info(`zone ${zoneId} removed (${record.recordId})`);
    return { status: 200, body: { removed: true, zoneId, recordId: record.recordId } };
  }

  status(): JsonResponse {
    const latest = this.aggregator.latest();
    return {
      status: 200,
      body: {
        state: this.coordinator.state,
        active: this.coordinator.state !== "Halted",
        step: this.coordinator.step,
        lastSettledStep: latest?.step ?? null,
        totals: latest?.totals ?? null,
        observers: this.aggregator.observerCount,
        stepStats: this.coordinator.getStats(),
        workers: this.registry.list().map((record) => ({
          zoneId: record.zoneId,
          recordId: record.recordId,
          workerId: record.workerId,
          address: record.address,
          status: record.status,
          registeredAtIso: new Date(record.registeredAt).toISOString(),
          lastSeenIso: new Date(record.lastSeen).toISOString(),
          lastStep: record.lastStep,
          vehicleCount: record.vehicleCount
        }))
      }
    };
  }
}

function readField(raw: unknown, key: string): unknown {
  if (!raw || typeof raw !== "object" || !(key in raw)) {
    return undefined;
  }
  return Reflect.get(raw, key);
}
