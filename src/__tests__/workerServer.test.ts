import { afterEach, describe, it, expect, vi } from "vitest";
import { DEFAULT_ZONE_SETTINGS } from "../config";
import { TransportFailureError } from "../errors";
import { silentLogger } from "../logger";
import type { ReportRequest } from "../protocol/types";
import { WorkerAgent } from "../worker/agent";
import { HttpMasterLink, type MasterLink } from "../worker/masterClient";
import { handleWorkerRequest } from "../worker/server";

function agentWith(reports: ReportRequest[]): WorkerAgent {
  const link: MasterLink = {
    register: async () => ({ accepted: true, zoneId: "South", recordId: "South#1", joinStep: 1 }),
    report: async (request) => {
      reports.push(request);
      return { received: true, status: "accepted" };
    }
  };
  return new WorkerAgent({
    zoneId: "South",
    address: "http://localhost:6002",
    workerId: "worker_2",
    link,
    zone: { ...DEFAULT_ZONE_SETTINGS, seed: 2 },
    registrationAttempts: 1,
    retryBaseMs: 0,
    logger: silentLogger
  });
}

describe("worker endpoints", () => {
  it("acknowledges a step command before computing it", async () => {
    const reports: ReportRequest[] = [];
    const agent = agentWith(reports);
    await agent.connect();

    const response = await handleWorkerRequest(agent, "POST", "/step", async () => ({ step: 2 }), silentLogger);
    expect(response).toEqual({ status: 202, body: { accepted: true, step: 2 } });

    await vi.waitFor(() => expect(reports).toHaveLength(1));
    expect(reports[0].step).toBe(2);
    expect(agent.lastStep).toBe(2);
  });

  it("answers 400 to a malformed command and 404 to anything else", async () => {
    const agent = agentWith([]);

    const bad = await handleWorkerRequest(agent, "POST", "/step", async () => ({ step: "two" }), silentLogger);
    expect(bad.status).toBe(400);
    expect((await handleWorkerRequest(agent, "GET", "/step", async () => null, silentLogger)).status).toBe(404);
  });

  it("reports its health", async () => {
    const agent = agentWith([]);
    await agent.connect();

    expect(await handleWorkerRequest(agent, "GET", "/health", async () => null, silentLogger)).toEqual({
      status: 200,
      body: { zoneId: "South", registered: true, step: 0, activeVehicles: 0 }
    });
  });
});

describe("HttpMasterLink", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads a refused registration from a 409", async () => {
    const fetchMock = vi.fn(
      async () => new Response(JSON.stringify({ accepted: false, reason: "taken" }), { status: 409 })
    );
    vi.stubGlobal("fetch", fetchMock);
    const link = new HttpMasterLink("http://master.local:5000/", 1000);

    const result = await link.register({ zoneId: "South", address: "http://localhost:6002" });
    expect(result).toEqual({ accepted: false, reason: "taken" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("turns server errors and unreachable masters into retryable failures", async () => {
    vi.stubGlobal("fetch", async () => new Response("busy", { status: 503 }));
    const link = new HttpMasterLink("http://master.local:5000", 1000);
    const request = { zoneId: "South", address: "http://localhost:6002" };
    const unavailable = await link.register(request).catch((error: unknown) => error);
    expect(unavailable).toBeInstanceOf(TransportFailureError);
    expect(unavailable).toMatchObject({ status: 503, retryable: true });

    vi.stubGlobal("fetch", async () => {
      throw new TypeError("fetch failed");
    });
    const unreachable = await link.register(request).catch((error: unknown) => error);
    expect(unreachable).toMatchObject({ status: 0, retryable: true });
  });

  it("does not retry a body it cannot read", async () => {
    vi.stubGlobal("fetch", async () => new Response(JSON.stringify({ received: "yes" }), { status: 200 }));
    const link = new HttpMasterLink("http://master.local:5000", 1000);
    const snapshot = {
      zoneId: "South",
      step: 1,
      vehicles: [],
      lights: [],
      counters: { active: 0, spawned: 0, despawned: 0 }
    };
    const error = await link.report({ zoneId: "South", step: 1, snapshot }).catch((reason: unknown) => reason);

    expect(error).toMatchObject({ status: 200, retryable: false });
  });
});
