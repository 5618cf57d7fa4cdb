import { describe, it, expect } from "vitest";
import { PayloadTooLargeError } from "../errors";
import { silentLogger } from "../logger";
import { MasterApi } from "../master/api";
import { Aggregator } from "../master/aggregator";
import { StepCoordinator } from "../master/coordinator";
import { Registry } from "../master/registry";
import { zoneSnapshot } from "./fixtures";

function setup() {
  const registry = new Registry({ clock: () => 0 });
  const aggregator = new Aggregator({ historyDepth: 5, observerBuffer: 2, logger: silentLogger });
  const coordinator = new StepCoordinator({
    registry,
    aggregator,
    dispatcher: { sendStep: async () => undefined },
    reportDeadlineMs: 1000,
    stepIntervalMs: 0,
    clock: () => 0,
    logger: silentLogger
  });
  const api = new MasterApi({ registry, coordinator, aggregator, logger: silentLogger });
  const call = (method: string, path: string, body?: unknown) => api.handle(method, path, async () => body ?? null);
  return { registry, coordinator, aggregator, api, call };
}

describe("MasterApi", () => {
  it("accepts a registration and refuses a duplicate for a live zone", async () => {
    const { call } = setup();
    const body = { zoneId: "North", address: "http://localhost:6001", workerId: "worker_1" };

    expect(await call("POST", "/register", body)).toEqual({
      status: 200,
      body: { accepted: true, zoneId: "North", recordId: "North#1", joinStep: 1 }
    });
    expect(await call("POST", "/register", body)).toEqual({
      status: 409,
      body: { accepted: false, reason: "Zone North is already registered by a live worker." }
    });
  });

  it("answers 400 to a registration without a usable address", async () => {
    const { call } = setup();
    const response = await call("POST", "/register", { zoneId: "North", address: "not a url" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Malformed registration: address: Invalid url" });
  });

  it("answers 413 when the body is over the size limit", async () => {
    const { api } = setup();
    const response = await api.handle("POST", "/report", async () => {
      throw new PayloadTooLargeError("request body", 1024);
    });

    expect(response).toEqual({ status: 413, body: { error: "Malformed request body: body exceeds 1024 bytes" } });
  });

  it("rejects a malformed report and asks the worker to resync", async () => {
    const { call, coordinator, registry } = setup();
    await call("POST", "/register", { zoneId: "North", address: "http://localhost:6001" });
    const pending = coordinator.runStep();

    const response = await call("POST", "/report", { zoneId: "North", step: 1, snapshot: { zoneId: "North" } });
    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ received: true, status: "rejected", resync: true });

    const snapshot = await pending;
    expect(snapshot).toMatchObject({ step: 1, missingZones: ["North"], staleZones: [] });
    expect(registry.get("North")?.status).toBe("Reporting");
  });

  it("rejects a report whose snapshot disagrees with the envelope", async () => {
    const { call } = setup();
    const response = await call("POST", "/report", { zoneId: "North", step: 2, snapshot: zoneSnapshot("North", 1) });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ status: "rejected", error: expect.stringContaining("snapshot zoneId and step must match") });
  });

  it("passes a well-formed report to the coordinator", async () => {
    const { call, coordinator } = setup();
    await call("POST", "/register", { zoneId: "North", address: "http://localhost:6001" });

    expect(await call("POST", "/report", { zoneId: "North", step: 1, snapshot: zoneSnapshot("North", 1, 2) })).toEqual({
      status: 200,
      body: { received: true, status: "unexpected" }
    });

    const pending = coordinator.runStep();
    expect(await call("POST", "/report", { zoneId: "North", step: 1, snapshot: zoneSnapshot("North", 1, 2) })).toEqual({
      status: 200,
      body: { received: true, status: "accepted" }
    });
    expect((await pending)?.totals.activeVehicles).toBe(2);
  });

  it("removes a worker explicitly", async () => {
    const { call } = setup();
    await call("POST", "/register", { zoneId: "South", address: "http://localhost:6002" });

    expect(await call("DELETE", "/workers/South")).toEqual({
      status: 200,
      body: { removed: true, zoneId: "South", recordId: "South#1" }
    });
    expect((await call("DELETE", "/workers/South")).status).toBe(404);
  });

  it("reports status, history and unknown routes", async () => {
    const { call } = setup();
    await call("POST", "/register", { zoneId: "West", address: "http://localhost:6004" });

    const status = await call("GET", "/status");
    expect(status.status).toBe(200);
    expect(status.body).toMatchObject({
      state: "Idle",
      active: true,
      step: 1,
      lastSettledStep: null,
      workers: [{ zoneId: "West", status: "Registered", registeredAtIso: "1970-01-01T00:00:00.000Z" }]
    });
    expect(await call("GET", "/history")).toEqual({ status: 200, body: { series: [] } });
    expect((await call("GET", "/nowhere")).status).toBe(404);
  });
});
