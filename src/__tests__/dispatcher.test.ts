import { afterEach, describe, it, expect, vi } from "vitest";
import { TransportFailureError } from "../errors";
import { HttpStepDispatcher } from "../master/dispatcher";
import { Registry } from "../master/registry";

function northRecord() {
  return new Registry({ clock: () => 0 }).register("North", "http://localhost:6001");
}

describe("HttpStepDispatcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the step to the worker's address", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response("{}", { status: 202 }));
    vi.stubGlobal("fetch", fetchMock);

    await new HttpStepDispatcher(1000).sendStep(northRecord(), 4);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:6001/step");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"step":4}');
  });

  it("treats a server error as retryable and a refusal as final", async () => {
    const dispatcher = new HttpStepDispatcher(1000);

    vi.stubGlobal("fetch", async () => new Response("down", { status: 503 }));
    const unavailable = await dispatcher.sendStep(northRecord(), 4).catch((error: unknown) => error);
    expect(unavailable).toBeInstanceOf(TransportFailureError);
    expect(unavailable).toMatchObject({ status: 503, retryable: true, message: "Worker North refused step 4 (503)." });

    vi.stubGlobal("fetch", async () => new Response("no", { status: 404 }));
    const refused = await dispatcher.sendStep(northRecord(), 4).catch((error: unknown) => error);
    expect(refused).toMatchObject({ status: 404, retryable: false });
  });

  it("reports an unreachable worker as a retryable failure", async () => {
    vi.stubGlobal("fetch", async () => {
      throw new TypeError("fetch failed");
    });

    const error = await new HttpStepDispatcher(1000).sendStep(northRecord(), 4).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TransportFailureError);
    expect(error).toMatchObject({
      status: 0,
      retryable: true,
      message: "Worker North at http://localhost:6001 unreachable: fetch failed"
    });
  });
});
