import { describeError, TransportFailureError } from "../errors";
import { postJson } from "../net/http";
import type { StepDispatcher } from "./coordinator";
import type { WorkerRecord } from "./registry";

export class HttpStepDispatcher implements StepDispatcher {
  private timeoutMs: number;

  constructor(timeoutMs: number) {
    this.timeoutMs = timeoutMs;
  }

  async sendStep(record: WorkerRecord, step: number): Promise<void> {
    let response: Awaited<ReturnType<typeof postJson>>;
    try {
      response = await postJson(`${record.address}/step`, { step }, this.timeoutMs);
    } catch (error) {
      throw new TransportFailureError(
        `Worker ${record.zoneId} at ${record.address} unreachable: ${describeError(error)}`,
        0,
        true,
        { cause: error }
      );
    }
    if (!response.ok) {
      throw new TransportFailureError(
        `Worker ${record.zoneId} refused step ${step} (${response.status}).`,
        response.status,
        response.status >= 500
      );
    }
  }
}
