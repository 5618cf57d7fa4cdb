import { describeError, MalformedPayloadError, TransportFailureError } from "../errors";
import { isAbortError } from "../net/backoff";
import { postJson } from "../net/http";
import {
  parseRegistrationResult,
  parseReportResult,
  type RegistrationRequest,
  type RegistrationResult,
  type ReportRequest,
  type ReportResult
} from "../protocol/types";

export interface MasterLink {
  register(request: RegistrationRequest): Promise<RegistrationResult>;
  report(request: ReportRequest): Promise<ReportResult>;
}

export class HttpMasterLink implements MasterLink {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(baseUrl: string, timeoutMs: number) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
  }

  async register(request: RegistrationRequest): Promise<RegistrationResult> {
    const response = await this.post("/register", request);
    if (response.status === 200 || response.status === 409) {
      return this.parse(() => parseRegistrationResult(response.json), response.status);
    }
    throw this.statusError("registration", response.status);
  }

  async report(request: ReportRequest): Promise<ReportResult> {
    const response = await this.post("/report", request);
    if (response.status === 200 || response.status === 400) {
      return this.parse(() => parseReportResult(response.json), response.status);
    }
    throw this.statusError("report", response.status);
  }

  private async post(path: string, body: unknown) {
    try {
      return await postJson(`${this.baseUrl}${path}`, body, this.timeoutMs);
    } catch (error) {
      const detail = isAbortError(error) ? `no answer within ${this.timeoutMs} ms` : describeError(error);
      throw new TransportFailureError(`Master unreachable at ${this.baseUrl}: ${detail}`, 0, true, { cause: error });
    }
  }

  private parse<T>(read: () => T, status: number): T {
    try {
      return read();
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        throw new TransportFailureError(`Master answered ${status} with an unexpected body: ${error.message}`, status, false, {
          cause: error
        });
      }
      throw error;
    }
  }

  private statusError(what: string, status: number): TransportFailureError {
    return new TransportFailureError(`Master rejected ${what} (${status}).`, status, status >= 500 || status === 429);
  }
}
