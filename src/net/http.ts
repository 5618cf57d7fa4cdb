import type { IncomingMessage, ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import { MalformedPayloadError, PayloadTooLargeError } from "../errors";

const MAX_BODY_BYTES = 1024 * 1024;

export interface JsonResponse {
  status: number;
  body: unknown;
}

export async function readJsonBody(req: Readable, limitBytes = MAX_BODY_BYTES): Promise<unknown> {
  const body = await readBody(req, limitBytes);
  if (!body) {
    return null;
  }
  try {
    return JSON.parse(body);
  } catch {
    throw new MalformedPayloadError("request body", ["body is not valid JSON"]);
  }
}

/** Stops listening past the limit and leaves the socket open so the error response still goes out. */
function readBody(req: Readable, limitBytes: number): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const cleanup = () => {
      req.off("data", onData);
      req.off("end", onEnd);
      req.off("error", onError);
    };
    const onData = (chunk: Buffer | string) => {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += buffer.length;
      if (size > limitBytes) {
        cleanup();
        req.pause();
        reject(new PayloadTooLargeError("request body", limitBytes));
        return;
      }
      chunks.push(buffer);
    };
    const onEnd = () => {
      cleanup();
      resolve(Buffer.concat(chunks).toString("utf-8"));
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", onError);
  });
}

export function malformedStatus(error: MalformedPayloadError): number {
  return error instanceof PayloadTooLargeError ? 413 : 400;
}

export function sendJson(res: ServerResponse, response: JsonResponse): void {
  const payload = JSON.stringify(response.body ?? {});
  res.statusCode = response.status;
  if (!res.req.complete) {
    // unread request body left on the socket
    res.setHeader("Connection", "close");
  }
  res.setHeader("Content-Type", "application/json");
  res.setHeader("Content-Length", Buffer.byteLength(payload));
  res.end(payload);
}

export function requestPath(req: IncomingMessage): string {
  try {
    return new URL(req.url ?? "/", "http://localhost").pathname;
  } catch {
    return "/";
  }
}

export async function postJson(
  url: string,
  body: unknown,
  timeoutMs: number
): Promise<{ status: number; ok: boolean; json: unknown }> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs)
  });
  const text = await safeReadText(response);
  let json: unknown = null;
  if (text) {
    try {
      json = JSON.parse(text);
    } catch {
      json = null;
    }
  }
  return { status: response.status, ok: response.ok, json };
}

async function safeReadText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}
