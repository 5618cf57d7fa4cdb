import { Readable } from "node:stream";
import { describe, it, expect } from "vitest";
import { MalformedPayloadError, PayloadTooLargeError } from "../errors";
import { malformedStatus, readJsonBody } from "../net/http";

describe("readJsonBody", () => {
  it("parses a body split across chunks", async () => {
    const body = Readable.from([Buffer.from('{"step":'), Buffer.from("3}")]);
    expect(await readJsonBody(body)).toEqual({ step: 3 });
  });

  it("reads an empty body as null and rejects invalid JSON", async () => {
    expect(await readJsonBody(Readable.from([]))).toBeNull();
    await expect(readJsonBody(Readable.from([Buffer.from("{step")]))).rejects.toThrow(
      "Malformed request body: body is not valid JSON"
    );
  });

  it("stops reading past the limit without destroying the request", async () => {
    const body = Readable.from([Buffer.from('{"step":'), Buffer.from("123456789}")]);

    const error = await readJsonBody(body, 10).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PayloadTooLargeError);
    expect(error).toMatchObject({ message: "Malformed request body: body exceeds 10 bytes", limitBytes: 10 });
    expect(body.destroyed).toBe(false);
  });

  it("maps an oversized body to 413 and other malformed payloads to 400", () => {
    expect(malformedStatus(new PayloadTooLargeError("request body", 10))).toBe(413);
    expect(malformedStatus(new MalformedPayloadError("report", ["step: Required"]))).toBe(400);
  });
});
