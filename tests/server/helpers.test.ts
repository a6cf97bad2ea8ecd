/**
 * HTTP Helper Tests
 */

import { describe, it, expect } from "vitest";
import { validateHeaderValue } from "http";
import {
  contentDisposition,
  parseBody,
  readRawBody,
  sendError,
  statusForKind,
} from "../../src/server/helpers";
import { SessionError } from "../../src/session/errors";
import { fakeRequest, fakeResponse } from "../fakes";

describe("parseBody", () => {
  it("parses a JSON object", async () => {
    await expect(parseBody(fakeRequest("POST", "/", { level: 10 }))).resolves.toEqual({ level: 10 });
  });

  it("treats an empty body as {}", async () => {
    await expect(parseBody(fakeRequest("POST", "/"))).resolves.toEqual({});
  });

  it("rejects malformed JSON", async () => {
    await expect(parseBody(fakeRequest("POST", "/", "{level"))).rejects.toThrow("Invalid JSON");
  });

  it("rejects non-object JSON", async () => {
    await expect(parseBody(fakeRequest("POST", "/", "[1,2]"))).rejects.toThrow(
      "Request body must be a JSON object"
    );
  });
});

describe("readRawBody", () => {
  it("returns the bytes as sent", async () => {
    const body = await readRawBody(fakeRequest("POST", "/", new Uint8Array([0xff, 0xd8, 0xff])));
    expect(Array.from(body)).toEqual([0xff, 0xd8, 0xff]);
  });
});

describe("contentDisposition", () => {
  it("quotes plain ASCII names", () => {
    expect(contentDisposition("beach.jpg")).toBe('attachment; filename="beach.jpg"');
  });

  it("adds an encoded name for non-ASCII characters", () => {
    expect(contentDisposition("фото.jpg")).toBe(
      "attachment; filename=\"____.jpg\"; filename*=UTF-8''%D1%84%D0%BE%D1%82%D0%BE.jpg"
    );
  });

  it("keeps quotes and line breaks out of the header", () => {
    const header = contentDisposition('a"b\r\n.jpg');

    expect(header).toBe("attachment; filename=\"a_b__.jpg\"; filename*=UTF-8''a%22b%0D%0A.jpg");
    expect(() => validateHeaderValue("Content-Disposition", header)).not.toThrow();
  });
});

describe("sendError", () => {
  it("maps each error kind to a status", () => {
    expect(statusForKind("InvalidRequest")).toBe(400);
    expect(statusForKind("NotConnected")).toBe(503);
    expect(statusForKind("WrongTransport")).toBe(409);
    expect(statusForKind("ConnectionFailed")).toBe(502);
    expect(statusForKind("CommandFailed")).toBe(500);
    expect(statusForKind("ParseError")).toBe(502);
  });

  it("includes raw output for parse errors", () => {
    const r = fakeResponse();

    sendError(r.res, new SessionError("ParseError", "Unrecognized power state output", { output: "???" }));

    expect(r.status()).toBe(502);
    expect(r.json()).toEqual({ error: "Unrecognized power state output", kind: "ParseError", output: "???" });
  });

  it("answers 500 for unexpected errors", () => {
    const r = fakeResponse();

    sendError(r.res, new TypeError("x is undefined"));

    expect(r.status()).toBe(500);
    expect(r.json()).toEqual({ error: "x is undefined" });
  });
});
