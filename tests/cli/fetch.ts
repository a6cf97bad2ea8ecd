/**
 * Recording fetch stand-in for the CLI tests
 */

import type { FetchFn } from "../../src/cli/client";

export interface RecordedCall {
  url: string;
  method: string;
  body: RequestInit["body"];
  headers: RequestInit["headers"];
}

export type Responder = (call: RecordedCall) => Response;

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function recordingFetch(responder: Responder = () => json({})) {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const call: RecordedCall = {
      url: String(input),
      method: init?.method ?? "GET",
      body: init?.body,
      headers: init?.headers,
    };
    calls.push(call);
    return responder(call);
  };
  return { fetch: fetchFn, calls };
}

/**
 * JSON body of a recorded call
 */
export function sentJson(call: RecordedCall | undefined): unknown {
  if (typeof call?.body !== "string") {
    throw new Error("Expected a JSON request body");
  }
  return JSON.parse(call.body);
}
