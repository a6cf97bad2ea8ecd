/**
 * HTTP client for the Frameo Control API
 */

import { errorMessage } from "../log";

export type FetchFn = typeof fetch;

export interface FrameoClientOptions {
  host?: string;
  port?: number;
  /** Injected for tests */
  fetch?: FetchFn;
}

/**
 * API answered with an error status, or could not be reached
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly kind?: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class FrameoClient {
  readonly baseUrl: string;
  private fetchFn: FetchFn;

  constructor(options: FrameoClientOptions = {}) {
    this.baseUrl = `http://${options.host ?? "localhost"}:${options.port ?? 5000}`;
    this.fetchFn = options.fetch ?? fetch;
  }

  get(path: string): Promise<JsonObject> {
    return this.json("GET", path);
  }

  post(path: string, body?: object): Promise<JsonObject> {
    return this.json("POST", path, body);
  }

  /**
   * POST raw bytes, JSON response
   */
  async upload(path: string, data: Uint8Array): Promise<JsonObject> {
    const response = await this.send(path, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body: data,
    });
    return this.readJson(response);
  }

  /**
   * Request a binary resource
   */
  async bytes(method: "GET" | "POST", path: string, body?: object): Promise<Uint8Array> {
    const response = await this.send(path, this.init(method, body));
    return new Uint8Array(await response.arrayBuffer());
  }

  private async json(method: "GET" | "POST", path: string, body?: object): Promise<JsonObject> {
    const response = await this.send(path, this.init(method, body));
    return this.readJson(response);
  }

  private init(method: "GET" | "POST", body?: object): RequestInit {
    if (method === "GET") return { method };
    return {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body ?? {}),
    };
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, init);
    } catch (err) {
      throw new ApiError(`Cannot connect to API at ${this.baseUrl} (${errorMessage(err)})`);
    }
    if (!response.ok) {
      throw await this.toApiError(response);
    }
    return response;
  }

  private async toApiError(response: Response): Promise<ApiError> {
    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      if (isJsonObject(body) && typeof body.error === "string") {
        const kind = typeof body.kind === "string" ? body.kind : undefined;
        return new ApiError(body.error, response.status, kind);
      }
    } catch (err) {
      return new ApiError(`HTTP ${response.status}: ${text || errorMessage(err)}`, response.status);
    }
    return new ApiError(`HTTP ${response.status}`, response.status);
  }

  private async readJson(response: Response): Promise<JsonObject> {
    const body: unknown = await response.json();
    if (!isJsonObject(body)) {
      throw new ApiError("Unexpected API response");
    }
    return body;
  }
}
