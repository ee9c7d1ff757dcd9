import { AxiosError } from "axios";
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { MealieClient } from "../../src/services/client.js";
import type { ClientFactory, MealieClientOptions } from "../../src/services/client.js";

export interface RecordedCall {
  method: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
  authorization: string;
}

export interface FakeResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
  /** Fail without a response, the way a refused connection does. */
  networkError?: string;
}

export type FakeRoute = FakeResponse | FakeResponse[] | ((call: RecordedCall) => FakeResponse);

function decodeBody(data: unknown): unknown {
  if (typeof data !== "string") return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

function encodeBody(body: unknown, binary: boolean): unknown {
  if (binary) return Buffer.isBuffer(body) ? body : Buffer.from(typeof body === "string" ? body : "");
  if (body === undefined) return "";
  return typeof body === "string" ? body : JSON.stringify(body);
}

/**
 * Route table standing in for a Mealie server. Routes are keyed by
 * "METHOD /path"; an array route answers its entries in turn and then keeps
 * repeating the last one. Anything unrouted gets a 404.
 */
export class FakeMealie {
  readonly calls: RecordedCall[] = [];
  readonly sleeps: number[] = [];
  private readonly routes = new Map<string, FakeRoute>();
  private readonly served = new Map<string, number>();

  on(method: string, path: string, route: FakeRoute): this {
    this.routes.set(`${method.toUpperCase()} ${path}`, route);
    return this;
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method.toUpperCase() && call.url === path);
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const call: RecordedCall = {
      method: (config.method ?? "get").toUpperCase(),
      url: config.url ?? "",
      params: { ...config.params },
      body: decodeBody(config.data),
      authorization: String(config.headers.Authorization ?? ""),
    };
    this.calls.push(call);

    const reply = this.reply(call);
    if (reply.networkError !== undefined) {
      throw new AxiosError(`connect ${reply.networkError} 127.0.0.1:9000`, reply.networkError, config);
    }

    const status = reply.status ?? 200;
    const response: AxiosResponse = {
      data: encodeBody(reply.body, config.responseType === "arraybuffer"),
      status,
      statusText: String(status),
      headers: reply.headers ?? {},
      config,
      request: {},
    };
    const accepted = config.validateStatus ? config.validateStatus(status) : true;
    if (!accepted) {
      const code = status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST;
      throw new AxiosError(`Request failed with status code ${status}`, code, config, {}, response);
    }
    return response;
  };

  private reply(call: RecordedCall): FakeResponse {
    const key = `${call.method} ${call.url}`;
    const route = this.routes.get(key);
    if (route === undefined) return { status: 404, body: { detail: "Not Found" } };
    if (typeof route === "function") return route(call);
    if (!Array.isArray(route)) return route;

    const index = this.served.get(key) ?? 0;
    this.served.set(key, index + 1);
    return route[Math.min(index, route.length - 1)] ?? { status: 404 };
  }

  client(options: MealieClientOptions = {}): MealieClient {
    return new MealieClient({
      baseUrl: "http://mealie.test",
      apiToken: "test-secret",
      adapter: this.adapter,
      sleep: async (ms) => {
        this.sleeps.push(ms);
      },
      ...options,
    });
  }

  factory(options: MealieClientOptions = {}): ClientFactory {
    return () => this.client(options);
  }
}

/** Tool functions answer with JSON text; tests look at the parsed value. */
export function parse(output: string): Record<string, unknown> {
  const value: unknown = JSON.parse(output);
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`Expected a JSON object, got: ${output}`);
  }
  return { ...value };
}
