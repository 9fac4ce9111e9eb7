import { z } from "zod";
import { createLogger } from "@lp-builds/shared";
import type { AuthContext } from "./auth.js";
import { RemoteRequestError } from "./errors.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type ParamValue = string | number | boolean | ReadonlyArray<string>;

export type RequestParams = Record<string, ParamValue | undefined>;

export interface CallOptions {
  method?: "GET" | "POST" | "PATCH" | "DELETE";
  params?: RequestParams;
  /** Form-encoded, which is what Launchpad named operations take. */
  body?: RequestParams;
}

export interface RequestGatewayOptions {
  baseUrl: string;
  auth: AuthContext;
  fetch?: FetchLike;
}

const collectionEnvelope = z.object({
  entries: z.array(z.unknown()).optional(),
  total_size: z.number().int().optional(),
});

function encode(params: RequestParams): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      search.append(key, String(value));
    } else {
      for (const item of value) search.append(key, item);
    }
  }
  return search;
}

/**
 * RequestGateway issues signed calls against the Launchpad REST API.
 *
 * Paths are relative to the base URL unless they are already absolute, so
 * the `self_link` and `*_collection_link` values Launchpad hands back can be
 * passed straight through. Every non-2xx answer becomes a
 * RemoteRequestError; nothing is retried here.
 */
export class RequestGateway {
  private logger = createLogger("lp-gateway");
  private baseUrl: string;
  private auth: AuthContext;
  private fetchImpl: FetchLike;

  constructor(options: RequestGatewayOptions) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.auth = options.auth;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get username(): string {
    return this.auth.username;
  }

  /** Absolute URL for a path relative to the API root. */
  url(path: string): string {
    if (/^https?:\/\//.test(path)) return path;
    return `${this.baseUrl}${path.replace(/^\/+/, "")}`;
  }

  async call(path: string, options: CallOptions = {}): Promise<Response> {
    const method = options.method ?? "GET";
    let url = this.url(path);
    if (options.params) {
      const query = encode(options.params).toString();
      if (query) url += `${url.includes("?") ? "&" : "?"}${query}`;
    }

    const headers: Record<string, string> = {
      Authorization: this.auth.authorization,
      Accept: "application/json",
    };
    const init: RequestInit = { method, headers };
    if (options.body) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      init.body = encode(options.body).toString();
    }

    const resp = await this.fetchImpl(url, init);
    this.logger.debug(`${method} ${url} ${resp.status}`);

    if (!resp.ok) {
      const text = await resp.text();
      throw new RemoteRequestError(resp.status, text, method, url);
    }
    return resp;
  }

  async json<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CallOptions = {},
  ): Promise<T> {
    const resp = await this.call(path, options);
    return schema.parse(await resp.json());
  }

  /**
   * Fetch a collection and return its entries. A missing `entries` field is
   * an empty collection.
   */
  async collection<T>(
    path: string,
    entrySchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: RequestParams,
  ): Promise<T[]> {
    const envelope = await this.json(path, collectionEnvelope, { params });
    return (envelope.entries ?? []).map((entry) => entrySchema.parse(entry));
  }
}
