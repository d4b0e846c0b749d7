import { z } from "zod";
import { logger } from "../logger";

export type ApiAuth =
  | { kind: "password"; tokenPath: string; username: string; password: string }
  | { kind: "apiKey"; apiKey: string };

export interface ApiClientConfig {
  name: string;
  baseUrl: string;
  auth: ApiAuth;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface ApiResponse {
  status: number;
  body: unknown;
}

const FETCH_TIMEOUT_MS = 30_000;

const tokenResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: unknown
  ) {
    super(message);
    this.name = "ApiError";
  }

  get isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/** JSON-over-HTTP client with bearer auth; password auth renews its token once on 401. */
export class ApiClient {
  private readonly name: string;
  private readonly baseUrl: string;
  private readonly auth: ApiAuth;

  private accessToken: string | null = null;
  private expiresAt = 0;
  private authPromise: Promise<string> | null = null;

  constructor(config: ApiClientConfig) {
    this.name = config.name;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.auth = config.auth;
  }

  async request(
    method: string,
    path: string,
    opts: { query?: QueryParams; body?: unknown } = {}
  ): Promise<ApiResponse> {
    const token = await this.getToken();
    let result = await this.doFetch(method, path, opts, token);

    if (result.status === 401 && this.auth.kind === "password") {
      logger.info({ tag: "API", api: this.name }, "Received 401, renewing token and retrying");
      const freshToken = await this.authenticate(this.auth);
      result = await this.doFetch(method, path, opts, freshToken);
    }

    if (!result.ok) {
      throw new ApiError(
        `${this.name} API call failed: ${method} ${path} → ${result.status}`,
        result.status,
        result.body
      );
    }

    return { status: result.status, body: result.body };
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async doFetch(
    method: string,
    path: string,
    opts: { query?: QueryParams; body?: unknown },
    token: string
  ): Promise<{ status: number; ok: boolean; body: unknown }> {
    const url = this.buildUrl(path, opts.query);
    const start = Date.now();

    logger.debug(
      { tag: "API", api: this.name, method, path, query: opts.query, requestBody: opts.body },
      "API request"
    );

    const res = await fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });

    const durationMs = Date.now() - start;
    let responseBody: unknown;
    const contentType = res.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      responseBody = await res.json();
    } else {
      responseBody = await res.text();
    }

    if (res.ok) {
      logger.info(
        { tag: "API", api: this.name, method, path, status: res.status, durationMs },
        `${method} ${path} → ${res.status} (${durationMs}ms)`
      );
    } else {
      logger.error(
        { tag: "API", api: this.name, method, path, status: res.status, durationMs },
        `${method} ${path} → ${res.status} (${durationMs}ms)`
      );
      logger.debug(
        { tag: "API", api: this.name, method, path, responseBody },
        "API error response body"
      );
    }

    return { status: res.status, ok: res.ok, body: responseBody };
  }

  private async getToken(): Promise<string> {
    const auth = this.auth;
    if (auth.kind === "apiKey") return auth.apiKey;

    if (this.accessToken && Date.now() < this.expiresAt) {
      return this.accessToken;
    }
    if (this.authPromise) return this.authPromise;
    this.authPromise = this.authenticate(auth).finally(() => {
      this.authPromise = null;
    });
    return this.authPromise;
  }

  private async authenticate(
    auth: Extract<ApiAuth, { kind: "password" }>
  ): Promise<string> {
    const url = `${this.baseUrl}${auth.tokenPath}`;
    const start = Date.now();

    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        username: auth.username,
        password: auth.password,
      }),
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });

    const durationMs = Date.now() - start;

    if (!res.ok) {
      const errorBody = await res.text();
      logger.error(
        { tag: "API", api: this.name, action: "authenticate", status: res.status, durationMs },
        `Authentication failed → ${res.status} (${durationMs}ms)`
      );
      logger.debug(
        { tag: "API", api: this.name, action: "authenticate", errorBody },
        "Authentication error response body"
      );
      throw new ApiError(`${this.name} authentication failed: ${res.status}`, res.status, errorBody);
    }

    const data = tokenResponse.parse(await res.json());
    this.accessToken = data.access_token;
    this.expiresAt = Date.now() + data.expires_in * 1000 - 60_000;

    logger.info(
      { tag: "API", api: this.name, action: "authenticate", expiresIn: data.expires_in, durationMs },
      `Token obtained, expires in ${data.expires_in}s`
    );

    return data.access_token;
  }
}
