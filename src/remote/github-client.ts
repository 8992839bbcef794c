/**
 * Axios-based HTTP client for the GitHub contents API
 *
 * - Authentication headers on every request
 * - Rate limit tracking from response headers
 * - Linear backoff retry for 5xx and connection failures
 * - Typed RemoteError for rate limiting and exhausted retries
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { setTimeout as delay } from "node:timers/promises";
import type { GitHubAuth } from "./github-auth.js";
import { RateLimitTracker } from "./rate-limit-tracker.js";
import { RemoteRequestError, type RemoteError } from "./errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export interface GitHubResponse {
  status: number;
  data: unknown;
  path: string;
}

export interface GitHubClientOptions {
  auth: GitHubAuth;
  /** Retry attempts for transient failures (default: 3) */
  maxRetries?: number;
  /** Base delay between retries, multiplied by the attempt number (default: 1000) */
  retryDelayMs?: number;
  timeoutMs?: number;
  rateLimitWarningThreshold?: number;
  /** Custom transport, used by tests to stay in process */
  adapter?: AxiosAdapter;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const RETRYABLE_CODES = new Set([
  "ECONNABORTED",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "ERR_NETWORK",
]);

export class GitHubClient {
  readonly auth: GitHubAuth;
  readonly rateLimits: RateLimitTracker;
  private http: AxiosInstance;
  private maxRetries: number;
  private retryDelayMs: number;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: GitHubClientOptions) {
    this.auth = options.auth;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.logger = (options.logger ?? silentLogger).child("GitHubClient");
    this.sleep = options.sleep ?? ((ms) => delay(ms).then(() => undefined));
    this.rateLimits = new RateLimitTracker({ warningThreshold: options.rateLimitWarningThreshold });

    this.http = axios.create({
      baseURL: options.auth.baseUrl,
      headers: options.auth.headers,
      timeout: options.timeoutMs ?? 30_000,
      // Status handling happens in withRetry so every transport behaves the same
      validateStatus: () => true,
      adapter: options.adapter,
    });

    this.http.interceptors.response.use((response) => {
      this.rateLimits.updateFromHeaders(response.headers);
      if (this.rateLimits.isNearLimit) {
        this.logger.warn(this.rateLimits.status);
      }
      return response;
    });
  }

  async get(path: string): Promise<GitHubResponse> {
    return this.withRetry(path, () => this.http.get(path));
  }

  async put(path: string, data: Record<string, unknown>): Promise<GitHubResponse> {
    return this.withRetry(path, () => this.http.put(path, data));
  }

  async delete(path: string, data: Record<string, unknown>): Promise<GitHubResponse> {
    return this.withRetry(path, () => this.http.delete(path, { data }));
  }

  /**
   * Execute a request, retrying transient failures
   *
   * @throws RemoteRequestError for rate limiting, exhausted retries, or network failure
   */
  private async withRetry(
    path: string,
    request: () => Promise<AxiosResponse>
  ): Promise<GitHubResponse> {
    let attempts = 0;

    for (;;) {
      attempts++;
      let response: AxiosResponse;

      try {
        response = await request();
      } catch (error) {
        if (attempts < this.maxRetries && isRetryableTransportError(error)) {
          this.logger.debug(`Transport failure on ${path}, retrying`, { attempt: attempts });
          await this.sleep(this.retryDelayMs * attempts);
          continue;
        }
        throw new RemoteRequestError(toNetworkError(error));
      }

      const { status } = response;

      const rateLimited = status === 403 && responseMessage(response.data).includes("rate limit");
      if (status === 429 || rateLimited) {
        throw new RemoteRequestError({
          kind: "rate-limit-exceeded",
          resetAt: this.rateLimits.resetAt,
          remaining: this.rateLimits.remaining,
        });
      }

      if (status >= 500) {
        if (attempts < this.maxRetries) {
          this.logger.debug(`Server error ${status} on ${path}, retrying`, { attempt: attempts });
          await this.sleep(this.retryDelayMs * attempts);
          continue;
        }
        throw new RemoteRequestError({
          kind: "server",
          statusCode: status,
          details: responseMessage(response.data) || undefined,
        });
      }

      return { status, data: response.data, path };
    }
  }
}

export function responseMessage(data: unknown): string {
  if (
    typeof data === "object" &&
    data !== null &&
    "message" in data &&
    typeof data.message === "string"
  ) {
    return data.message;
  }
  return "";
}

function isRetryableTransportError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  return error.code !== undefined && RETRYABLE_CODES.has(error.code);
}

function toNetworkError(error: unknown): RemoteError {
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === "ECONNABORTED" || error.code === "ETIMEDOUT";
    return {
      kind: "network",
      details: `${timedOut ? "Connection timeout" : "Connection failed"}: ${error.message}`,
    };
  }
  return { kind: "network", details: error instanceof Error ? error.message : String(error) };
}
