/**
 * Mackerel API Client
 *
 * Authenticated read access to the monitor and alert listings.
 * Requests are issued one at a time; every failure is raised to the caller.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { ResponseFormatError, UpstreamError } from "../errors.js";
import { PAGE_SIZE } from "../config.js";
import {
  alertPageSchema,
  monitorListSchema,
  type AlertPage,
  type AlertQuery,
  type Monitor,
} from "./types.js";

/**
 * Client configuration
 */
export interface MackerelClientConfig {
  /** API base URL (e.g., https://api.mackerelio.com) */
  apiUrl: string;
  /** API key for authentication */
  apiKey: string;
  /** Request timeout in ms */
  timeout?: number;
}

/**
 * Read-only view of the API used by the exporter
 */
export interface AlertSource {
  listMonitors(): Promise<Monitor[]>;
  listAlerts(query: AlertQuery): AsyncIterable<AlertPage>;
}

export class MackerelClient implements AlertSource {
  private config: Required<MackerelClientConfig>;

  constructor(config: MackerelClientConfig) {
    this.config = {
      apiUrl: config.apiUrl.replace(/\/$/, ""),
      apiKey: config.apiKey,
      timeout: config.timeout ?? 10000,
    };
  }

  /**
   * Fetch every monitor of the organization
   */
  async listMonitors(): Promise<Monitor[]> {
    const body = await this.get("/api/v0/monitors", new URLSearchParams(), monitorListSchema);
    return body.monitors;
  }

  /**
   * Page through alerts, newest first, until the window is passed.
   *
   * Stops when the API reports no further page, when a page is empty, or
   * when the last alert on a page opened before `query.from`.
   */
  async *listAlerts(query: AlertQuery): AsyncGenerator<AlertPage, void, undefined> {
    const params = new URLSearchParams({
      withClosed: "true",
      from: String(query.from),
      to: String(query.to),
      limit: String(query.pageSize ?? PAGE_SIZE),
    });

    while (true) {
      const page = await this.get("/api/v0/alerts", params, alertPageSchema);
      yield page;

      const last = page.alerts.at(-1);
      if (!page.nextId || !last || last.openedAt < query.from) {
        return;
      }
      if (page.nextId === params.get("nextId")) {
        throw new ResponseFormatError(
          `Pagination did not advance: nextId ${page.nextId} repeated`,
          "/api/v0/alerts"
        );
      }
      params.set("nextId", page.nextId);
    }
  }

  private async get<T>(
    endpoint: string,
    params: URLSearchParams,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    const query = params.toString();
    const url = `${this.config.apiUrl}${endpoint}${query ? `?${query}` : ""}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let text: string;
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "X-Api-Key": this.config.apiKey,
          Accept: "application/json",
          "User-Agent": "mackerel-alert-export/0.1.0",
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => "Unknown error");
        throw new UpstreamError(
          `GET ${endpoint} failed: ${response.status} ${errorText}`,
          endpoint,
          response.status
        );
      }

      text = await response.text();
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }

      if (error instanceof Error && error.name === "AbortError") {
        throw new UpstreamError(
          `GET ${endpoint} timed out after ${this.config.timeout}ms`,
          endpoint,
          undefined,
          error
        );
      }

      throw new UpstreamError(
        `Network error on GET ${endpoint}: ${error instanceof Error ? error.message : "Unknown error"}`,
        endpoint,
        undefined,
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timeoutId);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ResponseFormatError(`GET ${endpoint} returned invalid JSON`, endpoint);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const first = result.error.issues[0];
      const where = first ? ` at ${first.path.join(".") || "<root>"}: ${first.message}` : "";
      throw new ResponseFormatError(
        `GET ${endpoint} returned an unexpected shape${where}`,
        endpoint,
        result.error.issues
      );
    }
    return result.data;
  }
}
