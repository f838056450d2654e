/**
 * Shared fetch utilities with error handling
 */

import type { FetchResult, McpToolResponse, Headers } from "../types/index.js";

const DEFAULT_TIMEOUT = 10000; // 10 seconds

export interface FetchOptions extends RequestInit {
  timeout?: number;
  headers?: Headers;
}

/**
 * Fetch with timeout and error handling. The timer stays armed until
 * `read` has consumed the body, so a stalled body aborts too.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: FetchOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const { timeout = DEFAULT_TIMEOUT, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
    return await read(response);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch JSON with error handling. The body is returned unvalidated;
 * callers parse it against their own schema.
 */
export async function fetchJson(
  url: string,
  options: FetchOptions = {}
): Promise<FetchResult<unknown>> {
  let status: number | null = null;
  let headers: globalThis.Headers | null = null;
  try {
    return await fetchWithTimeout(url, options, async (response): Promise<FetchResult<unknown>> => {
      status = response.status;
      headers = response.headers;

      if (!response.ok) {
        return {
          data: null,
          error: `HTTP ${response.status}: ${response.statusText}`,
          status: response.status,
          headers: response.headers,
        };
      }

      const data: unknown = await response.json();
      return { data, error: null, status: response.status, headers: response.headers };
    });
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      return { data: null, error: "Request timed out", status: null, headers: null, timedOut: true };
    }
    return {
      data: null,
      error: error instanceof Error ? error.message : String(error),
      status,
      headers,
    };
  }
}

/**
 * Create an MCP error response
 */
export function errorResponse(message: string): McpToolResponse {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

/**
 * Create an MCP success response
 */
export function textResponse(text: string): McpToolResponse {
  return {
    content: [{ type: "text", text }],
  };
}

/**
 * Format bytes to human readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(1)) + " " + sizes[i];
}

/**
 * Format a 0..1 ratio as a percentage with one decimal
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
