/**
 * @fileoverview Maps transport failures to the calendar error taxonomy.
 *
 * Everything that goes wrong before a response body is in hand becomes an
 * AcquisitionError; problems with the body itself are ParseErrors raised by
 * the parser.
 *
 * @module @market-hours/provider-nyse/errors
 */

import { isAxiosError } from "axios";
import { AcquisitionError, isAcquisitionError } from "@market-hours/contracts";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

/**
 * Wrap any request failure in an AcquisitionError.
 *
 * @example
 * ```typescript
 * try {
 *   await http.get(url);
 * } catch (error) {
 *   throw toAcquisitionError(error, "nyse", url, 30000);
 * }
 * ```
 */
export function toAcquisitionError(
  error: unknown,
  source: string,
  requestUrl: string,
  timeoutMs: number
): AcquisitionError {
  if (isAcquisitionError(error)) {
    return error;
  }

  if (isAxiosError(error)) {
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return timeoutError(source, requestUrl, timeoutMs);
    }
    const statusCode = error.response?.status;
    if (statusCode !== undefined) {
      return httpStatusError(source, requestUrl, statusCode);
    }
    return new AcquisitionError(`Schedule request failed: ${error.message}`, {
      source,
      reason: "network",
      requestUrl,
      errorCode: error.code,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AcquisitionError(`Schedule request failed: ${message}`, {
    source,
    reason: "network",
    requestUrl,
  });
}

export function timeoutError(source: string, requestUrl: string, timeoutMs: number): AcquisitionError {
  return new AcquisitionError(`Schedule request timed out after ${timeoutMs}ms`, {
    source,
    reason: "timeout",
    requestUrl,
    timeoutMs,
  });
}

export function httpStatusError(source: string, requestUrl: string, statusCode: number): AcquisitionError {
  return new AcquisitionError(`Schedule request returned HTTP ${statusCode}`, {
    source,
    reason: "http_status",
    statusCode,
    requestUrl,
  });
}
