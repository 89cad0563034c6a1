/**
 * Response head interpretation: status code, original content length,
 * and whether the body must be inflated on the way in.
 */
import { ORIGINAL_CONTENT_LENGTH_HEADER } from "./constants.js";
import type { RequestContext } from "./context.js";
import { GzipInflater } from "./inflate.js";
import type { HttpRequest } from "./request.js";

export interface HeaderSource {
  statusCode(): number;
  header(name: string): string | null;
}

export interface ResponseHead {
  httpStatus: number;
  /** Pre-compression length announced by the server, null if absent */
  originalLength: number | null;
  compressed: boolean;
}

const DECIMAL_RE = /^\d+$/;
const GZIP_ENCODINGS = new Set(["gzip", "x-gzip"]);

/**
 * Decode the response head.
 * A raw destination (caller pre-sized the buffer) disables decompression
 * regardless of what the headers claim.
 */
export function decodeResponseHead(source: HeaderSource, rawDestination: boolean): ResponseHead {
  const httpStatus = source.statusCode();
  if (rawDestination) {
    return { httpStatus, originalLength: null, compressed: false };
  }

  const lengthValue = source.header(ORIGINAL_CONTENT_LENGTH_HEADER)?.trim();
  if (!lengthValue || !DECIMAL_RE.test(lengthValue)) {
    return { httpStatus, originalLength: null, compressed: false };
  }
  const originalLength = parseInt(lengthValue, 10);
  if (!Number.isSafeInteger(originalLength)) {
    return { httpStatus, originalLength: null, compressed: false };
  }

  const encoding = source.header("content-encoding")?.trim().toLowerCase() ?? "";
  return { httpStatus, originalLength, compressed: GZIP_ENCODINGS.has(encoding) };
}

/**
 * Apply a decoded head to the exchange. When compressed, the request buffer
 * is pre-sized to the original length and leased to a fresh inflater, so
 * decompressed bytes land in place.
 */
export function applyResponseHead(
  context: RequestContext,
  request: HttpRequest,
  head: ResponseHead,
): void {
  request.httpStatus = head.httpStatus;
  context.inflater?.destroy();
  context.inflater = null;

  request.contentLength = head.originalLength ?? -1;

  if (head.compressed && head.originalLength !== null) {
    context.inflater = new GzipInflater(request.in.lease(head.originalLength));
  }
}
