/**
 * curl command line for a REST call run on a remote host
 */

import { RestClientError } from "../errors.js";

export interface CurlOptions {
  /**
   * Sent in the query string
   */
  params?: Readonly<Record<string, string>>;
  headers?: Readonly<Record<string, string>>;
  /**
   * `[user, password]` for basic authentication
   */
  auth?: readonly string[];
  /**
   * Verify the server certificate (default: true)
   */
  verify?: boolean;
  /**
   * Only fetch status line and headers
   */
  documentInfoOnly?: boolean;
  /**
   * Inline request body
   */
  data?: string;
  /**
   * Path, on the remote host, of a file holding the request body
   */
  dataFile?: string;
}

/**
 * Form encoding of a query component, spaces as '+'
 */
export function quotePlus(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, "+");
}

/**
 * Single-quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function buildCurlCommand(method: string, uri: string, options: CurlOptions = {}): string {
  // http 1.0 keeps chunked transfer encoding out of the raw response
  const parts = ["curl", "-is", "--http1.0"];

  if (options.verify === false) {
    parts.push("-k");
  }

  if (options.documentInfoOnly) {
    parts.push("-I");
  }

  if (options.auth) {
    if (options.auth.length !== 2) {
      throw new RestClientError("Invalid auth parameter. Pair with 2 elements (user, password) is expected.");
    }
    parts.push("-u", `${options.auth[0]}:${options.auth[1]}`);
  }

  parts.push("-X", method.toUpperCase());

  for (const [name, value] of Object.entries(options.headers ?? {})) {
    parts.push("-H", `"${name}:${value}"`);
  }

  const query = Object.entries(options.params ?? {})
    .map(([key, value]) => `${quotePlus(key)}=${quotePlus(value)}`)
    .join("&");
  parts.push(query ? `"${uri}?${query}"` : `"${uri}"`);

  if (options.dataFile !== undefined) {
    parts.push("-d", `@${options.dataFile}`);
  } else if (options.data) {
    parts.push("-d", shellQuote(options.data));
  }

  return parts.join(" ");
}
