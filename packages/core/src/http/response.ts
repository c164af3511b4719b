/**
 * HTTP Response
 * Structured view of the raw output of `curl -i` captured from a remote terminal
 */

import { RestClientError } from "../errors.js";

/**
 * VT100 escape sequences a terminal may inject into the header block
 */
const ANSI_PATTERN = new RegExp(
  "\\x1b(" +
    "(\\[\\??\\d+[hl])|" +
    "([=<>a-kzNM78])|" +
    "([\\(\\)][a-b0-2])|" +
    "(\\[\\d{0,2}[ma-dgkjqi])|" +
    "(\\[\\d+;\\d+[hfy]?)|" +
    "(\\[;?[hf])|" +
    "(#[3-68])|" +
    "([01356]n)|" +
    "(O[mlnp-z]?)|" +
    "(/Z)|" +
    "(\\d+)|" +
    "(\\[\\?\\d;\\d0c)|" +
    "(\\d;\\dR))",
  "gi"
);

const STATUS_LINE = /^HTTP\/(\d+(?:\.\d+)?)\s+(\d{3})(?:\s+(.*))?$/;
const BLANK_LINE = /\r?\n\r?\n/;

const SUCCESS_STATUSES = [200, 201];

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/**
 * Split at the first blank line; the body is empty when there is none
 */
function splitHead(raw: string): [head: string, body: string] {
  const match = BLANK_LINE.exec(raw);
  if (!match) {
    return [raw, ""];
  }
  return [raw.slice(0, match.index), raw.slice(match.index + match[0].length)];
}

export class HTTPResponse {
  public readonly httpVersion: string;
  public readonly statusCode: number;
  public readonly reason: string;
  /**
   * Header values by name as received; a repeated header keeps its last value
   */
  public readonly headers: Readonly<Record<string, string>>;
  /**
   * Full body, trailing whitespace removed
   */
  public readonly text: string;

  constructor(raw: string) {
    const parsed = parseResponse(raw.replace(/\r\r\n/g, "\r\n"));
    this.httpVersion = parsed.httpVersion;
    this.statusCode = parsed.statusCode;
    this.reason = parsed.reason;
    this.headers = parsed.headers;
    this.text = parsed.text;
  }

  /**
   * Case-insensitive header lookup
   */
  public header(name: string): string | undefined {
    const wanted = name.toLowerCase();
    let value: string | undefined;
    for (const [key, headerValue] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) {
        value = headerValue;
      }
    }
    return value;
  }

  /**
   * @throws RestClientError if the status code is not 200 or 201
   */
  public checkForSuccess(): void {
    if (!SUCCESS_STATUSES.includes(this.statusCode)) {
      throw new RestClientError(`http error received: ${this.toString()}`);
    }
  }

  public isValidJSON(): boolean {
    try {
      JSON.parse(this.text);
      return true;
    } catch {
      return false;
    }
  }

  public json(): unknown {
    try {
      return JSON.parse(this.text);
    } catch {
      throw new RestClientError(`http response body is not in a valid json format: ${this.text}`);
    }
  }

  public toString(): string {
    let result = `${this.statusCode} ${this.reason}\n`;
    if (this.isValidJSON()) {
      result += JSON.stringify(sortKeys(JSON.parse(this.text)), null, 4);
    } else {
      result += this.text;
    }
    return result;
  }
}

function parseResponse(raw: string): {
  httpVersion: string;
  statusCode: number;
  reason: string;
  headers: Record<string, string>;
  text: string;
} {
  const [rawHead, body] = splitHead(raw);
  const [statusLine = "", ...headerLines] = stripAnsi(rawHead).trimStart().split(/\r?\n/);

  const status = STATUS_LINE.exec(statusLine.trim());
  if (!status) {
    throw new RestClientError(`Invalid http response, unexpected status line '${statusLine}'`);
  }
  const statusCode = Number.parseInt(status[2], 10);

  // interim responses (100 Continue...) come before the final one
  if (statusCode >= 100 && statusCode < 200 && /^\s*HTTP\//.test(body)) {
    return parseResponse(body.trimStart());
  }

  return {
    httpVersion: status[1],
    statusCode,
    reason: (status[3] ?? "").trim(),
    headers: parseHeaders(headerLines),
    text: body.trimEnd(),
  };
}

function parseHeaders(lines: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const separator = line.indexOf(":");
    if (separator <= 0) {
      continue;
    }
    headers[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return headers;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
