/**
 * HTTP Module Exports
 */

export { RestSSHClient, HTTP_METHODS } from "./rest-client.js";
export type { RestRequestOptions, HttpMethod } from "./rest-client.js";
export { HTTPResponse, stripAnsi } from "./response.js";
export { buildCurlCommand, quotePlus, shellQuote } from "./curl.js";
export type { CurlOptions } from "./curl.js";
