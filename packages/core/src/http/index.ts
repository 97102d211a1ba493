/**
 * HTTP module exports.
 */

export { type HttpOptions, USER_AGENT, fetchJson, fetchBytes } from "./request.js";
