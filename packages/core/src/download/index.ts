/**
 * Download module exports.
 */

export { type DownloadOptions, fetchToFile, download } from "./fetcher.js";
