/**
 * Manifest module exports.
 */

export { COMMENT_MARKER, parseManifestText, readManifest, isCommentEntry, activeEntries } from "./reader.js";
