/**
 * Sync module exports.
 */

export { type SyncState, type SyncServices, SyncOrchestrator, syncScripts } from "./orchestrator.js";
