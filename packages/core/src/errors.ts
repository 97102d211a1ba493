/**
 * @title Errors
 * @description Error types for @simpletv-sync/core.
 *
 * Per-entry failures (network, archive, unrecognised names) are converted into
 * a failed outcome by the orchestrator; manifest failures end the run.
 *
 * @module errors
 */

/**
 * Options for constructing a SyncError.
 */
export interface SyncErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all synchronisation errors.
 */
export class SyncError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: SyncErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "SyncError";
		this.code = code;
		this.suggestion = options?.suggestion;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * The manifest file does not exist.
 */
export class ManifestMissingError extends SyncError {
	/** Path that was looked up. */
	readonly manifestPath: string;

	constructor(manifestPath: string) {
		super(`Manifest not found: ${manifestPath}`, "MANIFEST_MISSING", {
			suggestion: "Create the manifest first, for example with the init command",
		});
		this.name = "ManifestMissingError";
		this.manifestPath = manifestPath;
	}
}

/**
 * The manifest exists but could not be read or decoded.
 */
export class ManifestReadError extends SyncError {
	/** Path to the manifest file. */
	readonly manifestPath: string;

	constructor(message: string, options: { manifestPath: string; cause?: unknown }) {
		super(message, "MANIFEST_READ_ERROR", {
			suggestion: `Check the manifest file at: ${options.manifestPath}`,
			cause: options.cause,
		});
		this.name = "ManifestReadError";
		this.manifestPath = options.manifestPath;
	}
}

/**
 * Error related to network operations (timeout, connection, HTTP status, bad body).
 */
export class NetworkError extends SyncError {
	/** HTTP status code if available. */
	readonly statusCode?: number;

	constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
		super(message, "NETWORK_ERROR", {
			suggestion: "Check your internet connection and try again",
			cause: options?.cause,
		});
		this.name = "NetworkError";
		this.statusCode = options?.statusCode;
	}
}

/**
 * The archive is corrupt, unreadable or could not be fully extracted.
 */
export class ArchiveError extends SyncError {
	/** Path to the archive on disk. */
	readonly archivePath?: string;

	constructor(message: string, options?: { archivePath?: string; cause?: unknown }) {
		super(message, "ARCHIVE_ERROR", {
			suggestion: options?.archivePath ? `The archive was kept for inspection at: ${options.archivePath}` : undefined,
			cause: options?.cause,
		});
		this.name = "ArchiveError";
		this.archivePath = options?.archivePath;
	}
}

/**
 * Error related to unsafe archive contents (path traversal, zip bombs, links).
 */
export class SecurityError extends SyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "SECURITY_ERROR", { cause: options?.cause });
		this.name = "SecurityError";
	}
}

/**
 * No routing rule matches a manifest entry.
 */
export class UnrecognizedEntryError extends SyncError {
	/** The manifest entry. */
	readonly entry: string;

	constructor(entry: string) {
		super(`Unrecognized file type: ${entry}`, "UNRECOGNIZED_ENTRY", {
			suggestion: "Use a .lua script name or the TVSources.zip archive",
		});
		this.name = "UnrecognizedEntryError";
		this.entry = entry;
	}
}

/**
 * A settings file is unreadable or has an invalid shape.
 */
export class SettingsError extends SyncError {
	/** Path to the settings file. */
	readonly settingsPath?: string;

	constructor(message: string, options?: { settingsPath?: string; cause?: unknown }) {
		super(message, "SETTINGS_ERROR", {
			suggestion: options?.settingsPath ? `Check the settings file at: ${options.settingsPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "SettingsError";
		this.settingsPath = options?.settingsPath;
	}
}

/**
 * Check if an error is a SyncError.
 */
export function isSyncError(error: unknown): error is SyncError {
	return error instanceof SyncError;
}

/**
 * Extract a readable message from an unknown thrown value.
 *
 * The message of `cause` is appended when it adds information.
 */
export function getErrorMessage(error: unknown): string {
	if (!(error instanceof Error)) {
		return String(error);
	}

	const cause: unknown = error.cause;
	if (cause instanceof Error && cause.message && !error.message.includes(cause.message)) {
		return `${error.message} (${cause.message})`;
	}

	return error.message;
}

/**
 * Wrap an unknown error as a SyncError.
 */
export function wrapError(error: unknown, context?: string): SyncError {
	if (isSyncError(error)) {
		return error;
	}

	const message = error instanceof Error ? error.message : String(error);
	const contextPrefix = context ? `${context}: ` : "";

	return new SyncError(`${contextPrefix}${message}`, "UNKNOWN_ERROR", { cause: error });
}
