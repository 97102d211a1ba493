/** Executable name. */
export const APP_NAME = "simpletv-sync";

/** Version reported by `--version`. */
export const APP_VERSION = "1.0.0";

/** Settings file looked up in the working directory. */
export const SETTINGS_FILE_NAME = "simpletv-sync.yml";

/** Manifest file name, relative to the installation root. */
export const DEFAULT_MANIFEST_NAME = "simpletv-sync.ini";

/** Environment variable naming the installation root. */
export const ROOT_ENV_VAR = "SIMPLETV_ROOT";
