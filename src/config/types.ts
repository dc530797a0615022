export const CONFIG_ENV_VAR = "KEK_CONFIG";
export const DEFAULT_CONFIG_FILE = "kek.toml";

/** Validated configuration file contents; absent keys stay absent. */
export interface ConfigFile {
  readonly scan?: readonly string[];
  readonly category?: {
    readonly docs?: readonly string[];
    readonly src?: readonly string[];
  };
}

export interface KekConfig {
  /** Scan roots, relative to the working directory unless absolute. */
  readonly scan: readonly string[];
  readonly category: {
    readonly docs: readonly string[];
    readonly src: readonly string[];
  };
  /** File the settings came from; `null` when built-in defaults apply. */
  readonly source: string | null;
}

export interface LoadConfigOptions {
  readonly workingDir?: string;
  readonly env?: NodeJS.ProcessEnv;
}
