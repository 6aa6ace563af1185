/** Settings as written in pin.config.json; every key is optional. */
export interface PinConfigFile {
  tool?: string;
  repoRoot?: string;
  output?: string;
  exclude?: string[];
  stripPathDependencies?: boolean;
}

export interface PinConfig {
  /** Package manager executable, looked up on PATH unless it contains a path separator. */
  tool: string;
  /** Repository root, relative to the work dir. */
  repoRoot: string;
  /** Requirements file to write, relative to the repository root. */
  output: string;
  /** Exclusion patterns naming local packages. `*` matches any run of characters. */
  exclude: string[];
  /** Also drop direct references to local paths and editable installs. */
  stripPathDependencies: boolean;
}

export type ConfigSource = 'default' | 'file' | 'env' | 'dotenv';

export interface LoadedConfig {
  config: PinConfig;
  /** Where each setting came from, for --verbose output. */
  sources: Record<keyof PinConfig, ConfigSource>;
  /** Config file that was read, if any. */
  configPath: string | null;
}
