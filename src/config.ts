export interface RuntimeConfig {
  showLogo: boolean;
  tickIntervalMs: number;
  refreshIntervalMs: number;
  flashTtlMs: number;
  debugLogPath?: string;
}

export interface CliArgs {
  logo: boolean;
}
