export interface SimulatorConfig {
  /** Explicit opt-in; the adapter refuses to exist without it */
  enabled: boolean;
  /** Blocks generated after each `sendAndExecute` broadcast (default: 1) */
  blocksPerSend?: number | undefined;
}

export interface ExecuteOptions {
  /** Blocks to generate after the broadcast (default: `blocksPerSend`) */
  blocks?: number | undefined;
  signal?: AbortSignal | undefined;
}
