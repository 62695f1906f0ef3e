export type TimerMode = { kind: "none" } | { kind: "advance"; ms: number } | { kind: "flush" };

export type CliArgs = {
  input: string;
  configPath?: string;
  timers: TimerMode;
  trace: boolean;
};

export const USAGE = "Usage: scriptharness <file.js> [--config <file.json>] [--advance <ms> | --flush] [--trace]";

export function parseCliArgs(argv: readonly string[]): CliArgs | undefined {
  let input: string | undefined;
  let configPath: string | undefined;
  let timers: TimerMode = { kind: "none" };
  let trace = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") {
      configPath = argv[++i];
      if (!configPath) return undefined;
    } else if (arg === "--advance") {
      const ms = Number(argv[++i]);
      if (!Number.isFinite(ms) || ms < 0 || timers.kind !== "none") return undefined;
      timers = { kind: "advance", ms };
    } else if (arg === "--flush") {
      if (timers.kind !== "none") return undefined;
      timers = { kind: "flush" };
    } else if (arg === "--trace") {
      trace = true;
    } else if (arg.startsWith("--") || input !== undefined) {
      return undefined;
    } else {
      input = arg;
    }
  }
  if (input === undefined) return undefined;
  return configPath === undefined ? { input, timers, trace } : { input, configPath, timers, trace };
}
