#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { HarnessOptions } from "./config";
import { loadOptionsFile } from "./config";
import { formatScriptError } from "./diagnostics";
import { Harness } from "./harness";
import { Logger } from "./logger";
import { USAGE, parseCliArgs } from "./cliArgs";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    return 2;
  }
  const log = new Logger("info", "scriptharness:cli");

  let options: Partial<HarnessOptions> = {};
  if (args.configPath) {
    const loaded = await loadOptionsFile(resolve(args.configPath));
    if (!loaded.ok) {
      log.error(formatScriptError(loaded.error, undefined, { filePath: args.configPath }));
      return 1;
    }
    options = loaded.value;
  }
  if (args.trace) options = { ...options, traceTimers: true };

  const source = await readFile(args.input, "utf8");
  const harness = new Harness(options);
  let failure: unknown;
  try {
    harness.run(source);
    if (args.timers.kind === "advance") harness.advanceTime(args.timers.ms);
    else if (args.timers.kind === "flush") harness.flush();
  } catch (e) {
    failure = e;
  }

  for (const entry of harness.takeConsoleEntries()) {
    if (entry.level === "error" || entry.level === "warn") console.error(entry.line);
    else console.log(entry.line);
  }
  for (const message of harness.takeAlertMessages()) console.log(`[alert] ${message}`);
  if (args.trace) for (const line of harness.takeTraceLogs()) console.error(line);

  if (failure !== undefined) {
    console.error(formatScriptError(failure, source, { filePath: args.input }));
    return 1;
  }
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error(e);
      process.exit(1);
    }
  );
}
