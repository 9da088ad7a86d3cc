#!/usr/bin/env node
// songwhisper CLI — find a song from a snippet of lyrics and play it in Chrome

import { formatOutput, errorResult, textOutput } from "./shared.js";
import { readConfig } from "./config.js";
import { setLogLevel, createLogger } from "./logger.js";
import { isSiteName, type SiteName } from "./profiles.js";
import type { ActionResult } from "./types.js";
import * as findCmd from "./commands/find-cmd.js";
import * as configCmd from "./commands/config-cmd.js";

const log = createLogger("cli");

// --- Arg parsing helpers ---

const VALUE_FLAGS = new Set(["--site", "--language"]);

function getPositionals(args: string[]): string[] {
  const result: string[] = [];
  const skip = new Set<number>();
  args.forEach((arg, i) => {
    if (arg.startsWith("--")) {
      if (VALUE_FLAGS.has(arg)) skip.add(i + 1);
    } else if (!skip.has(i)) {
      result.push(arg);
    }
  });
  return result;
}

function extractOption(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function parseSite(args: string[]): SiteName | undefined {
  const raw = extractOption(args, "--site");
  if (raw === undefined) return undefined;
  if (!isSiteName(raw)) throw new Error(`--site must be youtube|bugs, got "${raw}"`);
  return raw;
}

function usage(): never {
  textOutput(`songwhisper — find a song from a snippet of lyrics

COMMANDS:
  find <lyrics...> [--site youtube|bugs]       Search the lyrics and start playback
  listen <file.wav> [--site] [--language]      Transcribe a recording, then find it
  transcribe <file.wav> [--language]           Print the recognized lyrics
  url <lyrics...> [--site]                     Print the search URL without opening Chrome
  profiles                                     List supported sites

  config get <key>                             Show a config value
  config set <key> <value>                     Change a config value
  config list                                  Show all config values
  config reset                                 Restore defaults

FLAGS:
  --json       Machine-readable output
  --verbose    Debug logging on stderr

find and listen keep running until the browser window is closed.`);
  process.exit(0);
}

// --- Command dispatch ---

async function runConfig(sub: string | undefined, pos: string[]): Promise<ActionResult> {
  switch (sub) {
    case "get":
      return configCmd.handleConfigGet({ key: pos[0] });
    case "set":
      return configCmd.handleConfigSet({ key: pos[0], value: pos.slice(1).join(" ") || undefined });
    case "list":
      return configCmd.handleConfigList();
    case "reset":
      return configCmd.handleConfigReset();
    default:
      throw new Error(`Unknown config subcommand: ${sub ?? ""}. Use: get|set|list|reset`);
  }
}

async function run(command: string, args: string[], jsonMode: boolean): Promise<boolean> {
  const config = await readConfig();
  if (!args.includes("--verbose")) setLogLevel(config["log-level"]);

  const pos = getPositionals(args);
  const site = parseSite(args);
  const language = extractOption(args, "--language");

  let outcome: findCmd.FindOutcome;
  switch (command) {
    case "find": {
      const transcript = pos.join(" ");
      outcome = await findCmd.handleFind({ transcript, site }, config);
      break;
    }
    case "listen": {
      const file = pos[0];
      if (!file) throw new Error("WAV file path required");
      outcome = await findCmd.handleListen({ file, site, language }, config);
      break;
    }
    case "transcribe": {
      const file = pos[0];
      if (!file) throw new Error("WAV file path required");
      const result = await findCmd.handleTranscribe({ file, language }, config);
      formatOutput(result, jsonMode);
      return result.ok;
    }
    case "url": {
      const result = findCmd.handleUrl({ transcript: pos.join(" "), site }, config);
      formatOutput(result, jsonMode);
      return result.ok;
    }
    case "profiles":
      formatOutput(findCmd.handleProfiles(), jsonMode);
      return true;
    case "config": {
      const result = await runConfig(pos[0], pos.slice(1));
      formatOutput(result, jsonMode);
      return result.ok;
    }
    default:
      textOutput(`Unknown command: ${command}. Use --help for usage.`);
      return false;
  }

  formatOutput(outcome.result, jsonMode);
  if (outcome.session) {
    log.info("Browser left open. Close the window to exit.");
    await outcome.session.waitForClose();
  }
  return true;
}

// --- Main ---

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (!args.length || args[0] === "--help" || args[0] === "-h") usage();

  const command = args[0] ?? "";
  const rest = args.slice(1);
  const jsonMode = rest.includes("--json");
  if (rest.includes("--verbose")) setLogLevel("debug");

  try {
    const ok = await run(command, rest, jsonMode);
    process.exit(ok ? 0 : 1);
  } catch (error) {
    formatOutput(errorResult(error), jsonMode);
    process.exit(1);
  }
}

void main();
