#!/usr/bin/env node

import fs from "fs";
import { createInterface } from "readline/promises";
import { config as loadEnv } from "dotenv";
import { describeConfig, loadConfig } from "./config";
import { createIdeasService, IdeasService } from "./services/ideasService";
import { JsonValue } from "./types";

const HELP_TEXT = `Campaign ideas CLI

Usage:
  campaign-ideas --industry <name> --date <YYYY-MM-DD> [--country <code>]

Options:
  -i, --industry  Industry, e.g. Bakery (asked for when missing)
  -d, --date      Date, YYYY-MM-DD or YYYY (asked for when missing)
  -c, --country   Country code for the holiday lookup (default: DEFAULT_COUNTRY)
  -o, --output    File the last response is written to (default: LAST_RESPONSE_FILE)
  -h, --help      Show this help
`;

const TRACE_LIMIT = 2000;

export type CliArgs = {
  industry?: string;
  date?: string;
  country?: string;
  output?: string;
  help: boolean;
};

const VALUE_FLAGS: Record<string, Exclude<keyof CliArgs, "help">> = {
  "-i": "industry",
  "--industry": "industry",
  "-d": "date",
  "--date": "date",
  "-c": "country",
  "--country": "country",
  "-o": "output",
  "--output": "output"
};

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { help: false };
  const args = [...argv];
  while (args.length > 0) {
    const current = args.shift();
    if (!current) continue;
    if (current === "-h" || current === "--help") {
      parsed.help = true;
      continue;
    }
    const key = VALUE_FLAGS[current];
    if (!key) {
      throw new Error(`Unknown argument: ${current}`);
    }
    const next = args.shift();
    if (next === undefined || next.startsWith("-")) {
      throw new Error(`${current} requires a value`);
    }
    parsed[key] = next;
  }
  return parsed;
}

export function formatIdeas(ideas: JsonValue): string {
  return JSON.stringify(ideas, null, 2);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function stackOf(err: unknown): string {
  return err instanceof Error && err.stack ? err.stack : messageOf(err);
}

export function formatFailureReport(err: unknown): string {
  return `ERROR:\n${messageOf(err)}\n\nTRACEBACK:\n${stackOf(err)}\n`;
}

export interface CliDependencies {
  ideas: Pick<IdeasService, "generate">;
  defaultCountry: string;
  outputFile: string;
  ask: (question: string) => Promise<string>;
  writeFile?: (file: string, contents: string) => void;
  stdout?: Pick<Console, "log">;
}

export async function runCli(args: CliArgs, deps: CliDependencies): Promise<number> {
  const out = deps.stdout ?? console;
  const writeFile = deps.writeFile ?? ((file: string, contents: string) => fs.writeFileSync(file, contents, "utf8"));
  const outputFile = args.output ?? deps.outputFile;

  const industry = (args.industry ?? (await deps.ask("Industry: "))).trim();
  const date = (args.date ?? (await deps.ask("Date (YYYY-MM-DD or YYYY): "))).trim();
  if (!industry || !date) {
    out.log("Industry and date are required.");
    return 1;
  }
  const country = (args.country ?? deps.defaultCountry).toUpperCase();

  try {
    const ideas = await deps.ideas.generate({ industry, date, country });
    const text = formatIdeas(ideas);
    out.log(text);
    writeFile(outputFile, text);
    return 0;
  } catch (err) {
    out.log("An error occurred:", messageOf(err));
    out.log(stackOf(err).slice(0, TRACE_LIMIT));
    writeFile(outputFile, formatFailureReport(err));
    return 1;
  }
}

async function main(): Promise<void> {
  loadEnv();
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config = loadConfig();
  const ideas = createIdeasService(config);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log(describeConfig(config));
    process.exitCode = await runCli(args, {
      ideas,
      defaultCountry: config.defaultCountry,
      outputFile: config.lastResponseFile,
      ask: (question) => rl.question(question)
    });
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(messageOf(error));
    process.exit(1);
  });
}
