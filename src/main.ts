#!/usr/bin/env node
import { parseArgs } from "node:util";

import { loadSettings, mergeSettings, type GameSettings } from "./app/settings";
import { FileScoreStore, MemoryScoreStore } from "./highscores/store";
import { runGame } from "./runtime/game";
import { SHOW_CURSOR } from "./ui/render";

const USAGE = `Usage: termtris [options]

  --name <name>      player name for the high-score table
  --seed <seed>      seed for the piece order
  --scores <path>    high-score file
  --settings <path>  settings file (JSON)
  --no-save          do not write high scores
  --no-color         plain text output
  --no-ghost         hide the landing preview
  -h, --help         show this help

Keys: arrows / hjkl / wasd move, up rotates, space drops, p pauses, q quits.`;

function parseCli(argv: ReadonlyArray<string>): {
  overrides: Partial<GameSettings>;
  settingsPath: string | undefined;
  save: boolean;
  ghost: boolean;
  help: boolean;
} {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      help: { short: "h", type: "boolean" },
      name: { type: "string" },
      "no-color": { type: "boolean" },
      "no-ghost": { type: "boolean" },
      "no-save": { type: "boolean" },
      scores: { type: "string" },
      seed: { type: "string" },
      settings: { type: "string" },
    },
    strict: true,
  });

  const overrides: { -readonly [K in keyof GameSettings]?: GameSettings[K] } = {};
  if (values.name !== undefined) overrides.playerName = values.name;
  if (values.seed !== undefined) overrides.seed = values.seed;
  if (values.scores !== undefined) overrides.highScorePath = values.scores;
  if (values["no-color"] === true) overrides.color = false;

  return {
    ghost: values["no-ghost"] !== true,
    help: values.help === true,
    overrides,
    save: values["no-save"] !== true,
    settingsPath: values.settings,
  };
}

async function main(): Promise<void> {
  const cli = parseCli(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(USAGE + "\n");
    return;
  }

  const settings = mergeSettings(loadSettings(cli.settingsPath), cli.overrides);
  const store = cli.save
    ? new FileScoreStore(settings.highScorePath)
    : new MemoryScoreStore();

  await runGame({
    ghost: cli.ghost,
    input: process.stdin,
    output: process.stdout,
    settings,
    store,
  });
}

main().catch((e: unknown) => {
  process.stdout.write(SHOW_CURSOR);
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
