import { createInterface } from "node:readline/promises";

import { createTerminalDriver, type KeyInput } from "../device/adapter";
import { init } from "../engine/index";
import { type SaveResult, type ScoreStore } from "../highscores/store";
import {
  type HighScoreTable,
  qualifies,
  sanitizeName,
  updateHighScores,
} from "../highscores/table";
import { SessionService, type SessionEndReason } from "../session/machine";
import {
  CLEAR_SCREEN,
  HIDE_CURSOR,
  SHOW_CURSOR,
  renderFrame,
  renderHighScores,
} from "../ui/render";
import { debugLog } from "../utils/debug";

import { runtimeStep } from "./loop";

import type { GameSettings } from "../app/settings";
import type { GameState } from "../engine/types";

export type GameResult = Readonly<{
  score: number;
  linesCleared: number;
  endReason: SessionEndReason;
  table: HighScoreTable;
  /** null when the score did not make the table. */
  saved: SaveResult | null;
}>;

export type RunGameOptions = Readonly<{
  settings: GameSettings;
  input: KeyInput;
  output: NodeJS.WritableStream;
  store: ScoreStore;
  ghost?: boolean;
}>;

function writeFrame(output: NodeJS.WritableStream, lines: ReadonlyArray<string>): void {
  output.write(CLEAR_SCREEN + lines.join("\n") + "\n");
}

/**
 * Drive one session until top-out or quit: sample input once per tick,
 * step the runtime with the elapsed wall time, redraw.
 */
function playSession(opts: RunGameOptions): Promise<{
  engine: GameState;
  endReason: SessionEndReason;
}> {
  const { settings, input, output } = opts;
  const seed = settings.seed !== "" ? settings.seed : String(Date.now());
  debugLog("engine", `starting session with seed ${seed}`);

  let engine = init({
    previewCount: settings.previewCount,
    rngSeed: seed,
    speed: settings.speed,
  }).state;
  const session = new SessionService((name) => {
    debugLog("session", `-> ${name}`);
  });
  const driver = createTerminalDriver({ input });
  const renderOpts = { color: settings.color, ghost: opts.ghost ?? true };

  return new Promise((resolve) => {
    let last = performance.now();
    output.write(HIDE_CURSOR);
    driver.start();
    writeFrame(output, renderFrame(engine, session.state, renderOpts));

    const timer = setInterval(() => {
      const now = performance.now();
      const elapsed = now - last;
      last = now;

      const out = runtimeStep(engine, session, driver.drainAction(), elapsed);
      engine = out.engine;
      for (const e of out.events) {
        if (e.kind !== "Moved") debugLog("engine", e.kind, e);
      }
      writeFrame(output, renderFrame(engine, out.session, renderOpts));

      if (session.isOver) {
        clearInterval(timer);
        driver.stop();
        output.write(SHOW_CURSOR);
        resolve({ endReason: session.endReason ?? "quit", engine });
      }
    }, settings.tickMs);
  });
}

async function askName(
  input: KeyInput,
  output: NodeJS.WritableStream,
): Promise<string> {
  const rl = createInterface({ input, output, terminal: input.isTTY === true });
  try {
    return await rl.question("New high score! Your name: ");
  } finally {
    rl.close();
  }
}

export type HighScoreOutcome = Readonly<{
  table: HighScoreTable;
  /** null when the score did not make the table. */
  saved: SaveResult | null;
  entryName: string | null;
}>;

/**
 * Offer a finished game's score to the table. A failed save is reported on
 * the output; the in-memory table is returned either way.
 */
export async function offerHighScore(opts: {
  score: number;
  settings: GameSettings;
  store: ScoreStore;
  output: NodeJS.WritableStream;
  promptName: () => Promise<string>;
}): Promise<HighScoreOutcome> {
  const { score, settings, store, output } = opts;
  const loaded = await store.load();
  if (score <= 0 || !qualifies(loaded, score, settings.maxHighScores)) {
    return { entryName: null, saved: null, table: loaded };
  }

  const entryName = sanitizeName(
    settings.playerName !== "" ? settings.playerName : await opts.promptName(),
  );
  const table = updateHighScores(
    loaded,
    entryName,
    score,
    settings.maxHighScores,
  );
  const saved = await store.save(table);
  if (!saved.ok) {
    output.write(`Could not save high scores: ${saved.error}\n`);
  }
  return { entryName, saved, table };
}

export function summarize(
  result: Pick<GameResult, "endReason" | "score" | "linesCleared" | "table">,
  entryName: string | null,
): ReadonlyArray<string> {
  return [
    result.endReason === "topOut" ? "Game over." : "Quit.",
    `Score ${String(result.score)}, lines ${String(result.linesCleared)}.`,
    "",
    ...renderHighScores(
      result.table,
      entryName === null ? undefined : { name: entryName, score: result.score },
    ),
  ];
}

/**
 * Play one game, then offer the score to the high-score table.
 */
export async function runGame(opts: RunGameOptions): Promise<GameResult> {
  const { engine, endReason } = await playSession(opts);
  const outcome = await offerHighScore({
    output: opts.output,
    promptName: () => askName(opts.input, opts.output),
    score: engine.score,
    settings: opts.settings,
    store: opts.store,
  });

  const result: GameResult = {
    endReason,
    linesCleared: engine.linesCleared,
    saved: outcome.saved,
    score: engine.score,
    table: outcome.table,
  };
  opts.output.write(summarize(result, outcome.entryName).join("\n") + "\n");
  return result;
}
