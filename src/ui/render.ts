/**
 * Pure terminal frame rendering.
 *
 * Every function here takes what it draws as parameters and returns lines
 * of text; writing to stdout belongs to the runtime. Each grid cell is two
 * characters wide so the field looks roughly square.
 */

import { PIECES } from "../engine/core/pieces";
import { selectNextPiece, selectRenderCells } from "../engine/selectors";

import type { PieceId, PieceMatrix } from "../engine/core/types";
import type { RenderCell } from "../engine/selectors";
import type { GameState } from "../engine/types";
import type { HighScoreTable } from "../highscores/table";
import type { SessionStateName } from "../session/machine";

export const ANSI_RESET = "\x1b[0m";
export const CLEAR_SCREEN = "\x1b[H\x1b[2J";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";

const ANSI_COLORS: Readonly<Record<string, string>> = {
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  magenta: "\x1b[35m",
  red: "\x1b[31m",
  white: "\x1b[37m",
  yellow: "\x1b[33m",
};
const DIM = "\x1b[2m";

export const GLYPH_EMPTY = " .";
export const GLYPH_BLOCK = "[]";
export const GLYPH_GHOST = "::";

export type RenderOptions = Readonly<{
  color: boolean;
  ghost: boolean;
}>;

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  color: true,
  ghost: true,
};

function paint(text: string, id: PieceId | null, opts: RenderOptions): string {
  if (!opts.color || id === null) return text;
  const code = ANSI_COLORS[PIECES[id].color];
  return code === undefined ? text : `${code}${text}${ANSI_RESET}`;
}

export function renderCell(cell: RenderCell, opts: RenderOptions): string {
  switch (cell.kind) {
    case "empty":
      return opts.color ? `${DIM}${GLYPH_EMPTY}${ANSI_RESET}` : GLYPH_EMPTY;
    case "locked":
    case "active":
      return paint(GLYPH_BLOCK, cell.id, opts);
    case "ghost":
      return opts.color
        ? `${DIM}${GLYPH_GHOST}${ANSI_RESET}`
        : GLYPH_GHOST;
  }
}

// Next-piece box rows, padded to a fixed width of 4 cells
export function renderPreview(
  matrix: PieceMatrix | null,
  id: PieceId | null,
  opts: RenderOptions,
): ReadonlyArray<string> {
  const rows: Array<string> = [];
  for (let r = 0; r < 2; r++) {
    let line = "";
    for (let c = 0; c < 4; c++) {
      const filled = matrix?.[r]?.[c] === 1;
      line += filled ? paint(GLYPH_BLOCK, id, opts) : "  ";
    }
    rows.push(line);
  }
  return rows;
}

function centerIn(text: string, width: number): string {
  const left = Math.max(0, Math.floor((width - text.length) / 2));
  return (" ".repeat(left) + text).padEnd(width, " ");
}

export function bannerFor(
  session: SessionStateName,
  s: GameState,
): string | null {
  if (s.status === "gameOver") return "GAME OVER";
  if (session === "paused") return "PAUSED";
  return null;
}

/**
 * One full frame: bordered field on the left, next piece and counters on
 * the right, with a banner across the middle when paused or over.
 */
export function renderFrame(
  s: GameState,
  session: SessionStateName,
  opts: RenderOptions = DEFAULT_RENDER_OPTIONS,
): ReadonlyArray<string> {
  const cells = selectRenderCells(s, { ghost: opts.ghost });
  const fieldWidth = (cells[0]?.length ?? 0) * 2;
  const next = selectNextPiece(s);
  const preview = renderPreview(
    next === null ? null : PIECES[next].matrix,
    next,
    opts,
  );

  const panel: Array<string> = [
    "NEXT",
    ...preview,
    "",
    `SCORE ${String(s.score)}`,
    `LINES ${String(s.linesCleared)}`,
    `SPEED ${String(s.speed)}ms`,
  ];

  const banner = bannerFor(session, s);
  const bannerRow = Math.floor(cells.length / 2);
  const border = `+${"-".repeat(fieldWidth)}+`;

  const lines: Array<string> = [border];
  cells.forEach((row, y) => {
    const field =
      banner !== null && y === bannerRow
        ? centerIn(banner, fieldWidth)
        : row.map((c) => renderCell(c, opts)).join("");
    const side = panel[y];
    lines.push(side === undefined ? `|${field}|` : `|${field}|  ${side}`);
  });
  lines.push(border);
  return lines;
}

export function renderHighScores(
  table: HighScoreTable,
  highlight?: { name: string; score: number },
): ReadonlyArray<string> {
  if (table.length === 0) return ["HIGH SCORES", "  (none yet)"];
  let marked = false;
  const rows = table.map((e, i) => {
    const isNew =
      !marked &&
      highlight !== undefined &&
      e.name === highlight.name &&
      e.score === highlight.score;
    if (isNew) marked = true;
    const rank = String(i + 1).padStart(2, " ");
    const score = String(e.score).padStart(6, " ");
    return `${rank}. ${e.name.padEnd(16, " ")} ${score}${isNew ? "  <" : ""}`;
  });
  return ["HIGH SCORES", ...rows];
}
