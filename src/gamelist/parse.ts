import { PlayerRange } from "./range";
import type { Game, GameCatalog } from "./types";

const HEADING_ROW = 0;
const DATA_BEGIN_ROW = 3;

type FieldValues = {
  title: string;
  platform: string;
  maxPlayers: number | undefined;
  goodPlayers: PlayerRange | undefined;
};

type ScalarField = {
  [K in keyof FieldValues]: {
    key: K;
    heading: RegExp;
    required: boolean;
    parse: (cell: string) => FieldValues[K];
  };
}[keyof FieldValues];

const SCALAR_FIELDS: readonly ScalarField[] = [
  { key: "title", heading: /title/i, required: true, parse: (cell: string) => cell },
  { key: "platform", heading: /platform/i, required: false, parse: (cell: string) => cell },
  { key: "maxPlayers", heading: /max.+player/i, required: false, parse: parseMaxNumber },
  { key: "goodPlayers", heading: /good.+player/i, required: false, parse: parsePlayerRange },
];

const OWNS_HEADING = /who.+owns/i;
const OWNS_SUB_HEADING_ROW = 2;

type ColumnSpan = { begin: number; end: number };

function integersIn(text: string): number[] {
  return Array.from(text.matchAll(/[0-9]+/g), (match) => Number(match[0]));
}

export function parseMaxNumber(cell: string): number | undefined {
  const numbers = integersIn(cell);
  return numbers.length > 0 ? Math.max(...numbers) : undefined;
}

/** Reads cells such as `2-4`, `3+`, `4, 6 (even)` or `2`. */
export function parsePlayerRange(cell: string): PlayerRange | undefined {
  const multipleOf = cell.toLowerCase().includes("even") ? 2 : 1;

  const plus = /([0-9]+)\+/.exec(cell);
  if (plus) {
    return PlayerRange.atLeast(Number(plus[1]), multipleOf);
  }

  const numbers = integersIn(cell);
  if (numbers.length > 0) {
    return new PlayerRange(Math.min(...numbers), Math.max(...numbers), multipleOf);
  }
  return undefined;
}

function cellAt(row: readonly string[] | undefined, col: number): string {
  return row?.[col] ?? "";
}

function locateColumns(rows: readonly (readonly string[])[]): {
  scalars: Map<ScalarField["key"], number>;
  owns: ColumnSpan;
} {
  const headings = rows[HEADING_ROW] ?? [];
  const subHeadings = rows[OWNS_SUB_HEADING_ROW];
  const scalars = new Map<ScalarField["key"], number>();
  let owns: ColumnSpan | undefined;
  let extendingOwns = false;

  for (let col = 0; col < headings.length; col++) {
    const heading = headings[col];
    if (!heading) {
      if (extendingOwns && owns && cellAt(subHeadings, col)) {
        owns.end = col + 1;
      } else {
        extendingOwns = false;
      }
      continue;
    }

    extendingOwns = false;
    const field = SCALAR_FIELDS.find((candidate) => candidate.heading.test(heading));
    if (field) {
      if (scalars.has(field.key)) {
        throw new Error(
          `I found multiple headings matching "${field.heading.source}" in the game list spreadsheet.`,
        );
      }
      scalars.set(field.key, col);
      continue;
    }

    if (OWNS_HEADING.test(heading)) {
      if (owns) {
        throw new Error(
          `I found multiple headings matching "${OWNS_HEADING.source}" in the game list spreadsheet.`,
        );
      }
      owns = { begin: col, end: col + 1 };
      extendingOwns = true;
    }
  }

  for (const field of SCALAR_FIELDS) {
    if (!scalars.has(field.key)) {
      throw new Error(
        `I couldn't find a heading matching "${field.heading.source}" in the game list spreadsheet.`,
      );
    }
  }
  if (!owns) {
    throw new Error(
      `I couldn't find a heading matching "${OWNS_HEADING.source}" in the game list spreadsheet.`,
    );
  }

  return { scalars, owns };
}

function ownerNames(rows: readonly (readonly string[])[], owns: ColumnSpan): string[] {
  const names: string[] = [];
  const seen = new Set<string>();
  for (let col = owns.begin; col < owns.end; col++) {
    const name = cellAt(rows[OWNS_SUB_HEADING_ROW], col);
    if (seen.has(name)) {
      throw new Error(
        `There are multiple columns in the game list spreadsheet under ` +
          `${cellAt(rows[HEADING_ROW], owns.begin)} with the same sub-heading (${name}).`,
      );
    }
    seen.add(name);
    names.push(name);
  }
  return names;
}

function withSimplifiedGoodPlayers(game: Game): Game {
  if (!game.goodPlayers) {
    return game;
  }
  const goodPlayers = game.goodPlayers.simplified(1, game.maxPlayers ?? Infinity);
  // An empty range means the cell didn't say what we thought it said.
  return { ...game, goodPlayers: goodPlayers.isEmpty() ? undefined : goodPlayers };
}

/**
 * Builds a catalog from the raw cell grid of the game list worksheet.
 *
 * Row 0 holds the headings and the "who owns" block carries one player name per column on row 2.
 * Games start on row 3; rows without a title are skipped. Layout problems throw, since they are
 * spreadsheet mistakes rather than anything a chat user did.
 */
export function parseCatalog(grid: readonly (readonly string[])[]): GameCatalog {
  const rows = grid.map((row) => row.map((cell) => cell.trim()));
  const { scalars, owns } = locateColumns(rows);
  const names = ownerNames(rows, owns);

  const games: Game[] = [];
  for (const row of rows.slice(DATA_BEGIN_ROW)) {
    const values: Partial<FieldValues> = {};
    let skip = false;
    for (const field of SCALAR_FIELDS) {
      const cell = cellAt(row, scalars.get(field.key) ?? -1);
      if (field.required && !cell) {
        skip = true;
        break;
      }
      assignField(values, field, cell);
    }
    if (skip || !values.title) {
      continue;
    }

    const ownership = new Map<string, boolean>();
    names.forEach((name, index) => {
      ownership.set(name, cellAt(row, owns.begin + index) !== "");
    });

    games.push(
      withSimplifiedGoodPlayers({
        title: values.title,
        platform: values.platform || undefined,
        maxPlayers: values.maxPlayers,
        goodPlayers: values.goodPlayers,
        owns: ownership,
      }),
    );
  }

  return { games, names: new Set(names) };
}

function assignField(values: Partial<FieldValues>, field: ScalarField, cell: string): void {
  switch (field.key) {
    case "title":
      values.title = field.parse(cell);
      return;
    case "platform":
      values.platform = field.parse(cell);
      return;
    case "maxPlayers":
      values.maxPlayers = field.parse(cell);
      return;
    case "goodPlayers":
      values.goodPlayers = field.parse(cell);
      return;
  }
}
