import { domainError, ok, type Result } from "../utils/result";
import type { Game, GameCatalog } from "./types";

export const NO_COMMON_GAME_MESSAGE =
  "I couldn't find a game that everyone owns. Time to go shopping!";

export const BLANK_TITLE_MESSAGE = "Which game? Give me part of its title.";

export function missingColumnMessage(name: string): string {
  return `I can't find a column for ${name} in the game list spreadsheet.`;
}

/**
 * Games the whole party can play, preferring those rated good for its size.
 *
 * Names are matched against the spreadsheet columns exactly, case included.
 */
export function gamesForNames(
  names: ReadonlySet<string>,
  catalog: GameCatalog,
): Result<Game[]> {
  for (const name of names) {
    if (!catalog.names.has(name)) {
      return domainError(missingColumnMessage(name));
    }
  }

  const partySize = names.size;
  const playable = (game: Game): boolean =>
    [...names].every((name) => game.owns.get(name) === true) &&
    (game.maxPlayers === undefined || partySize <= game.maxPlayers);
  const good = (game: Game): boolean =>
    playable(game) && (game.goodPlayers === undefined || game.goodPlayers.has(partySize));

  const goodGames = catalog.games.filter(good);
  if (goodGames.length > 0) {
    return ok(goodGames);
  }
  const playableGames = catalog.games.filter(playable);
  if (playableGames.length > 0) {
    return ok(playableGames);
  }
  return domainError(NO_COMMON_GAME_MESSAGE);
}

/** Games whose title contains `title`, ignoring case. */
export function matchingGames(title: string, catalog: GameCatalog): Result<Game[]> {
  const needle = title.trim();
  if (!needle) {
    return domainError(BLANK_TITLE_MESSAGE);
  }
  const lowered = needle.toLowerCase();
  const matches = catalog.games.filter((game) => game.title.toLowerCase().includes(lowered));
  if (matches.length === 0) {
    return domainError(`I couldn't find a game with "${needle}" in its title.`);
  }
  return ok(matches);
}
