import { PlayerRange } from "./range";
import type { Game, GameCatalog } from "./types";

type GameSpec = Omit<Game, "owns" | "goodPlayers"> & {
  owns: Record<string, boolean>;
  goodPlayers?: number[];
};

/** Builds a catalog for tests; `goodPlayers` lists exact counts and must be contiguous. */
export function makeCatalog(names: string[], games: GameSpec[]): GameCatalog {
  return {
    names: new Set(names),
    games: games.map((spec) => ({
      ...spec,
      goodPlayers: spec.goodPlayers
        ? new PlayerRange(Math.min(...spec.goodPlayers), Math.max(...spec.goodPlayers))
        : undefined,
      owns: new Map(Object.entries(spec.owns)),
    })),
  };
}
