import type { PlayerRange } from "./range";

export interface Game {
  title: string;
  platform?: string;
  /** Largest party that can play at all. */
  maxPlayers?: number;
  /** Party sizes the game is best with; only ever used as a membership test. */
  goodPlayers?: PlayerRange;
  owns: ReadonlyMap<string, boolean>;
}

/** One fetch of the spreadsheet. Discarded once the request that fetched it is answered. */
export interface GameCatalog {
  readonly games: readonly Game[];
  readonly names: ReadonlySet<string>;
}

export interface CatalogSource {
  fetch(spreadsheetId: string): Promise<GameCatalog>;
}
