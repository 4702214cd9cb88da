import type { CatalogSource, GameCatalog } from "../../../gamelist/types";
import type { BindNameOutcome, IdentityStore } from "../../../storage/identity-store";
import type { CommandContext } from "./context";

export class MemoryIdentityStore implements IdentityStore {
  readonly names = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [id, name] of Object.entries(initial)) {
      this.names.set(id, name);
    }
  }

  async get(id: string): Promise<string | null> {
    return this.names.get(id) ?? null;
  }

  async set(id: string, name: string): Promise<BindNameOutcome> {
    const holderId = await this.findIdByName(name);
    if (holderId !== null && holderId !== id) {
      return { status: "taken", holderId };
    }
    this.names.set(id, name);
    return { status: "bound" };
  }

  async delete(id: string): Promise<void> {
    this.names.delete(id);
  }

  async findIdByName(name: string): Promise<string | null> {
    for (const [id, bound] of this.names) {
      if (bound === name) {
        return id;
      }
    }
    return null;
  }
}

export class StaticCatalogSource implements CatalogSource {
  readonly fetchedIds: string[] = [];

  constructor(private readonly catalog: GameCatalog) {}

  async fetch(spreadsheetId: string): Promise<GameCatalog> {
    this.fetchedIds.push(spreadsheetId);
    return this.catalog;
  }
}

export function makeContext(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    spreadsheetId: "sheet-1",
    identities: new MemoryIdentityStore(),
    catalog: new StaticCatalogSource({ games: [], names: new Set() }),
    random: () => 0,
    ...overrides,
  };
}
