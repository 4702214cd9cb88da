import { beforeEach, describe, expect, it, vi } from "vitest";
import { GoogleSheetsCatalogSource, spreadsheetUrl, toCellGrid } from "./sheets";

const mockState = vi.hoisted(() => {
  const spreadsheetsGet = vi.fn();
  const valuesGet = vi.fn();
  const authOptions: unknown[] = [];

  class MockGoogleAuth {
    constructor(options: unknown) {
      authOptions.push(options);
    }
  }

  return { spreadsheetsGet, valuesGet, authOptions, MockGoogleAuth };
});

vi.mock("googleapis", () => ({
  google: {
    auth: { GoogleAuth: mockState.MockGoogleAuth },
    sheets: vi.fn(() => ({
      spreadsheets: {
        get: mockState.spreadsheetsGet,
        values: { get: mockState.valuesGet },
      },
    })),
  },
}));

describe("GoogleSheetsCatalogSource", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockState.authOptions.length = 0;
  });

  it("reads the first worksheet and parses it", async () => {
    mockState.spreadsheetsGet.mockResolvedValue({
      data: { sheets: [{ properties: { title: "Bob's games" } }, { properties: { title: "Old" } }] },
    });
    mockState.valuesGet.mockResolvedValue({
      data: {
        values: [
          ["Title", "Platform", "Max players", "Good players", "Who owns", ""],
          [],
          ["", "", "", "", "Alice", "Bob"],
          ["Portal 2", "PC", 2, "2", "x", "x"],
          ["Tetris"],
        ],
      },
    });

    const source = new GoogleSheetsCatalogSource({ credentialsFile: "/tmp/creds.json" });
    const catalog = await source.fetch("sheet-1");

    expect(mockState.authOptions).toEqual([
      {
        keyFile: "/tmp/creds.json",
        scopes: ["https://www.googleapis.com/auth/spreadsheets.readonly"],
      },
    ]);
    expect(mockState.valuesGet).toHaveBeenCalledWith(
      expect.objectContaining({ spreadsheetId: "sheet-1", range: "'Bob''s games'" }),
    );
    expect([...catalog.names]).toEqual(["Alice", "Bob"]);
    expect(catalog.games.map((game) => game.title)).toEqual(["Portal 2", "Tetris"]);
    expect(catalog.games[0].maxPlayers).toBe(2);
    expect(catalog.games[1].owns.get("Alice")).toBe(false);
  });

  it("fails when the spreadsheet has no worksheet", async () => {
    mockState.spreadsheetsGet.mockResolvedValue({ data: { sheets: [] } });
    const source = new GoogleSheetsCatalogSource({ credentialsFile: "/tmp/creds.json" });
    await expect(source.fetch("sheet-1")).rejects.toThrow(
      "The game list spreadsheet has no worksheets.",
    );
    expect(mockState.valuesGet).not.toHaveBeenCalled();
  });
});

describe("sheet helpers", () => {
  it("builds the spreadsheet URL", () => {
    expect(spreadsheetUrl("abc123")).toBe("https://docs.google.com/spreadsheets/d/abc123");
  });

  it("stringifies cells and tolerates missing values", () => {
    expect(toCellGrid(undefined)).toEqual([]);
    expect(toCellGrid([[1, null, "x"], []])).toEqual([["1", "", "x"], []]);
  });
});
