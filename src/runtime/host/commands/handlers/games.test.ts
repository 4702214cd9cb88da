import { describe, expect, it } from "vitest";
import { makeCatalog } from "../../../../gamelist/test-fixtures";
import { MemoryIdentityStore, StaticCatalogSource, makeContext } from "../test-harness";
import { deets, game, games, sheet, whohas } from "./games";

const catalog = makeCatalog(
  ["Alice", "Bob", "Carol"],
  [
    {
      title: "G1",
      platform: "PC",
      owns: { Alice: true, Bob: true, Carol: false },
      maxPlayers: 2,
      goodPlayers: [2],
    },
    { title: "Go", owns: { Alice: true, Bob: true, Carol: true } },
    { title: "Gloomhaven", owns: { Alice: false, Bob: false, Carol: false } },
    { title: "Spyfall", owns: { Alice: true, Bob: true, Carol: true }, maxPlayers: 8 },
  ],
);

function setup(random = () => 0) {
  const source = new StaticCatalogSource(catalog);
  const context = makeContext({
    identities: new MemoryIdentityStore({ "111": "Alice", "222": "Bob", "333": "Carol" }),
    catalog: source,
    random,
  });
  return { context, source };
}

describe("games", () => {
  it("recommends the good games for the party", async () => {
    const { context, source } = setup();
    expect(await games(context, "111", "<@222>")).toEqual({
      ok: true,
      value: { body: "Perhaps G1, Go, or Spyfall?", mentionIds: ["222"] },
    });
    expect(source.fetchedIds).toEqual(["sheet-1"]);
  });

  it("leaves out games not rated for the party size", async () => {
    const { context } = setup();
    const result = await games(context, "111", "");
    expect(result.ok && result.value.body).toBe("Perhaps Go or Spyfall?");
  });

  it("counts a player mentioned twice once", async () => {
    const { context } = setup();
    const result = await games(context, "111", "<@333> <@!333> <@111>");
    expect(result).toEqual({
      ok: true,
      value: { body: "Perhaps Go or Spyfall?", mentionIds: ["333", "333", "111"] },
    });
  });

  it("stops at the first unknown player without fetching the sheet", async () => {
    const { context, source } = setup();
    const result = await games(context, "111", "<@444> <@555>");
    expect(result).toEqual({
      ok: false,
      failure: {
        kind: "domain",
        message: "I don't know what name <@444> goes by in the game list spreadsheet.",
      },
    });
    expect(source.fetchedIds).toEqual([]);
  });
});

describe("game", () => {
  it("picks one qualifying game at random", async () => {
    expect(await game(setup(() => 0.5).context, "111", "<@222>")).toEqual({
      ok: true,
      value: { body: "How about Go?", mentionIds: ["222"] },
    });
    const last = await game(setup(() => 0.9999).context, "111", "<@222>");
    expect(last.ok && last.value.body).toBe("How about Spyfall?");
  });

  it("passes matching failures through", async () => {
    const { context } = setup();
    const result = await game(context, "111", "<@222> <@333>");
    expect(result.ok).toBe(true);
    const none = await game(
      makeContext({
        identities: new MemoryIdentityStore({ "111": "Alice" }),
        catalog: new StaticCatalogSource(makeCatalog(["Alice"], [{ title: "X", owns: {} }])),
      }),
      "111",
      "",
    );
    expect(none).toEqual({
      ok: false,
      failure: {
        kind: "domain",
        message: "I couldn't find a game that everyone owns. Time to go shopping!",
      },
    });
  });
});

describe("deets", () => {
  it("lists the known facts of every match", async () => {
    const { context } = setup();
    expect(await deets(context, "111", "g")).toEqual({
      ok: true,
      value: {
        body: [
          "G1: platform PC; max players 2; good players 2",
          "Go: nobody has filled in the details yet.",
          "Gloomhaven: nobody has filled in the details yet.",
        ].join("\n"),
      },
    });
  });

  it("rejects a blank title before fetching", async () => {
    const { context, source } = setup();
    const result = await deets(context, "111", "");
    expect(result).toEqual({
      ok: false,
      failure: { kind: "domain", message: "Which game? Give me part of its title." },
    });
    expect(source.fetchedIds).toEqual([]);
  });

  it("reports an unknown title", async () => {
    const { context } = setup();
    const result = await deets(context, "111", "zz");
    expect(result.ok === false && result.failure.message).toBe(
      'I couldn\'t find a game with "zz" in its title.',
    );
  });
});

describe("whohas", () => {
  it("mentions bound owners and names the rest", async () => {
    const context = makeContext({
      identities: new MemoryIdentityStore({ "111": "Alice" }),
      catalog: new StaticCatalogSource(catalog),
    });
    expect(await whohas(context, "111", "G1")).toEqual({
      ok: true,
      value: { body: "Who owns G1? <@111> and Bob." },
    });
  });

  it("writes a line per match, including unowned games", async () => {
    const { context } = setup();
    const result = await whohas(context, "111", "o");
    expect(result.ok && result.value.body).toBe(
      ["Who owns Go? <@111>, <@222>, and <@333>.", "Nobody owns Gloomhaven."].join("\n"),
    );
  });
});

describe("sheet", () => {
  it("links the spreadsheet", async () => {
    expect(await sheet(makeContext({ spreadsheetId: "abc" }), "111", "")).toEqual({
      ok: true,
      value: { body: "https://docs.google.com/spreadsheets/d/abc" },
    });
  });
});
