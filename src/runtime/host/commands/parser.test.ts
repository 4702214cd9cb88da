import { describe, expect, it } from "vitest";
import { parseCommand, stripLeadingMention } from "./parser";

describe("parseCommand", () => {
  it("parses commands with and without the bang", () => {
    expect(parseCommand("!games <@2> <@3>")).toEqual({ name: "games", args: "<@2> <@3>" });
    expect(parseCommand("whoami")).toEqual({ name: "whoami", args: "" });
  });

  it("trims trailing whitespace from arguments only", () => {
    expect(parseCommand("!deets   mario kart  \n")).toEqual({ name: "deets", args: "mario kart" });
    expect(parseCommand("!roll ")).toEqual({ name: "roll", args: "" });
  });

  it("keeps multi-line arguments", () => {
    expect(parseCommand("!iam Alice\nSmith")).toEqual({ name: "iam", args: "Alice\nSmith" });
  });

  it("rejects text that is not shaped like a command", () => {
    expect(parseCommand("!Games")).toBeNull();
    expect(parseCommand("!games?")).toBeNull();
    expect(parseCommand(" !games")).toBeNull();
    expect(parseCommand("<@99> hello")).toBeNull();
    expect(parseCommand("")).toBeNull();
    expect(parseCommand("!roll2")).toBeNull();
  });
});

describe("stripLeadingMention", () => {
  it("removes the bot mention in either form", () => {
    expect(stripLeadingMention("<@99> games", "99")).toBe("games");
    expect(stripLeadingMention("  <@!99>   !help", "99")).toBe("!help");
  });

  it("leaves other text alone", () => {
    expect(stripLeadingMention("games <@99>", "99")).toBe("games <@99>");
    expect(stripLeadingMention("<@12> games", "99")).toBe("<@12> games");
  });
});
