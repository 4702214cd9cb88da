import { BLANK_TITLE_MESSAGE, gamesForNames, matchingGames } from "../../../../gamelist/matching";
import { spreadsheetUrl } from "../../../../gamelist/sheets";
import type { Game } from "../../../../gamelist/types";
import { domainError, ok, type Result } from "../../../../utils/result";
import type { CommandContext, CommandHandler } from "../context";
import { extractMentionIds, joinWithConjunction, mention } from "../format";
import { resolveName } from "./identity";

type PartyGames = { games: Game[]; mentionIds: string[] };

/** The sender plus everyone mentioned in `args`, matched against a fresh catalog. */
async function gamesForParty(
  context: CommandContext,
  senderId: string,
  args: string,
): Promise<Result<PartyGames>> {
  const mentionIds = extractMentionIds(args);
  const names = new Set<string>();
  for (const userId of [senderId, ...mentionIds]) {
    const name = await resolveName(context, userId);
    if (!name.ok) {
      return name;
    }
    names.add(name.value);
  }

  const catalog = await context.catalog.fetch(context.spreadsheetId);
  const games = gamesForNames(names, catalog);
  if (!games.ok) {
    return games;
  }
  return ok({ games: games.value, mentionIds });
}

async function gamesByTitle(context: CommandContext, title: string): Promise<Result<Game[]>> {
  if (!title.trim()) {
    return domainError(BLANK_TITLE_MESSAGE);
  }
  const catalog = await context.catalog.fetch(context.spreadsheetId);
  return matchingGames(title, catalog);
}

export const sheet: CommandHandler = async (context) =>
  ok({ body: spreadsheetUrl(context.spreadsheetId) });

export const games: CommandHandler = async (context, senderId, args) => {
  const party = await gamesForParty(context, senderId, args);
  if (!party.ok) {
    return party;
  }
  const titles = party.value.games.map((game) => game.title);
  return ok({
    body: `Perhaps ${joinWithConjunction(titles, "or")}?`,
    mentionIds: party.value.mentionIds,
  });
};

export const game: CommandHandler = async (context, senderId, args) => {
  const party = await gamesForParty(context, senderId, args);
  if (!party.ok) {
    return party;
  }
  const candidates = party.value.games;
  const index = Math.min(Math.floor(context.random() * candidates.length), candidates.length - 1);
  return ok({
    body: `How about ${candidates[index].title}?`,
    mentionIds: party.value.mentionIds,
  });
};

function describeGame(game: Game): string {
  const facts: string[] = [];
  if (game.platform) {
    facts.push(`platform ${game.platform}`);
  }
  if (game.maxPlayers !== undefined) {
    facts.push(`max players ${game.maxPlayers}`);
  }
  if (game.goodPlayers) {
    facts.push(`good players ${game.goodPlayers.toString()}`);
  }
  if (facts.length === 0) {
    return `${game.title}: nobody has filled in the details yet.`;
  }
  return `${game.title}: ${facts.join("; ")}`;
}

export const deets: CommandHandler = async (context, _senderId, args) => {
  const matches = await gamesByTitle(context, args);
  if (!matches.ok) {
    return matches;
  }
  return ok({ body: matches.value.map(describeGame).join("\n") });
};

export const whohas: CommandHandler = async (context, _senderId, args) => {
  const matches = await gamesByTitle(context, args);
  if (!matches.ok) {
    return matches;
  }

  const lines: string[] = [];
  for (const match of matches.value) {
    const owners: string[] = [];
    for (const [name, owned] of match.owns) {
      if (!owned) {
        continue;
      }
      const ownerId = await context.identities.findIdByName(name);
      owners.push(ownerId === null ? name : mention(ownerId));
    }
    lines.push(
      owners.length > 0
        ? `Who owns ${match.title}? ${joinWithConjunction(owners, "and")}.`
        : `Nobody owns ${match.title}.`,
    );
  }
  return ok({ body: lines.join("\n") });
};
