import { google, type sheets_v4 } from "googleapis";
import { logger } from "../logger";
import { parseCatalog } from "./parse";
import type { CatalogSource, GameCatalog } from "./types";

const READONLY_SCOPE = "https://www.googleapis.com/auth/spreadsheets.readonly";

export interface GoogleSheetsSourceOptions {
  /** Service account key file. */
  credentialsFile: string;
}

export function spreadsheetUrl(spreadsheetId: string): string {
  return `https://docs.google.com/spreadsheets/d/${spreadsheetId}`;
}

function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

/** The API drops trailing empty cells, so rows come back ragged. */
export function toCellGrid(values: readonly (readonly unknown[])[] | null | undefined): string[][] {
  return (values ?? []).map((row) =>
    row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))),
  );
}

export class GoogleSheetsCatalogSource implements CatalogSource {
  private readonly sheets: sheets_v4.Sheets;

  constructor(options: GoogleSheetsSourceOptions) {
    const auth = new google.auth.GoogleAuth({
      keyFile: options.credentialsFile,
      scopes: [READONLY_SCOPE],
    });
    this.sheets = google.sheets({ version: "v4", auth });
  }

  async fetch(spreadsheetId: string): Promise<GameCatalog> {
    const meta = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: "sheets.properties.title",
    });
    const title = meta.data.sheets?.[0]?.properties?.title;
    if (!title) {
      throw new Error("The game list spreadsheet has no worksheets.");
    }

    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range: quoteSheetTitle(title),
      majorDimension: "ROWS",
      valueRenderOption: "FORMATTED_VALUE",
    });
    const grid = toCellGrid(response.data.values);
    logger.debug({ spreadsheetId, worksheet: title, rows: grid.length }, "Fetched game list");
    return parseCatalog(grid);
  }
}
