import pc from "picocolors";
import { GoogleSheetsCatalogSource, spreadsheetUrl } from "../../gamelist/sheets";
import type { CatalogSource, GameCatalog } from "../../gamelist/types";
import { toError } from "../../utils/result";
import { requireConfig } from "./config";

export interface DoctorReport {
  url: string;
  catalog?: GameCatalog;
  error?: string;
}

export async function checkCatalog(source: CatalogSource, spreadsheetId: string): Promise<DoctorReport> {
  const url = spreadsheetUrl(spreadsheetId);
  try {
    return { url, catalog: await source.fetch(spreadsheetId) };
  } catch (error) {
    return { url, error: toError(error).message };
  }
}

export async function runDoctor(options: { config?: string }): Promise<void> {
  const config = requireConfig(options.config);
  const source = new GoogleSheetsCatalogSource({ credentialsFile: config.sheet.credentialsFile });
  const report = await checkCatalog(source, config.sheet.spreadsheetId);

  console.log(pc.dim(`  Spreadsheet: ${report.url}`));
  if (!report.catalog) {
    console.error(pc.red(`❌ Could not read the game list: ${report.error ?? "unknown error"}`));
    process.exit(1);
  }

  const players = [...report.catalog.names].sort();
  console.log(`  Players (${players.length}): ${players.join(", ") || pc.dim("none")}`);
  console.log(`  Games: ${report.catalog.games.length}`);
  console.log(pc.green("✅ Game list is readable."));
}
