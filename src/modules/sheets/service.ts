import { google } from "googleapis";
import { formatTimestamp } from "../../utils/time";
import { createLogger } from "../../utils/logger";
import type { FoodLog, FoodRecord } from "../sync/types";

const log = createLogger("sheets");

export const SHEETS_SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive",
];

export const HEADER_ROW = ["Date", "Food Name", "Recipe", "Photo URL"] as const;

export type SheetEntry = {
  date: string;
  foodName: string;
  recipe: string;
  photoUrl: string;
};

export function toSheetRow(record: FoodRecord): string[] {
  return [formatTimestamp(record.capturedAt), record.foodName, record.recipe ?? "", record.photoUrl ?? ""];
}

export function hasExpectedHeader(row: readonly string[] | undefined): boolean {
  if (!row || row.length !== HEADER_ROW.length) return false;
  return HEADER_ROW.every((cell, i) => row[i] === cell);
}

/**
 * Last `limit` data rows (header skipped). The API trims trailing blank
 * cells, so rows are padded back to four; rows without a date or name are dropped.
 */
export function parseEntries(rows: string[][], limit: number): SheetEntry[] {
  const data = rows
    .slice(1)
    .map((row) => Array.from({ length: HEADER_ROW.length }, (_, i) => row[i] ?? ""))
    .filter(([date, foodName]) => date !== "" && foodName !== "");
  return data
    .slice(Math.max(0, data.length - limit))
    .map(([date, foodName, recipe, photoUrl]) => ({ date, foodName, recipe, photoUrl }));
}

export async function readRecentEntries(foodLog: FoodLog, limit = 10): Promise<SheetEntry[]> {
  return parseEntries(await foodLog.readAllRows(), limit);
}

const quoteTitle = (title: string) => `'${title.replace(/'/g, "''")}'`;

const toCells = (values: unknown[][] | null | undefined): string[][] =>
  (values ?? []).map((row) => row.map((cell) => (cell == null ? "" : String(cell))));

/** Rows live on the first worksheet of the spreadsheet. */
export function createSheetsFoodLog(keyFile: string, spreadsheetId: string): FoodLog {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: SHEETS_SCOPES });
  const sheets = google.sheets({ version: "v4", auth });

  let firstSheet: Promise<{ title: string; sheetId: number }> | null = null;

  const resolveFirstSheet = () => {
    if (firstSheet) return firstSheet;
    firstSheet = sheets.spreadsheets
      .get({ spreadsheetId, fields: "sheets.properties(sheetId,title)" })
      .then((res) => {
        const props = res.data.sheets?.[0]?.properties;
        if (!props?.title) throw new Error(`SHEET_NOT_FOUND: spreadsheet ${spreadsheetId} has no worksheets`);
        return { title: props.title, sheetId: props.sheetId ?? 0 };
      })
      .catch((err: unknown) => {
        firstSheet = null;
        throw err;
      });
    return firstSheet;
  };

  const append = async (rows: string[][]) => {
    const { title } = await resolveFirstSheet();
    await sheets.spreadsheets.values.append({
      spreadsheetId,
      range: `${quoteTitle(title)}!A:D`,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: rows },
    });
  };

  return {
    async ensureHeaderRow() {
      const { title, sheetId } = await resolveFirstSheet();
      const range = `${quoteTitle(title)}!A1:D1`;
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
      if (hasExpectedHeader(toCells(res.data.values)[0])) return;

      log.info("Setting up sheet headers");
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: "RAW",
        requestBody: { values: [[...HEADER_ROW]] },
      });
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [
            {
              repeatCell: {
                range: { sheetId, startRowIndex: 0, endRowIndex: 1, startColumnIndex: 0, endColumnIndex: 4 },
                cell: {
                  userEnteredFormat: {
                    textFormat: { bold: true },
                    backgroundColor: { red: 0.9, green: 0.9, blue: 0.9 },
                  },
                },
                fields: "userEnteredFormat(textFormat,backgroundColor)",
              },
            },
          ],
        },
      });
    },

    async appendRow(record) {
      await append([toSheetRow(record)]);
      log.info(`Added food entry: ${record.foodName}`);
    },

    async appendRows(records) {
      if (records.length === 0) return;
      await append(records.map(toSheetRow));
      log.info(`Added ${records.length} food entries`);
    },

    async readAllRows() {
      const { title } = await resolveFirstSheet();
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range: quoteTitle(title) });
      return toCells(res.data.values);
    },
  };
}
