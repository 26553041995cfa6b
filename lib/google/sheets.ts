/**
 * Google Sheets API client for purchase order tracking.
 *
 * One row per registered purchase order, appended below a header row that is
 * created on first use.
 */

import { google, type Auth, type sheets_v4 } from "googleapis";

/**
 * Header row of the tracking sheet. Row values passed to appendRow follow
 * this order.
 */
export const PO_SHEET_COLUMNS = [
  "order_id",
  "customer",
  "pickup_location",
  "delivery_location",
  "delivery_datetime",
  "driver_name",
  "driver_phone",
  "status",
] as const;

/**
 * Create a Google Sheets API client.
 */
export function createSheetsClient(auth: Auth.OAuth2Client): sheets_v4.Sheets {
  return google.sheets({ version: "v4", auth });
}

/**
 * Format sheet name for Google Sheets API range.
 * Sheet names with spaces or special characters must be quoted.
 */
export function formatSheetRange(sheetName: string, range: string = "1:1"): string {
  if (/[\s'"]/.test(sheetName)) {
    return `'${sheetName.replace(/'/g, "''")}'!${range}`;
  }
  return `${sheetName}!${range}`;
}

/**
 * Write the header row if the sheet's first row is empty.
 * Returns true when the header was written.
 */
export async function ensureHeaderRow(
  sheets: sheets_v4.Sheets,
  spreadsheetId: string,
  sheetName: string,
  columns: readonly string[] = PO_SHEET_COLUMNS
): Promise<boolean> {
  const headerResponse = await sheets.spreadsheets.values.get({
    spreadsheetId,
    range: formatSheetRange(sheetName, "1:1"),
  });

  const existing = headerResponse.data.values?.[0] ?? [];
  if (existing.length > 0) {
    return false;
  }

  await sheets.spreadsheets.values.update({
    spreadsheetId,
    range: formatSheetRange(sheetName, "1:1"),
    valueInputOption: "RAW",
    requestBody: {
      values: [[...columns]],
    },
  });

  console.log(`[Sheets] Wrote header row to '${sheetName}': ${columns.join(", ")}`);
  return true;
}

/**
 * Append one row of values to the sheet. Returns the updated range.
 */
export async function appendRow(
  sheets: sheets_v4.Sheets,
  spreadsheetId: string,
  sheetName: string,
  values: string[]
): Promise<string | null> {
  const res = await sheets.spreadsheets.values.append({
    spreadsheetId,
    range: formatSheetRange(sheetName, "A:A"),
    valueInputOption: "RAW",
    insertDataOption: "INSERT_ROWS",
    requestBody: {
      values: [values],
    },
  });

  const updatedRange = res.data.updates?.updatedRange ?? null;
  console.log(`[Sheets] Appended row to '${sheetName}'`, { spreadsheetId, updatedRange });
  return updatedRange;
}
