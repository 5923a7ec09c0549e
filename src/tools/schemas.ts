import { z } from 'zod';

// -----------------------------------------------------------------------------
// INPUT VALIDATION SCHEMAS
// -----------------------------------------------------------------------------

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SpreadsheetDataSchema = z.object({
  rows: z.array(z.array(CellValueSchema)),
});

export const BatchRangesSchema = z.object({
  ranges: z.record(z.array(z.array(CellValueSchema))),
});

const spreadsheetId = z.string().min(1, 'Spreadsheet ID is required');
const sheetName = z.string().min(1, 'Sheet name is required');

export const GetSheetDataSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  range: z.string().optional(),
  include_grid_data: z.boolean().optional().default(false),
});

export const GetSheetFormulasSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  range: z.string().optional(),
});

export const UpdateCellsSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  range: z.string().min(1, 'Range is required'),
  data: SpreadsheetDataSchema,
});

export const BatchUpdateCellsSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  ranges: BatchRangesSchema,
});

export const AddRowsSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  data: SpreadsheetDataSchema,
});

export const AddColumnsSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  count: z.number().int().min(1, 'Count must be at least 1'),
  start_column: z.number().int().min(0).optional(),
});

export const InsertEmptyRowsSchema = z.object({
  spreadsheet_id: spreadsheetId,
  sheet: sheetName,
  count: z.number().int().min(1, 'Count must be at least 1'),
  start_row: z.number().int().min(0).optional(),
});

export const ListSheetsSchema = z.object({
  spreadsheet_id: spreadsheetId,
});

export const CopySheetSchema = z.object({
  src_spreadsheet: spreadsheetId,
  src_sheet: sheetName,
  dst_spreadsheet: spreadsheetId,
  dst_sheet: sheetName,
});

export const RenameSheetSchema = z.object({
  spreadsheet: spreadsheetId,
  sheet: sheetName,
  new_name: z.string().min(1, 'New name is required'),
});

// Entries are checked per item by the handler so one bad query does not
// reject the whole batch.
export const GetMultipleSheetDataSchema = z.object({
  queries: z.array(z.record(z.string())),
});

export const GetMultipleSpreadsheetSummarySchema = z.object({
  spreadsheet_ids: z.array(z.string()),
  rows_to_fetch: z.number().int().min(1).default(5),
});

export const CreateSpreadsheetSchema = z.object({
  title: z.string().min(1, 'Title is required'),
});

export const CreateSheetSchema = z.object({
  spreadsheet_id: spreadsheetId,
  title: z.string().min(1, 'Title is required'),
});

export const ListSpreadsheetsSchema = z.object({});

export const ShareSpreadsheetSchema = z.object({
  spreadsheet_id: spreadsheetId,
  recipients: z.array(z.record(z.string())),
  send_notification: z.boolean().default(true),
});

export const GetAuthStatusSchema = z.object({});
