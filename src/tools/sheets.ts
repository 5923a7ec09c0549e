import type { sheets_v4 } from 'googleapis';
import { describeError, log } from '../logging.js';
import { adaptTool } from './registry.js';
import type { RegisteredTool } from './registry.js';
import {
  AddColumnsSchema,
  AddRowsSchema,
  BatchUpdateCellsSchema,
  CopySheetSchema,
  CreateSheetSchema,
  CreateSpreadsheetSchema,
  GetMultipleSheetDataSchema,
  GetMultipleSpreadsheetSummarySchema,
  GetSheetDataSchema,
  GetSheetFormulasSchema,
  InsertEmptyRowsSchema,
  ListSheetsSchema,
  RenameSheetSchema,
  UpdateCellsSchema,
} from './schemas.js';

const USER_ENTERED = 'USER_ENTERED';

const SPREADSHEET_ID_PROPERTY = { type: 'string', description: 'The ID of the spreadsheet (found in the URL)' };
const SHEET_PROPERTY = { type: 'string', description: 'The name of the sheet' };
const ROWS_DATA_PROPERTY = {
  type: 'object',
  description: 'A JSON object containing a "rows" key, which holds a 2D array of values. Example: {"rows": [["Cell A1", "Cell B1"], ["Cell A2", "Cell B2"]]}. Each cell can be a string, number, boolean, or null.',
  properties: {
    rows: {
      type: 'array',
      items: { type: 'array', items: { type: ['string', 'number', 'boolean', 'null'] } },
    },
  },
  required: ['rows'],
};

export function qualifyRange(sheet: string, range?: string): string {
  return range ? `${sheet}!${range}` : sheet;
}

/** Look up the numeric sheet ID for a tab title; null when no tab has it. */
export async function findSheetId(
  sheets: sheets_v4.Sheets,
  spreadsheetId: string,
  title: string
): Promise<number | null> {
  const response = await sheets.spreadsheets.get({
    spreadsheetId,
    fields: 'sheets.properties(sheetId,title)',
  });
  const match = (response.data.sheets ?? []).find((entry) => entry.properties?.title === title);
  const sheetId = match?.properties?.sheetId;
  return sheetId ?? null;
}

function insertDimensionRequest(
  sheetId: number,
  dimension: 'ROWS' | 'COLUMNS',
  count: number,
  start: number | undefined
): sheets_v4.Schema$BatchUpdateSpreadsheetRequest {
  const startIndex = start ?? 0;
  return {
    requests: [{
      insertDimension: {
        range: { sheetId, dimension, startIndex, endIndex: startIndex + count },
        inheritFromBefore: start !== undefined && start > 0,
      },
    }],
  };
}

export const getSheetData = adaptTool({
  name: 'get_sheet_data',
  description: 'Get data from a specific sheet in a Google Spreadsheet. Returns a 2D array of cell values, or the full grid data when include_grid_data is true.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      range: { type: 'string', description: "Optional cell range in A1 notation (e.g., 'A1:C10'). Defaults to the whole sheet." },
      include_grid_data: { type: 'boolean', description: 'Return full grid data (formatting and metadata) instead of plain values. Defaults to false.' },
    },
    required: ['spreadsheet_id', 'sheet'],
  },
  argsSchema: GetSheetDataSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const fullRange = qualifyRange(args.sheet, args.range);
    if (args.include_grid_data) {
      const response = await session.sheets.spreadsheets.get({
        spreadsheetId: args.spreadsheet_id,
        ranges: [fullRange],
        includeGridData: true,
      });
      return { grid_data: response.data };
    }
    const response = await session.sheets.spreadsheets.values.get({
      spreadsheetId: args.spreadsheet_id,
      range: fullRange,
    });
    return { values: response.data.values ?? [] };
  },
});

export const getSheetFormulas = adaptTool({
  name: 'get_sheet_formulas',
  description: 'Get formulas from a specific sheet in a Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      range: { type: 'string', description: 'Optional cell range in A1 notation' },
    },
    required: ['spreadsheet_id', 'sheet'],
  },
  argsSchema: GetSheetFormulasSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const response = await session.sheets.spreadsheets.values.get({
      spreadsheetId: args.spreadsheet_id,
      range: qualifyRange(args.sheet, args.range),
      valueRenderOption: 'FORMULA',
    });
    return { formulas: response.data.values ?? [] };
  },
});

export const updateCells = adaptTool({
  name: 'update_cells',
  description: 'Update cells in a Google Spreadsheet. Values are parsed as if typed by a user, so formulas are evaluated.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      range: { type: 'string', description: "Cell range in A1 notation (e.g., 'A1:C10')" },
      data: ROWS_DATA_PROPERTY,
    },
    required: ['spreadsheet_id', 'sheet', 'range', 'data'],
  },
  argsSchema: UpdateCellsSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const response = await session.sheets.spreadsheets.values.update({
      spreadsheetId: args.spreadsheet_id,
      range: qualifyRange(args.sheet, args.range),
      valueInputOption: USER_ENTERED,
      requestBody: { values: args.data.rows },
    });
    return { ...response.data };
  },
});

export const batchUpdateCells = adaptTool({
  name: 'batch_update_cells',
  description: 'Batch update multiple ranges of one sheet in a Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      ranges: {
        type: 'object',
        description: 'A JSON object containing a "ranges" key, which maps range strings to a 2D array of values. Example: {"ranges": {"A1:B2": [["John", 25], ["Jane", 30]]}}',
        properties: {
          ranges: {
            type: 'object',
            additionalProperties: {
              type: 'array',
              items: { type: 'array', items: { type: ['string', 'number', 'boolean', 'null'] } },
            },
          },
        },
        required: ['ranges'],
      },
    },
    required: ['spreadsheet_id', 'sheet', 'ranges'],
  },
  argsSchema: BatchUpdateCellsSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const data = Object.entries(args.ranges.ranges).map(([range, values]) => ({
      range: qualifyRange(args.sheet, range),
      values,
    }));
    const response = await session.sheets.spreadsheets.values.batchUpdate({
      spreadsheetId: args.spreadsheet_id,
      requestBody: { valueInputOption: USER_ENTERED, data },
    });
    return { ...response.data };
  },
});

export const addRows = adaptTool({
  name: 'add_rows',
  description: 'Append rows to the end of a sheet (after the last row with data).',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      data: ROWS_DATA_PROPERTY,
    },
    required: ['spreadsheet_id', 'sheet', 'data'],
  },
  argsSchema: AddRowsSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const response = await session.sheets.spreadsheets.values.append({
      spreadsheetId: args.spreadsheet_id,
      range: args.sheet,
      valueInputOption: USER_ENTERED,
      requestBody: { values: args.data.rows },
    });
    return { ...response.data };
  },
});

export const addColumns = adaptTool({
  name: 'add_columns',
  description: 'Insert empty columns into a sheet in a Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      count: { type: 'integer', minimum: 1, description: 'Number of columns to insert' },
      start_column: { type: 'integer', minimum: 0, description: '0-based column index to insert at. Defaults to 0.' },
    },
    required: ['spreadsheet_id', 'sheet', 'count'],
  },
  argsSchema: AddColumnsSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const sheetId = await findSheetId(session.sheets, args.spreadsheet_id, args.sheet);
    if (sheetId === null) {
      return { error: `Sheet '${args.sheet}' not found` };
    }
    const response = await session.sheets.spreadsheets.batchUpdate({
      spreadsheetId: args.spreadsheet_id,
      requestBody: insertDimensionRequest(sheetId, 'COLUMNS', args.count, args.start_column),
    });
    return { ...response.data };
  },
});

export const insertEmptyRows = adaptTool({
  name: 'insert_empty_rows',
  description: 'Insert empty rows into a sheet in a Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      sheet: SHEET_PROPERTY,
      count: { type: 'integer', minimum: 1, description: 'Number of rows to insert' },
      start_row: { type: 'integer', minimum: 0, description: '0-based row index to insert at. Defaults to 0.' },
    },
    required: ['spreadsheet_id', 'sheet', 'count'],
  },
  argsSchema: InsertEmptyRowsSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const sheetId = await findSheetId(session.sheets, args.spreadsheet_id, args.sheet);
    if (sheetId === null) {
      return { error: `Sheet '${args.sheet}' not found` };
    }
    const response = await session.sheets.spreadsheets.batchUpdate({
      spreadsheetId: args.spreadsheet_id,
      requestBody: insertDimensionRequest(sheetId, 'ROWS', args.count, args.start_row),
    });
    return { ...response.data };
  },
});

export const listSheets = adaptTool({
  name: 'list_sheets',
  description: 'List all sheet tabs in a Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: { spreadsheet_id: SPREADSHEET_ID_PROPERTY },
    required: ['spreadsheet_id'],
  },
  argsSchema: ListSheetsSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const response = await session.sheets.spreadsheets.get({
      spreadsheetId: args.spreadsheet_id,
      fields: 'sheets.properties.title',
    });
    const titles = (response.data.sheets ?? [])
      .map((entry) => entry.properties?.title)
      .filter((title): title is string => typeof title === 'string');
    return { sheets: titles };
  },
});

export const copySheet = adaptTool({
  name: 'copy_sheet',
  description: 'Copy a sheet from one spreadsheet to another, renaming the copy to the destination sheet name.',
  inputSchema: {
    type: 'object',
    properties: {
      src_spreadsheet: { type: 'string', description: 'ID of the source spreadsheet' },
      src_sheet: { type: 'string', description: 'Name of the sheet to copy' },
      dst_spreadsheet: { type: 'string', description: 'ID of the destination spreadsheet' },
      dst_sheet: { type: 'string', description: 'Name for the copied sheet' },
    },
    required: ['src_spreadsheet', 'src_sheet', 'dst_spreadsheet', 'dst_sheet'],
  },
  argsSchema: CopySheetSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const srcSheetId = await findSheetId(session.sheets, args.src_spreadsheet, args.src_sheet);
    if (srcSheetId === null) {
      return { error: `Source sheet '${args.src_sheet}' not found` };
    }
    const copy = await session.sheets.spreadsheets.sheets.copyTo({
      spreadsheetId: args.src_spreadsheet,
      sheetId: srcSheetId,
      requestBody: { destinationSpreadsheetId: args.dst_spreadsheet },
    });

    const copiedId = copy.data.sheetId;
    if (copy.data.title && copy.data.title !== args.dst_sheet && copiedId !== undefined && copiedId !== null) {
      const rename = await session.sheets.spreadsheets.batchUpdate({
        spreadsheetId: args.dst_spreadsheet,
        requestBody: {
          requests: [{
            updateSheetProperties: {
              properties: { sheetId: copiedId, title: args.dst_sheet },
              fields: 'title',
            },
          }],
        },
      });
      return { copy: copy.data, rename: rename.data };
    }
    return { copy: copy.data };
  },
});

export const renameSheet = adaptTool({
  name: 'rename_sheet',
  description: 'Rename a sheet in a Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet: SPREADSHEET_ID_PROPERTY,
      sheet: { type: 'string', description: 'Current name of the sheet' },
      new_name: { type: 'string', description: 'New name for the sheet' },
    },
    required: ['spreadsheet', 'sheet', 'new_name'],
  },
  argsSchema: RenameSheetSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const sheetId = await findSheetId(session.sheets, args.spreadsheet, args.sheet);
    if (sheetId === null) {
      return { error: `Sheet '${args.sheet}' not found` };
    }
    const response = await session.sheets.spreadsheets.batchUpdate({
      spreadsheetId: args.spreadsheet,
      requestBody: {
        requests: [{
          updateSheetProperties: {
            properties: { sheetId, title: args.new_name },
            fields: 'title',
          },
        }],
      },
    });
    return { ...response.data };
  },
});

export const getMultipleSheetData = adaptTool({
  name: 'get_multiple_sheet_data',
  description: 'Get data from multiple specific ranges in Google Spreadsheets. Each result echoes its query and carries either "data" or "error".',
  inputSchema: {
    type: 'object',
    properties: {
      queries: {
        type: 'array',
        description: "A list of query objects with 'spreadsheet_id', 'sheet', and 'range' keys",
        items: {
          type: 'object',
          properties: {
            spreadsheet_id: { type: 'string' },
            sheet: { type: 'string' },
            range: { type: 'string' },
          },
        },
      },
    },
    required: ['queries'],
  },
  argsSchema: GetMultipleSheetDataSchema,
  returns: 'value',
  async handler(args, { session }) {
    const results: Record<string, unknown>[] = [];
    for (const query of args.queries) {
      const { spreadsheet_id: id, sheet, range } = query;
      if (!id || !sheet || !range) {
        results.push({ ...query, error: 'Missing required keys' });
        continue;
      }
      try {
        const response = await session.sheets.spreadsheets.values.get({
          spreadsheetId: id,
          range: qualifyRange(sheet, range),
        });
        results.push({ ...query, data: response.data.values ?? [] });
      } catch (error) {
        results.push({ ...query, error: describeError(error) });
      }
    }
    return results;
  },
});

interface SheetSummary {
  title: string | null;
  headers: unknown[];
  first_rows: unknown[][];
  error: string | null;
}

interface SpreadsheetSummary {
  spreadsheet_id: string;
  title: string | null;
  sheets: SheetSummary[];
  error: string | null;
}

async function summarizeSheet(
  sheets: sheets_v4.Sheets,
  spreadsheetId: string,
  title: string | null | undefined,
  rowsToFetch: number
): Promise<SheetSummary> {
  const summary: SheetSummary = { title: title ?? null, headers: [], first_rows: [], error: null };
  if (!title) {
    summary.error = 'Sheet title not found';
    return summary;
  }
  try {
    const response = await sheets.spreadsheets.values.get({
      spreadsheetId,
      range: `${title}!A1:${rowsToFetch}`,
    });
    const values: unknown[][] = response.data.values ?? [];
    if (values.length > 0) {
      summary.headers = values[0] ?? [];
      summary.first_rows = values.slice(1, rowsToFetch);
    }
  } catch (error) {
    summary.error = `Error fetching data for sheet ${title}: ${describeError(error)}`;
  }
  return summary;
}

export const getMultipleSpreadsheetSummary = adaptTool({
  name: 'get_multiple_spreadsheet_summary',
  description: 'Get a summary of multiple Google Spreadsheets: title, sheet names, header row and the first few data rows of every sheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_ids: { type: 'array', items: { type: 'string' }, description: 'A list of spreadsheet IDs to summarize' },
      rows_to_fetch: { type: 'integer', minimum: 1, description: 'Number of rows (including the header) to fetch per sheet. Defaults to 5.' },
    },
    required: ['spreadsheet_ids'],
  },
  argsSchema: GetMultipleSpreadsheetSummarySchema,
  returns: 'value',
  async handler(args, { session }) {
    const rowsToFetch = Math.max(1, args.rows_to_fetch);
    const summaries: SpreadsheetSummary[] = [];

    for (const id of args.spreadsheet_ids) {
      const summary: SpreadsheetSummary = { spreadsheet_id: id, title: null, sheets: [], error: null };
      try {
        const response = await session.sheets.spreadsheets.get({
          spreadsheetId: id,
          fields: 'properties.title,sheets(properties(title,sheetId))',
        });
        summary.title = response.data.properties?.title ?? 'Unknown Title';
        for (const entry of response.data.sheets ?? []) {
          summary.sheets.push(await summarizeSheet(session.sheets, id, entry.properties?.title, rowsToFetch));
        }
      } catch (error) {
        summary.error = `Error fetching spreadsheet ${id}: ${describeError(error)}`;
      }
      summaries.push(summary);
    }
    return summaries;
  },
});

export const createSpreadsheet = adaptTool({
  name: 'create_spreadsheet',
  description: "Create a new Google Spreadsheet. When a Drive folder is configured the spreadsheet is moved into it; otherwise it stays in 'My Drive'.",
  inputSchema: {
    type: 'object',
    properties: {
      title: { type: 'string', description: 'Title of the new spreadsheet' },
    },
    required: ['title'],
  },
  argsSchema: CreateSpreadsheetSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const created = await session.sheets.spreadsheets.create({
      requestBody: { properties: { title: args.title } },
      fields: 'spreadsheetId,properties,sheets',
    });
    const spreadsheetId = created.data.spreadsheetId;
    if (!spreadsheetId) {
      throw new Error('Spreadsheet was created without an ID');
    }

    if (session.folderId) {
      try {
        const file = await session.drive.files.get({
          fileId: spreadsheetId,
          fields: 'parents',
          supportsAllDrives: true,
        });
        await session.drive.files.update({
          fileId: spreadsheetId,
          addParents: session.folderId,
          removeParents: (file.data.parents ?? []).join(','),
          fields: 'id, parents',
          supportsAllDrives: true,
        });
      } catch (error) {
        log('Warning: Could not move spreadsheet to folder', {
          spreadsheetId,
          folderId: session.folderId,
          error: describeError(error),
        });
      }
    }

    return {
      spreadsheetId,
      title: created.data.properties?.title ?? args.title,
      folder: session.folderId ?? 'root',
    };
  },
});

export const createSheet = adaptTool({
  name: 'create_sheet',
  description: 'Create a new sheet tab in an existing Google Spreadsheet.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: SPREADSHEET_ID_PROPERTY,
      title: { type: 'string', description: 'Title of the new sheet tab' },
    },
    required: ['spreadsheet_id', 'title'],
  },
  argsSchema: CreateSheetSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const response = await session.sheets.spreadsheets.batchUpdate({
      spreadsheetId: args.spreadsheet_id,
      requestBody: { requests: [{ addSheet: { properties: { title: args.title } } }] },
    });
    const properties = response.data.replies?.[0]?.addSheet?.properties;
    if (!properties) {
      throw new Error('addSheet reply did not include sheet properties');
    }
    return {
      sheetId: properties.sheetId,
      title: properties.title,
      spreadsheetId: args.spreadsheet_id,
    };
  },
});

export const SHEETS_TOOLS: readonly RegisteredTool[] = [
  getSheetData,
  getSheetFormulas,
  updateCells,
  batchUpdateCells,
  addRows,
  addColumns,
  insertEmptyRows,
  listSheets,
  copySheet,
  renameSheet,
  getMultipleSheetData,
  getMultipleSpreadsheetSummary,
  createSpreadsheet,
  createSheet,
];
