import { describe, it, expect, beforeEach } from 'vitest';
import {
  addColumns,
  addRows,
  batchUpdateCells,
  copySheet,
  createSheet,
  createSpreadsheet,
  getMultipleSheetData,
  getMultipleSpreadsheetSummary,
  getSheetData,
  getSheetFormulas,
  insertEmptyRows,
  listSheets,
  qualifyRange,
  renameSheet,
  updateCells,
} from '../../src/tools/sheets.js';
import type { ToolContext } from '../../src/tools/registry.js';
import { createFakeSession } from '../helpers/fakes.js';
import type { FakeDrive, FakeSheets } from '../helpers/fakes.js';
import { assertFailure, assertSuccess, textOf } from '../helpers/assertions.js';

const TABS = {
  data: {
    sheets: [
      { properties: { sheetId: 0, title: 'Summary' } },
      { properties: { sheetId: 7, title: 'Data' } },
    ],
  },
};

describe('sheets tools', () => {
  let sheets: FakeSheets;
  let drive: FakeDrive;
  let ctx: ToolContext;

  beforeEach(() => {
    ({ sheets, drive, ctx } = createFakeSession());
  });

  describe('qualifyRange', () => {
    it('prefixes the range with the sheet name', () => {
      expect(qualifyRange('Data', 'A1:B2')).toBe('Data!A1:B2');
    });

    it('uses the bare sheet name when no range is given', () => {
      expect(qualifyRange('Data')).toBe('Data');
      expect(qualifyRange('Data', '')).toBe('Data');
    });
  });

  describe('get_sheet_data', () => {
    it('returns plain values for a range', async () => {
      sheets.spreadsheets.values.get.mockResolvedValue({ data: { values: [['a', 1], ['b', 2]] } });

      const result = await getSheetData.call({ spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'A1:B2' }, ctx);

      expect(sheets.spreadsheets.values.get).toHaveBeenCalledWith({ spreadsheetId: 'sheet-1', range: 'Data!A1:B2' });
      expect(result).toStrictEqual({ content: [], structuredContent: { values: [['a', 1], ['b', 2]] } });
    });

    it('returns an empty list for an empty sheet', async () => {
      sheets.spreadsheets.values.get.mockResolvedValue({ data: { range: 'Data!A1:Z1000' } });

      const result = await getSheetData.call({ spreadsheet_id: 'sheet-1', sheet: 'Data' }, ctx);

      expect(sheets.spreadsheets.values.get).toHaveBeenCalledWith({ spreadsheetId: 'sheet-1', range: 'Data' });
      expect(result.structuredContent).toEqual({ values: [] });
    });

    it('returns grid data when asked to', async () => {
      const grid = { spreadsheetId: 'sheet-1', sheets: [{ data: [{ rowData: [] }] }] };
      sheets.spreadsheets.get.mockResolvedValue({ data: grid });

      const result = await getSheetData.call(
        { spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'A1:B2', include_grid_data: true },
        ctx
      );

      expect(sheets.spreadsheets.get).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        ranges: ['Data!A1:B2'],
        includeGridData: true,
      });
      expect(sheets.spreadsheets.values.get).not.toHaveBeenCalled();
      expect(result.structuredContent).toEqual({ grid_data: grid });
    });

    it('reports API errors as a failed call', async () => {
      sheets.spreadsheets.values.get.mockRejectedValue(new Error('Unable to parse range: Nope!A1'));

      const result = await getSheetData.call({ spreadsheet_id: 'sheet-1', sheet: 'Nope', range: 'A1' }, ctx);

      assertFailure(result, 'Tool execution failed: Unable to parse range: Nope!A1');
    });
  });

  describe('get_sheet_formulas', () => {
    it('requests formulas rather than computed values', async () => {
      sheets.spreadsheets.values.get.mockResolvedValue({ data: { values: [['=SUM(A1:A3)']] } });

      const result = await getSheetFormulas.call({ spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'B1' }, ctx);

      expect(sheets.spreadsheets.values.get).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        range: 'Data!B1',
        valueRenderOption: 'FORMULA',
      });
      expect(result.structuredContent).toEqual({ formulas: [['=SUM(A1:A3)']] });
    });
  });

  describe('update_cells', () => {
    it('writes values as user input', async () => {
      sheets.spreadsheets.values.update.mockResolvedValue({ data: { updatedRange: 'Data!A1:B2', updatedCells: 4 } });

      const result = await updateCells.call(
        { spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'A1:B2', data: { rows: [['x', 1], [true, null]] } },
        ctx
      );

      expect(sheets.spreadsheets.values.update).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        range: 'Data!A1:B2',
        valueInputOption: 'USER_ENTERED',
        requestBody: { values: [['x', 1], [true, null]] },
      });
      expect(result.structuredContent).toEqual({ updatedRange: 'Data!A1:B2', updatedCells: 4 });
    });

    it('rejects rows that are not two-dimensional', async () => {
      const result = await updateCells.call(
        { spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'A1', data: { rows: ['flat'] } },
        ctx
      );

      expect(result.isError).toBe(true);
      expect(textOf(result)).toMatch(/^Invalid arguments for update_cells: data\.rows\.0: /);
      expect(sheets.spreadsheets.values.update).not.toHaveBeenCalled();
    });
  });

  describe('batch_update_cells', () => {
    it('qualifies every range with the sheet name', async () => {
      sheets.spreadsheets.values.batchUpdate.mockResolvedValue({ data: { totalUpdatedCells: 3 } });

      const result = await batchUpdateCells.call(
        {
          spreadsheet_id: 'sheet-1',
          sheet: 'Data',
          ranges: { ranges: { 'A1:B1': [['Name', 'Age']], D4: [['=A1']] } },
        },
        ctx
      );

      expect(sheets.spreadsheets.values.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        requestBody: {
          valueInputOption: 'USER_ENTERED',
          data: [
            { range: 'Data!A1:B1', values: [['Name', 'Age']] },
            { range: 'Data!D4', values: [['=A1']] },
          ],
        },
      });
      expect(result.structuredContent).toEqual({ totalUpdatedCells: 3 });
    });
  });

  describe('add_rows', () => {
    it('appends after the last row of the sheet', async () => {
      sheets.spreadsheets.values.append.mockResolvedValue({ data: { updates: { updatedRows: 1 } } });

      const result = await addRows.call({ spreadsheet_id: 'sheet-1', sheet: 'Data', data: { rows: [['c', 3]] } }, ctx);

      expect(sheets.spreadsheets.values.append).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        range: 'Data',
        valueInputOption: 'USER_ENTERED',
        requestBody: { values: [['c', 3]] },
      });
      expect(result.structuredContent).toEqual({ updates: { updatedRows: 1 } });
    });
  });

  describe('add_columns and insert_empty_rows', () => {
    beforeEach(() => {
      sheets.spreadsheets.get.mockResolvedValue(TABS);
      sheets.spreadsheets.batchUpdate.mockResolvedValue({ data: { spreadsheetId: 'sheet-1', replies: [{}] } });
    });

    it('inserts columns at the given position, inheriting formatting from the left', async () => {
      const result = await addColumns.call(
        { spreadsheet_id: 'sheet-1', sheet: 'Data', count: 2, start_column: 3 },
        ctx
      );

      expect(sheets.spreadsheets.get).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        fields: 'sheets.properties(sheetId,title)',
      });
      expect(sheets.spreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        requestBody: {
          requests: [{
            insertDimension: {
              range: { sheetId: 7, dimension: 'COLUMNS', startIndex: 3, endIndex: 5 },
              inheritFromBefore: true,
            },
          }],
        },
      });
      expect(result.structuredContent).toEqual({ spreadsheetId: 'sheet-1', replies: [{}] });
    });

    it('inserts rows at the top by default', async () => {
      await insertEmptyRows.call({ spreadsheet_id: 'sheet-1', sheet: 'Summary', count: 4 }, ctx);

      expect(sheets.spreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        requestBody: {
          requests: [{
            insertDimension: {
              range: { sheetId: 0, dimension: 'ROWS', startIndex: 0, endIndex: 4 },
              inheritFromBefore: false,
            },
          }],
        },
      });
    });

    it('reports a missing sheet as data', async () => {
      const result = await addColumns.call({ spreadsheet_id: 'sheet-1', sheet: 'Missing', count: 1 }, ctx);

      expect(result).toStrictEqual({ content: [], structuredContent: { error: "Sheet 'Missing' not found" } });
      expect(sheets.spreadsheets.batchUpdate).not.toHaveBeenCalled();
    });

    it('reports a missing sheet as data when inserting rows', async () => {
      const result = await insertEmptyRows.call({ spreadsheet_id: 'sheet-1', sheet: 'Missing', count: 1 }, ctx);

      expect(result.isError).toBeUndefined();
      expect(result.structuredContent).toEqual({ error: "Sheet 'Missing' not found" });
    });

    it('rejects a count below one', async () => {
      const result = await insertEmptyRows.call({ spreadsheet_id: 'sheet-1', sheet: 'Data', count: 0 }, ctx);

      assertFailure(result, 'Invalid arguments for insert_empty_rows: count: Count must be at least 1');
      expect(sheets.spreadsheets.get).not.toHaveBeenCalled();
    });
  });

  describe('list_sheets', () => {
    it('returns tab titles in order', async () => {
      sheets.spreadsheets.get.mockResolvedValue(TABS);

      const result = await listSheets.call({ spreadsheet_id: 'sheet-1' }, ctx);

      expect(sheets.spreadsheets.get).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        fields: 'sheets.properties.title',
      });
      expect(result).toStrictEqual({ content: [], structuredContent: { sheets: ['Summary', 'Data'] } });
    });

    it('adds a JSON text rendering when raw content is requested', async () => {
      sheets.spreadsheets.get.mockResolvedValue(TABS);

      const result = await listSheets.call({ spreadsheet_id: 'sheet-1', raw_content: true }, ctx);

      expect(result.structuredContent).toEqual({ sheets: ['Summary', 'Data'] });
      expect(textOf(result)).toBe('{"sheets":["Summary","Data"]}');
    });
  });

  describe('copy_sheet', () => {
    beforeEach(() => {
      sheets.spreadsheets.get.mockResolvedValue(TABS);
    });

    it('copies the sheet and renames the copy', async () => {
      sheets.spreadsheets.sheets.copyTo.mockResolvedValue({ data: { sheetId: 99, title: 'Copy of Data' } });
      sheets.spreadsheets.batchUpdate.mockResolvedValue({ data: { spreadsheetId: 'dst-1', replies: [{}] } });

      const result = await copySheet.call(
        { src_spreadsheet: 'src-1', src_sheet: 'Data', dst_spreadsheet: 'dst-1', dst_sheet: 'Archive' },
        ctx
      );

      expect(sheets.spreadsheets.sheets.copyTo).toHaveBeenCalledWith({
        spreadsheetId: 'src-1',
        sheetId: 7,
        requestBody: { destinationSpreadsheetId: 'dst-1' },
      });
      expect(sheets.spreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'dst-1',
        requestBody: {
          requests: [{
            updateSheetProperties: { properties: { sheetId: 99, title: 'Archive' }, fields: 'title' },
          }],
        },
      });
      expect(result.structuredContent).toEqual({
        copy: { sheetId: 99, title: 'Copy of Data' },
        rename: { spreadsheetId: 'dst-1', replies: [{}] },
      });
    });

    it('skips the rename when the copy already has the requested title', async () => {
      sheets.spreadsheets.sheets.copyTo.mockResolvedValue({ data: { sheetId: 99, title: 'Archive' } });

      const result = await copySheet.call(
        { src_spreadsheet: 'src-1', src_sheet: 'Data', dst_spreadsheet: 'dst-1', dst_sheet: 'Archive' },
        ctx
      );

      expect(sheets.spreadsheets.batchUpdate).not.toHaveBeenCalled();
      expect(result.structuredContent).toEqual({ copy: { sheetId: 99, title: 'Archive' } });
    });

    it('reports a missing source sheet as data', async () => {
      const result = await copySheet.call(
        { src_spreadsheet: 'src-1', src_sheet: 'Ghost', dst_spreadsheet: 'dst-1', dst_sheet: 'Archive' },
        ctx
      );

      expect(result).toStrictEqual({ content: [], structuredContent: { error: "Source sheet 'Ghost' not found" } });
      expect(sheets.spreadsheets.sheets.copyTo).not.toHaveBeenCalled();
    });
  });

  describe('rename_sheet', () => {
    it('reports a missing sheet as data, with raw text when requested', async () => {
      sheets.spreadsheets.get.mockResolvedValue(TABS);

      const result = await renameSheet.call(
        { spreadsheet: 'sheet-1', sheet: 'Missing', new_name: 'Other', raw_content: true },
        ctx
      );

      expect(result.structuredContent).toEqual({ error: "Sheet 'Missing' not found" });
      expect(textOf(result)).toBe('{"error":"Sheet \'Missing\' not found"}');
      expect(sheets.spreadsheets.batchUpdate).not.toHaveBeenCalled();
    });

    it('updates the title of the matching sheet', async () => {
      sheets.spreadsheets.get.mockResolvedValue(TABS);
      sheets.spreadsheets.batchUpdate.mockResolvedValue({ data: { spreadsheetId: 'sheet-1', replies: [{}] } });

      const result = await renameSheet.call({ spreadsheet: 'sheet-1', sheet: 'Data', new_name: 'Raw data' }, ctx);

      assertSuccess(result);
      expect(sheets.spreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        requestBody: {
          requests: [{
            updateSheetProperties: { properties: { sheetId: 7, title: 'Raw data' }, fields: 'title' },
          }],
        },
      });
    });
  });

  describe('get_multiple_sheet_data', () => {
    it('reports each query independently', async () => {
      sheets.spreadsheets.values.get.mockImplementation(async ({ range }: { range: string }) => {
        if (range === 'Broken!A1') {
          throw new Error('Unable to parse range: Broken!A1');
        }
        return { data: { values: [[range]] } };
      });

      const result = await getMultipleSheetData.call(
        {
          queries: [
            { spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'A1:B2' },
            { spreadsheet_id: 'sheet-1', sheet: 'Data' },
            { spreadsheet_id: 'sheet-2', sheet: 'Broken', range: 'A1' },
          ],
        },
        ctx
      );

      assertSuccess(result);
      expect(result.structuredContent).toEqual({
        result: [
          { spreadsheet_id: 'sheet-1', sheet: 'Data', range: 'A1:B2', data: [['Data!A1:B2']] },
          { spreadsheet_id: 'sheet-1', sheet: 'Data', error: 'Missing required keys' },
          { spreadsheet_id: 'sheet-2', sheet: 'Broken', range: 'A1', error: 'Unable to parse range: Broken!A1' },
        ],
      });
      expect(sheets.spreadsheets.values.get).toHaveBeenCalledTimes(2);
    });
  });

  describe('get_multiple_spreadsheet_summary', () => {
    it('summarizes each sheet and isolates failures', async () => {
      sheets.spreadsheets.get.mockImplementation(async ({ spreadsheetId }: { spreadsheetId: string }) => {
        if (spreadsheetId === 'missing') {
          throw new Error('Requested entity was not found.');
        }
        return {
          data: {
            properties: { title: 'Budget' },
            sheets: [
              { properties: { title: 'Q1', sheetId: 0 } },
              { properties: { title: 'Q2', sheetId: 1 } },
            ],
          },
        };
      });
      sheets.spreadsheets.values.get.mockImplementation(async ({ range }: { range: string }) => {
        if (range === 'Q2!A1:3') {
          throw new Error('quota exceeded');
        }
        return { data: { values: [['Item', 'Cost'], ['Rent', 1000], ['Food', 300]] } };
      });

      const result = await getMultipleSpreadsheetSummary.call(
        { spreadsheet_ids: ['budget', 'missing'], rows_to_fetch: 3 },
        ctx
      );

      expect(sheets.spreadsheets.get).toHaveBeenCalledWith({
        spreadsheetId: 'budget',
        fields: 'properties.title,sheets(properties(title,sheetId))',
      });
      expect(result.structuredContent).toEqual({
        result: [
          {
            spreadsheet_id: 'budget',
            title: 'Budget',
            sheets: [
              { title: 'Q1', headers: ['Item', 'Cost'], first_rows: [['Rent', 1000], ['Food', 300]], error: null },
              { title: 'Q2', headers: [], first_rows: [], error: 'Error fetching data for sheet Q2: quota exceeded' },
            ],
            error: null,
          },
          {
            spreadsheet_id: 'missing',
            title: null,
            sheets: [],
            error: 'Error fetching spreadsheet missing: Requested entity was not found.',
          },
        ],
      });
    });

    it('fetches five rows per sheet by default', async () => {
      sheets.spreadsheets.get.mockResolvedValue({ data: { sheets: [{ properties: { title: 'Only' } }] } });
      sheets.spreadsheets.values.get.mockResolvedValue({ data: {} });

      const result = await getMultipleSpreadsheetSummary.call({ spreadsheet_ids: ['s1'] }, ctx);

      expect(sheets.spreadsheets.values.get).toHaveBeenCalledWith({ spreadsheetId: 's1', range: 'Only!A1:5' });
      expect(result.structuredContent).toEqual({
        result: [{
          spreadsheet_id: 's1',
          title: 'Unknown Title',
          sheets: [{ title: 'Only', headers: [], first_rows: [], error: null }],
          error: null,
        }],
      });
    });
  });

  describe('create_spreadsheet', () => {
    beforeEach(() => {
      sheets.spreadsheets.create.mockResolvedValue({
        data: { spreadsheetId: 'new-1', properties: { title: 'Report' }, sheets: [] },
      });
    });

    it('leaves the spreadsheet in the root folder when no folder is configured', async () => {
      const result = await createSpreadsheet.call({ title: 'Report' }, ctx);

      expect(sheets.spreadsheets.create).toHaveBeenCalledWith({
        requestBody: { properties: { title: 'Report' } },
        fields: 'spreadsheetId,properties,sheets',
      });
      expect(drive.files.update).not.toHaveBeenCalled();
      expect(result.structuredContent).toEqual({ spreadsheetId: 'new-1', title: 'Report', folder: 'root' });
    });

    it('moves the spreadsheet into the configured folder', async () => {
      const fake = createFakeSession({ folderId: 'folder-9' });
      fake.sheets.spreadsheets.create.mockResolvedValue({
        data: { spreadsheetId: 'new-1', properties: { title: 'Report' } },
      });
      fake.drive.files.get.mockResolvedValue({ data: { parents: ['root-folder'] } });
      fake.drive.files.update.mockResolvedValue({ data: { id: 'new-1', parents: ['folder-9'] } });

      const result = await createSpreadsheet.call({ title: 'Report' }, fake.ctx);

      expect(fake.drive.files.update).toHaveBeenCalledWith({
        fileId: 'new-1',
        addParents: 'folder-9',
        removeParents: 'root-folder',
        fields: 'id, parents',
        supportsAllDrives: true,
      });
      expect(result.structuredContent).toEqual({ spreadsheetId: 'new-1', title: 'Report', folder: 'folder-9' });
    });

    it('still succeeds when the move fails', async () => {
      const fake = createFakeSession({ folderId: 'folder-9' });
      fake.sheets.spreadsheets.create.mockResolvedValue({
        data: { spreadsheetId: 'new-1', properties: { title: 'Report' } },
      });
      fake.drive.files.get.mockRejectedValue(new Error('insufficient permissions'));

      const result = await createSpreadsheet.call({ title: 'Report' }, fake.ctx);

      assertSuccess(result);
      expect(result.structuredContent).toEqual({ spreadsheetId: 'new-1', title: 'Report', folder: 'folder-9' });
    });
  });

  describe('create_sheet', () => {
    it('returns the new tab properties', async () => {
      sheets.spreadsheets.batchUpdate.mockResolvedValue({
        data: { replies: [{ addSheet: { properties: { sheetId: 5, title: 'Notes', index: 2 } } }] },
      });

      const result = await createSheet.call({ spreadsheet_id: 'sheet-1', title: 'Notes' }, ctx);

      expect(sheets.spreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-1',
        requestBody: { requests: [{ addSheet: { properties: { title: 'Notes' } } }] },
      });
      expect(result.structuredContent).toEqual({ sheetId: 5, title: 'Notes', spreadsheetId: 'sheet-1' });
    });

    it('fails when the reply carries no properties', async () => {
      sheets.spreadsheets.batchUpdate.mockResolvedValue({ data: { replies: [] } });

      const result = await createSheet.call({ spreadsheet_id: 'sheet-1', title: 'Notes' }, ctx);

      assertFailure(result, 'Tool execution failed: addSheet reply did not include sheet properties');
    });
  });
});
