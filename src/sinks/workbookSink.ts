import fs from 'fs';
import path from 'path';
import { Workbook, Worksheet } from 'exceljs';
import { OPTION_CHAIN_COLUMNS, rowValues } from '../services/chainTransform';
import { shortId, today } from '../utils/session';
import { ChainSnapshot, Sink } from './types';

export const SHEET_NAME = 'Option Chain';

/** First sheet row of the chain table; the rows above hold the summary cells. */
export const FIRST_TABLE_ROW = 12;

// Summary cells sit above the column they summarise
const CELLS = {
    underlyingValue: 'O1',
    timestamp: 'O2',
    putCallRatio: 'O3',
    nearPcr: 'O4',
    totOiCe: 'A1',
    totVolCe: 'D1',
    totVolPe: 'Z1',
    totOiPe: 'AC1',
} as const;

export const workbookFileName = (symbol: string, expiry: string, date: Date = new Date(), id: string = shortId(3)) =>
    `${today(date)} #${id} OP ${symbol} for ${expiry}.xlsx`;

/**
 * Keeps one workbook per session up to date. The template is copied once; when
 * there is none, a workbook with a bare "Option Chain" sheet is created.
 */
export class WorkbookSink implements Sink {
    readonly name = 'workbook';
    readonly file: string;
    private readonly template?: string;
    private prepared = false;
    private writtenRows = 0;

    constructor(file: string, template?: string) {
        this.file = file;
        this.template = template;
    }

    private async prepare(): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
        if (this.template && fs.existsSync(this.template)) {
            await fs.promises.copyFile(this.template, this.file);
        } else {
            const workbook = new Workbook();
            const sheet = workbook.addWorksheet(SHEET_NAME);
            sheet.getRow(FIRST_TABLE_ROW - 1).values = [...OPTION_CHAIN_COLUMNS];
            await workbook.xlsx.writeFile(this.file);
        }
        this.prepared = true;
    }

    private writeTable(sheet: Worksheet, values: number[][]): void {
        values.forEach((cells, i) => {
            const row = sheet.getRow(FIRST_TABLE_ROW + i);
            cells.forEach((value, j) => {
                row.getCell(j + 1).value = value;
            });
        });

        // a narrower window than last cycle leaves old strikes below
        for (let i = values.length; i < this.writtenRows; i++) {
            const row = sheet.getRow(FIRST_TABLE_ROW + i);
            for (let j = 0; j < OPTION_CHAIN_COLUMNS.length; j++) {
                row.getCell(j + 1).value = null;
            }
        }
        this.writtenRows = values.length;
    }

    async write({ rows, metrics }: ChainSnapshot): Promise<void> {
        if (!this.prepared) await this.prepare();

        const workbook = new Workbook();
        await workbook.xlsx.readFile(this.file);
        const sheet = workbook.getWorksheet(SHEET_NAME) ?? workbook.addWorksheet(SHEET_NAME);

        this.writeTable(sheet, rows.map(rowValues));

        sheet.getCell(CELLS.underlyingValue).value = metrics.underlyingValue;
        sheet.getCell(CELLS.timestamp).value = metrics.timestamp;
        sheet.getCell(CELLS.putCallRatio).value = metrics.putCallRatio;
        sheet.getCell(CELLS.nearPcr).value = metrics.nearPcr;
        sheet.getCell(CELLS.totOiCe).value = metrics.totOiCe;
        sheet.getCell(CELLS.totOiPe).value = metrics.totOiPe;
        sheet.getCell(CELLS.totVolCe).value = metrics.totVolCe;
        sheet.getCell(CELLS.totVolPe).value = metrics.totVolPe;

        await workbook.xlsx.writeFile(this.file);
    }
}
