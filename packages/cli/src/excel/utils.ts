import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'payee-match';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen at the top.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' },
    };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Size each column to its longest value, between 10 and 60 characters.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            const len = cell.text.length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 60);
    });
}

export function formatCurrencyColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}
