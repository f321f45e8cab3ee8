import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Dompet';
    workbook.created = new Date();
    return workbook;
}

/**
 * Applies header styling to the first row and freezes it.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF2E7D32' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Attempts to auto-fit column widths based on cell content.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        // Add a bit of padding and cap at 60
        column.width = Math.min(maxLen + 2, 60);
    });
}

/**
 * Whole-rupiah number format with negatives in red.
 */
export function formatRupiahColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0;[Red]-#,##0';
    column.alignment = { horizontal: 'right' };
}

/**
 * Cell value as text. Numbers are stringified, empty cells give ''.
 */
export function cellText(worksheet: Worksheet, row: number, col: number): string {
    const value = worksheet.getRow(row).getCell(col).value;
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    return '';
}

/**
 * Cell value as a number, or null when the cell holds no number.
 */
export function cellNumber(worksheet: Worksheet, row: number, col: number): number | null {
    const value = worksheet.getRow(row).getCell(col).value;
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}
