/**
 * TransactionStore backed by an .xlsx workbook.
 *
 * One sheet, one row per transaction, newest last. The Saldo column carries
 * the running balance after each row.
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Workbook, Worksheet } from 'exceljs';
import {
    TransactionSchema,
    filterByPeriod,
    formatDmyDate,
    parseDmyDate,
    toLocalDate,
    toLocalTime,
    type AppendResult,
    type Period,
    type Transaction,
    type TransactionStore,
} from '@dompet/core';
import {
    createWorkbook,
    formatHeaderRow,
    autoFitColumns,
    formatRupiahColumn,
    cellText,
    cellNumber,
} from '../excel/utils.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { errorMessage } from '../utils/console.js';

export const SHEET_NAME = 'Transaksi';

export const HEADERS = [
    'Tanggal',
    'Waktu',
    'Tipe',
    'Kategori',
    'Jumlah',
    'Keterangan',
    'Catatan',
    'Sumber',
    'ID',
    'Saldo',
] as const;

const COL = {
    DATE: 1,
    TIME: 2,
    TYPE: 3,
    CATEGORY: 4,
    AMOUNT: 5,
    DESCRIPTION: 6,
    MEMO: 7,
    SOURCE: 8,
    ID: 9,
    BALANCE: 10,
} as const;

export const TYPE_LABELS = {
    income: 'Pemasukan',
    expense: 'Pengeluaran',
} as const;

const MS_PER_MINUTE = 60_000;

export interface WorkbookStoreOptions {
    filePath: string;
    utcOffsetMinutes: number;
    retry?: RetryOptions;
}

export class WorkbookStore implements TransactionStore {
    private readonly filePath: string;
    private readonly utcOffsetMinutes: number;
    private readonly retry: RetryOptions;
    private writes: Promise<unknown> = Promise.resolve();

    constructor(options: WorkbookStoreOptions) {
        this.filePath = options.filePath;
        this.utcOffsetMinutes = options.utcOffsetMinutes;
        this.retry = options.retry ?? {};
    }

    /**
     * Append a row. Writes are serialized; each is retried with backoff and
     * a write that still fails is reported, not thrown.
     */
    append(transaction: Transaction): Promise<AppendResult> {
        const result = this.writes.then(() => this.appendWithRetry(transaction));
        this.writes = result;
        return result;
    }

    async readAll(period?: Period): Promise<Transaction[]> {
        await this.writes;
        if (!existsSync(this.filePath)) {
            return [];
        }
        const workbook = await this.open();
        const worksheet = workbook.getWorksheet(SHEET_NAME);
        if (!worksheet) {
            return [];
        }

        const transactions: Transaction[] = [];
        for (let row = 2; row <= worksheet.rowCount; row++) {
            const txn = this.readRow(worksheet, row);
            if (txn) transactions.push(txn);
        }

        return period ? filterByPeriod(transactions, period) : transactions;
    }

    private async appendWithRetry(transaction: Transaction): Promise<AppendResult> {
        try {
            await withRetry(() => this.appendRow(transaction), this.retry);
            return { ok: true };
        } catch (err) {
            return { ok: false, error: errorMessage(err) };
        }
    }

    private async appendRow(transaction: Transaction): Promise<void> {
        const workbook = existsSync(this.filePath) ? await this.open() : createWorkbook();
        const worksheet = workbook.getWorksheet(SHEET_NAME) ?? this.addSheet(workbook);

        const previous = worksheet.rowCount > 1
            ? cellNumber(worksheet, worksheet.rowCount, COL.BALANCE) ?? 0
            : 0;
        const signed = transaction.direction === 'income' ? transaction.amount : -transaction.amount;
        const createdAt = new Date(transaction.created_at);

        worksheet.addRow([
            formatDmyDate(toLocalDate(createdAt, this.utcOffsetMinutes)),
            toLocalTime(createdAt, this.utcOffsetMinutes),
            TYPE_LABELS[transaction.direction],
            transaction.category,
            signed,
            transaction.description,
            transaction.memo,
            transaction.source,
            transaction.txn_id,
            previous + signed,
        ]);
        autoFitColumns(worksheet);

        await mkdir(dirname(this.filePath), { recursive: true });
        await workbook.xlsx.writeFile(this.filePath);
    }

    private addSheet(workbook: Workbook): Worksheet {
        const worksheet = workbook.addWorksheet(SHEET_NAME);
        worksheet.addRow([...HEADERS]);
        formatHeaderRow(worksheet);
        formatRupiahColumn(worksheet, COL.AMOUNT);
        formatRupiahColumn(worksheet, COL.BALANCE);
        return worksheet;
    }

    private async open(): Promise<Workbook> {
        const workbook = createWorkbook();
        await workbook.xlsx.readFile(this.filePath);
        return workbook;
    }

    /**
     * Map a sheet row back to a Transaction; rows that don't validate are skipped.
     */
    private readRow(worksheet: Worksheet, row: number): Transaction | null {
        const date = parseDmyDate(cellText(worksheet, row, COL.DATE));
        const time = cellText(worksheet, row, COL.TIME).match(/^(\d{2}):(\d{2}):(\d{2})$/);
        const signed = cellNumber(worksheet, row, COL.AMOUNT);
        if (!date || !time || signed === null) {
            return null;
        }

        const localMs = date.getTime() +
            (parseInt(time[1], 10) * 60 + parseInt(time[2], 10)) * MS_PER_MINUTE +
            parseInt(time[3], 10) * 1000;
        const createdAt = new Date(localMs - this.utcOffsetMinutes * MS_PER_MINUTE);
        const type = cellText(worksheet, row, COL.TYPE);

        const result = TransactionSchema.safeParse({
            txn_id: cellText(worksheet, row, COL.ID),
            txn_date: toLocalDate(createdAt, this.utcOffsetMinutes),
            created_at: createdAt.toISOString(),
            amount: Math.abs(signed),
            direction: type === TYPE_LABELS.income ? 'income' : type === TYPE_LABELS.expense ? 'expense' : type,
            category: cellText(worksheet, row, COL.CATEGORY),
            description: cellText(worksheet, row, COL.DESCRIPTION),
            memo: cellText(worksheet, row, COL.MEMO),
            source: cellText(worksheet, row, COL.SOURCE),
        });
        return result.success ? result.data : null;
    }
}
