#!/usr/bin/env node
/**
 * Dompet CLI
 *
 * Records Indonesian chat-style money messages ("beli kopi 15rb") into a
 * spreadsheet ledger and reports on them.
 */

import 'dotenv/config';

import { Command, InvalidArgumentError } from 'commander';
import { recordMessage } from './commands/record.js';
import { listen } from './commands/listen.js';
import { listTransactions } from './commands/list.js';
import { showSummary, showCategories, showTrends, showMonths } from './commands/report.js';
import { addKeyword } from './commands/add-keyword.js';
import { error, errorMessage } from './utils/console.js';
import type { GlobalOptions } from './types.js';

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

/**
 * Runs a command, printing failures instead of crashing.
 */
async function run(task: () => Promise<void>): Promise<void> {
    try {
        await task();
    } catch (err) {
        error(errorMessage(err));
        process.exitCode = 1;
    }
}

const program = new Command();

program
    .name('dompet')
    .description('Personal finance ledger fed by chat-style messages')
    .version('1.0.0')
    .option('-w, --workspace <dir>', 'Workspace directory (default: nearest with config/settings.yaml)', process.env['DOMPET_WORKSPACE'])
    .option('--memory', 'Keep transactions in memory instead of the workbook', false);

function globals(): GlobalOptions {
    const opts = program.opts();
    return {
        workspace: typeof opts['workspace'] === 'string' ? opts['workspace'] : undefined,
        memory: opts['memory'] === true,
    };
}

program
    .command('record')
    .description('Record one message, e.g. dompet record beli kopi 15rb')
    .argument('<message...>', 'Message text')
    .option('-s, --source <name>', 'Who reported the transaction')
    .action((words: string[], options: { source?: string }) =>
        run(() => recordMessage(words, { ...globals(), ...options })));

program
    .command('listen')
    .description('Read messages from stdin, one per line, and answer each')
    .option('-s, --source <name>', 'Who reported the transactions')
    .action((options: { source?: string }) =>
        run(() => listen({ ...globals(), ...options })));

program
    .command('list')
    .description('Show recent transactions')
    .option('-n, --limit <count>', 'Number of transactions', parsePositiveInt, 10)
    .option('-m, --month <YYYY-MM>', 'Only this month')
    .action((options: { limit: number; month?: string }) =>
        run(() => listTransactions({ ...globals(), ...options })));

program
    .command('summary')
    .description('Income, expense and saving rate for a month')
    .option('-m, --month <YYYY-MM>', 'Month (default: current)')
    .action((options: { month?: string }) =>
        run(() => showSummary({ ...globals(), ...options })));

program
    .command('categories')
    .description('Expenses per category for a month')
    .option('-m, --month <YYYY-MM>', 'Month (default: current)')
    .action((options: { month?: string }) =>
        run(() => showCategories({ ...globals(), ...options })));

program
    .command('trends')
    .description('Daily expenses over the last days')
    .option('-d, --days <count>', 'Number of days', parsePositiveInt, 7)
    .action((options: { days: number }) =>
        run(() => showTrends({ ...globals(), ...options })));

program
    .command('months')
    .description('Income against expense per month')
    .option('-c, --count <count>', 'Number of months', parsePositiveInt, 6)
    .action((options: { count: number }) =>
        run(() => showMonths({ ...globals(), ...options })));

program
    .command('add-keyword')
    .description('Add a keyword to a category (or "income")')
    .argument('<category>', 'Makan, Transport, Belanja, Tagihan, Hiburan, Kesehatan or income')
    .argument('<keyword>', 'Keyword fragment')
    .action((category: string, keyword: string) =>
        run(() => addKeyword(category, keyword, globals())));

await program.parseAsync(process.argv);
