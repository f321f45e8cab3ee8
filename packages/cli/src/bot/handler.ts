/**
 * Chat message handling: commands and free-text transactions.
 *
 * Transport-agnostic. The CLI feeds it stdin lines; a chat transport would
 * feed it incoming messages and send back the returned text.
 */

import {
    computeTotals,
    parseMessage,
    type KeywordTable,
    type Ledger,
} from '@dompet/core';
import { RawMessageSchema, type Settings } from '@dompet/shared';
import { errorMessage } from '../utils/console.js';
import { formatIssues } from '../workspace/config.js';
import {
    WELCOME_TEXT,
    HELP_TEXT,
    formatAcknowledgement,
    formatBalance,
    formatParseError,
    formatRupiah,
} from './reply.js';

export interface HandlerContext {
    ledger: Ledger;
    keywords: KeywordTable;
    settings: Settings;
    now?: () => Date;
}

/**
 * Reply text for one incoming message.
 *
 * Parse failures and failed saves are answered, not thrown. A message
 * without a sender rejects, as does a /saldo read with nothing cached and
 * an unreachable store.
 */
export async function handleMessage(text: string, sender: string, context: HandlerContext): Promise<string> {
    const trimmed = text.trim();
    if (trimmed.startsWith('/')) {
        return handleCommand(trimmed, context);
    }

    const now = context.now?.() ?? new Date();
    const message = RawMessageSchema.safeParse({ text: trimmed, sender, received_at: now });
    if (!message.success) {
        throw new Error(`Invalid message: ${formatIssues(message.error)}`);
    }

    const result = parseMessage(
        message.data,
        context.keywords,
        {
            now,
            utcOffsetMinutes: context.settings.utc_offset_minutes,
            amountPolicy: {
                minBareDigits: context.settings.min_bare_digits,
                maxBareDigits: context.settings.max_bare_digits,
            },
        }
    );
    if (!result.ok) {
        return formatParseError(result.error);
    }

    const reply = formatAcknowledgement(result.transaction, context.settings.utc_offset_minutes);
    const saved = await context.ledger.record(result.transaction);
    if (!saved.ok) {
        return `${reply}\n\n⚠️  Gagal menyimpan: ${saved.error}`;
    }

    try {
        const balance = computeTotals(await context.ledger.list()).net;
        return `${reply}\n\n✅ Tersimpan!\n💰 Saldo Terkini: ${formatRupiah(balance)}`;
    } catch (err) {
        return `${reply}\n\n✅ Tersimpan!\n⚠️  Saldo belum bisa dibaca: ${errorMessage(err)}`;
    }
}

async function handleCommand(text: string, context: HandlerContext): Promise<string> {
    // "/saldo@dompet_bot" addresses a bot in a group chat
    const command = text.split(/\s+/)[0].split('@')[0].toLowerCase();

    switch (command) {
        case '/start':
            return WELCOME_TEXT;
        case '/help':
            return HELP_TEXT;
        case '/saldo':
            return formatBalance(computeTotals(await context.ledger.list()));
        default:
            return `Perintah tidak dikenal: ${command}. Ketik /help untuk bantuan.`;
    }
}
