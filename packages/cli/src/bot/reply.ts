/**
 * Chat replies. Pure text builders; nothing here reads the ledger.
 */

import {
    formatDmyDate,
    toLocalDate,
    toLocalTime,
    type ParseError,
    type ParseErrorKind,
    type Totals,
    type Transaction,
} from '@dompet/core';

const EXAMPLES = 'Contoh: "makan siang 25000", "beli kopi 15rb", atau "gaji 5jt".';

const PARSE_ERROR_NOTICES: Record<ParseErrorKind, string> = {
    no_amount: 'nominal tidak ditemukan',
    empty_description: 'keterangan transaksi kosong',
};

export const WELCOME_TEXT = [
    '👋 Halo! Selamat datang di Dompet!',
    '',
    'Kirim pesan biasa aja, misalnya:',
    '• Makan siang 25000',
    '• Beli kopi 15rb',
    '• Gaji 5jt',
    '• Grab ke mall 20k',
    '',
    'Command:',
    '/start - Mulai',
    '/help - Lihat bantuan',
    '/saldo - Cek saldo',
].join('\n');

export const HELP_TEXT = [
    '📚 PANDUAN',
    '',
    'Contoh Pengeluaran:',
    '• Makan siang 25000',
    '• Beli baju 150rb',
    '• Bensin 50k',
    '• Bayar listrik 200ribu',
    '',
    'Contoh Pemasukan:',
    '• Gaji 5jt',
    '• Terima transfer 500rb',
    '• Bonus 1juta',
    '',
    'Format Angka:',
    '• 15000 atau 15.000 atau 15rb atau 15k → Rp 15.000',
    '• 2ceban → Rp 20.000',
    '• 1.5jt atau 1,5jt → Rp 1.500.000',
].join('\n');

/**
 * "Rp 1.500.000"; negative amounts as "-Rp 25.000".
 */
export function formatRupiah(amount: number): string {
    const grouped = String(Math.abs(Math.round(amount))).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
    return amount < 0 ? `-Rp ${grouped}` : `Rp ${grouped}`;
}

/**
 * Confirmation for a recorded transaction.
 */
export function formatAcknowledgement(transaction: Transaction, utcOffsetMinutes: number): string {
    const income = transaction.direction === 'income';
    const createdAt = new Date(transaction.created_at);
    const date = formatDmyDate(toLocalDate(createdAt, utcOffsetMinutes));
    const time = toLocalTime(createdAt, utcOffsetMinutes).slice(0, 5);

    return [
        `${income ? '💰' : '💸'} ${income ? 'PEMASUKAN' : 'PENGELUARAN'} TERCATAT!`,
        '',
        `📊 Kategori: ${transaction.category}`,
        `💵 Jumlah: ${income ? '+' : '-'} ${formatRupiah(transaction.amount)}`,
        `📝 Keterangan: ${transaction.memo}`,
        `🕐 Waktu: ${date} ${time}`,
    ].join('\n');
}

export function formatParseError(error: ParseError): string {
    return `❌ Maaf, ${PARSE_ERROR_NOTICES[error.kind]} (${error.message}).\n${EXAMPLES}`;
}

export function formatBalance(totals: Totals): string {
    return [
        '💰 SALDO KAMU',
        '',
        `Pemasukan: ${formatRupiah(totals.income)}`,
        `Pengeluaran: ${formatRupiah(totals.expense)}`,
        `Saldo: ${formatRupiah(totals.net)}`,
    ].join('\n');
}
