import { createInterface } from 'node:readline';
import { createApp } from '../app.js';
import { handleMessage } from '../bot/handler.js';
import { log, info, error, errorMessage } from '../utils/console.js';
import type { RecordOptions } from '../types.js';

/**
 * Treat every stdin line as a chat message until stdin closes.
 * One failing message does not stop the loop.
 */
export async function listen(options: RecordOptions): Promise<void> {
    const app = createApp(options);
    const source = options.source ?? app.settings.default_source;

    if (process.stdin.isTTY) {
        info('Type a message (e.g. "makan siang 25000"), Ctrl+D to quit.');
    }

    const rl = createInterface({ input: process.stdin, terminal: false });
    for await (const line of rl) {
        if (!line.trim()) continue;
        try {
            log(await handleMessage(line, source, app));
        } catch (err) {
            error(errorMessage(err));
        }
        log('');
    }
}
