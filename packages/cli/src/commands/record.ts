import { createApp } from '../app.js';
import { handleMessage } from '../bot/handler.js';
import { log } from '../utils/console.js';
import type { RecordOptions } from '../types.js';

/**
 * Record one message given on the command line.
 */
export async function recordMessage(words: string[], options: RecordOptions): Promise<void> {
    const app = createApp(options);
    const reply = await handleMessage(words.join(' '), options.source ?? app.settings.default_source, app);
    log(reply);
}
