import { parseDocument, isSeq, isScalar } from 'yaml';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { KeywordGroup } from '@dompet/core';

/**
 * Appends a keyword fragment to a keyword YAML file while preserving comments.
 * When the file does not exist yet it is started from `template`.
 */
export async function appendKeywordToYaml(
    filePath: string,
    group: KeywordGroup,
    fragment: string,
    template: string
): Promise<void> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isMissingFile(err)) {
            content = template;
        } else {
            throw err;
        }
    }

    const doc = parseDocument(content);
    const path = group === 'income' ? ['income'] : ['categories', group];
    const list = doc.getIn(path, true);

    // An absent key or an empty one ("Makan:") starts a new list
    if (list === undefined || list === null || (isScalar(list) && list.value === null)) {
        doc.setIn(path, doc.createNode([fragment]));
    } else if (isSeq(list)) {
        list.add(doc.createNode(fragment));
    } else {
        throw new Error(`Invalid YAML structure in ${filePath}: "${path.join('.')}" must be a list.`);
    }

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, doc.toString());
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
