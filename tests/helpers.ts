import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import { collectEntries, fragmentParser } from '../src/FragmentParser.js';
import { parseNodes } from '../src/XmlTree.js';
import { ConfigEntry, ConfigModel, MergePreview, MergeResult, ModConfigInfo, XmlElement } from '../src/types.js';

export async function makeTempDir(prefix: string = 'merge-test-'): Promise<string> {
    return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
    for (const [relativePath, content] of Object.entries(files)) {
        const path = join(root, relativePath);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, content, 'utf-8');
    }
}

export function element(xml: string): XmlElement {
    const node = parseNodes(xml).find(candidate => candidate.type === 'element');
    if (!node || node.type !== 'element') {
        throw new Error(`No element in ${xml}`);
    }
    return node;
}

export function entriesFrom(xml: string, path: string, sourceMod: string, model?: ConfigModel): ConfigEntry[] {
    const { document } = fragmentParser.parseText(xml, path, { model });
    return collectEntries(document, sourceMod, basename(path));
}

export function makePreview(missionPath: string, results: MergeResult[], mods: ModConfigInfo[] = []): MergePreview {
    return {
        missionPath,
        mods,
        results: new Map(results.map(result => [result.targetFilename, result])),
        copyOnly: [],
        resolvedConflicts: new Map(),
        warnings: [],
        modsNeedingManualReview: [],
        consumed: false
    };
}
