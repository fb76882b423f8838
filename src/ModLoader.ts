import { readdir, readFile } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { describeError } from './errors.js';
import { pathExists } from './fileSystem.js';
import { Logger } from './logger.js';

export interface DiscoveredMod {
    modId: string;
    path: string;
    displayName: string;
    version: string | null;
}

const META_FILES = ['meta.cpp', 'mod.cpp'];

function readCppField(content: string, field: string): string | null {
    const match = new RegExp(`\\b${field}\\s*=\\s*["']([^"']+)["']`, 'i').exec(content);
    return match ? match[1].trim() : null;
}

export class ModLoader {
    private serverPath: string | null;
    private modDirs: string[];
    private modBatchSize: number;
    private logger = new Logger('mods');

    constructor(serverPath: string | null, modDirs: string[] = [], modBatchSize: number = 10) {
        this.serverPath = serverPath;
        this.modDirs = modDirs;
        this.modBatchSize = modBatchSize;
    }

    /**
     * `@`-prefixed folders of the server directory followed by any explicitly
     * listed mod directories, without repeats.
     */
    async loadMods(): Promise<DiscoveredMod[]> {
        const paths: string[] = [];
        if (this.serverPath) {
            paths.push(...await this.discover(this.serverPath));
        }
        paths.push(...this.modDirs.map(dir => resolve(dir)));

        const unique = [...new Set(paths)];
        const mods: DiscoveredMod[] = [];
        for (let i = 0; i < unique.length; i += this.modBatchSize) {
            const batch = unique.slice(i, i + this.modBatchSize);
            mods.push(...await Promise.all(batch.map(path => this.loadModInfo(path))));
        }

        this.logger.info(`Found ${mods.length} mods`);
        return mods;
    }

    async discover(serverPath: string): Promise<string[]> {
        try {
            const entries = await readdir(serverPath, { withFileTypes: true });
            return entries
                .filter(entry => entry.isDirectory() && entry.name.startsWith('@'))
                .map(entry => resolve(serverPath, entry.name))
                .sort();
        } catch (error) {
            this.logger.warn(`Failed to list mods in ${serverPath}: ${describeError(error)}`);
            return [];
        }
    }

    private async loadModInfo(modPath: string): Promise<DiscoveredMod> {
        const modId = basename(modPath);
        const info: DiscoveredMod = { modId, path: modPath, displayName: modId, version: null };

        for (const file of META_FILES) {
            const metaPath = join(modPath, file);
            if (!(await pathExists(metaPath))) continue;
            try {
                const content = await readFile(metaPath, 'utf-8');
                info.displayName = readCppField(content, 'name') ?? info.displayName;
                info.version = info.version ?? readCppField(content, 'version');
                break;
            } catch (error) {
                this.logger.warn(`Failed to read ${metaPath}: ${describeError(error)}`);
            }
        }
        return info;
    }
}

export function displayNameMap(mods: readonly DiscoveredMod[]): ReadonlyMap<string, string> {
    return new Map(mods.map(mod => [mod.modId, mod.displayName]));
}
