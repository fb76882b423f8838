import { readdir } from 'fs/promises';
import { basename, join, relative } from 'path';
import { describeError } from './errors.js';
import { FragmentParser, fragmentParser } from './FragmentParser.js';
import { Logger } from './logger.js';
import { detectMapName, SchemaRegistry, schemaRegistry } from './SchemaRegistry.js';
import { childElements } from './XmlTree.js';
import { ConfigFileInfo, ModConfigInfo, ScanProgress, ScanReport } from './types.js';

export interface ScanOptions {
    includeUnknownSchema?: boolean;
    skip?: ReadonlySet<string>;
    displayNames?: ReadonlyMap<string, string>;
    currentMap?: string;
    onProgress?: (progress: ScanProgress) => void;
    signal?: AbortSignal;
}

// Mod metadata files that share the .xml extension.
const IGNORED_FILES = new Set(['config.xml', 'meta.xml', 'mod.xml']);

interface PendingMod {
    modId: string;
    modPath: string;
    files: string[];
}

export class ModScanner {
    private parser: FragmentParser;
    private registry: SchemaRegistry;
    private logger = new Logger('scanner');

    constructor(parser: FragmentParser = fragmentParser, registry: SchemaRegistry = schemaRegistry) {
        this.parser = parser;
        this.registry = registry;
    }

    /**
     * Classifies every XML file under each mod directory. Never writes and never
     * throws for a single bad file; the reason ends up on the file's entry.
     */
    async scan(modDirectories: string[], options: ScanOptions = {}): Promise<ScanReport> {
        const currentMap = (options.currentMap ?? 'chernarusplus').toLowerCase();

        const pending: PendingMod[] = [];
        for (const modPath of modDirectories) {
            const modId = basename(modPath);
            if (options.skip?.has(modId)) {
                this.logger.debug(`Skipping ${modId}`);
                continue;
            }
            pending.push({ modId, modPath, files: await this.listXmlFiles(modPath) });
        }

        const total = pending.reduce((sum, mod) => sum + mod.files.length, 0);
        const mods: ModConfigInfo[] = [];
        let current = 0;
        let cancelled = false;

        for (const mod of pending) {
            if (options.signal?.aborted) {
                cancelled = true;
                break;
            }

            const info: ModConfigInfo = {
                modId: mod.modId,
                displayName: options.displayNames?.get(mod.modId) ?? mod.modId,
                modPath: mod.modPath,
                configFiles: [],
                entriesCount: 0,
                mapSpecificFiles: [],
                needsManualReview: false,
                manualReviewReason: ''
            };

            for (const file of mod.files) {
                if (options.signal?.aborted) {
                    cancelled = true;
                    break;
                }

                current++;
                const fileInfo = await this.classifyFile(file, mod.modPath, options.includeUnknownSchema ?? false);
                options.onProgress?.({ current, total, modId: mod.modId, file: fileInfo.relativePath });
                this.record(info, fileInfo, currentMap);
            }

            if (info.configFiles.length > 0) {
                mods.push(info);
            }
            if (cancelled) break;
        }

        this.logger.info(`Scanned ${current}/${total} files across ${mods.length} mods${cancelled ? ' (cancelled)' : ''}`);
        return { mods, filesScanned: current, cancelled };
    }

    private record(info: ModConfigInfo, file: ConfigFileInfo, currentMap: string): void {
        info.configFiles.push(file);
        info.entriesCount += file.entryCount;

        const flag = (reason: string) => {
            info.needsManualReview = true;
            if (!info.manualReviewReason) info.manualReviewReason = reason;
        };

        if (file.mapName) {
            info.mapSpecificFiles.push(file.relativePath);
            if (file.mapName !== currentMap) {
                flag(`Map-specific file '${file.relativePath}' may not be for current map (${currentMap})`);
            }
        }

        if (file.classification === 'empty') {
            flag(`'${file.relativePath}' contains no entries`);
        } else if (file.classification === 'invalid' && file.modelId) {
            flag(`Cannot read '${file.relativePath}': ${file.reason ?? 'unknown error'}`);
        }
    }

    async classifyFile(path: string, modPath: string, includeUnknownSchema: boolean): Promise<ConfigFileInfo> {
        const name = basename(path);
        const base: Omit<ConfigFileInfo, 'classification'> = {
            path,
            relativePath: relative(modPath, path),
            modelId: null,
            targetFilename: null,
            entryCount: 0,
            warnings: [],
            mapName: detectMapName(name)
        };

        try {
            const { document, warnings } = await this.parser.parse(path);
            const model = document.model;

            if (!model) {
                if (!includeUnknownSchema) {
                    return {
                        ...base,
                        classification: 'invalid',
                        warnings: [...warnings],
                        reason: `Unknown config schema <${document.root.tag}>`
                    };
                }
                return {
                    ...base,
                    classification: 'copy_only',
                    targetFilename: name,
                    warnings: [...warnings],
                    reason: 'Unknown config schema; copied as-is'
                };
            }

            const entryCount = childElements(document.root).length;
            const info: ConfigFileInfo = {
                ...base,
                classification: entryCount === 0 ? 'empty' : 'mergeable',
                modelId: model.id,
                targetFilename: this.registry.targetFilenameFor(name, model),
                entryCount,
                warnings: [...warnings]
            };
            if (entryCount === 0) info.reason = 'No entries';
            return info;
        } catch (error) {
            const inferred = this.registry.modelForFilename(name) ?? this.registry.modelForFilenamePattern(name);
            this.logger.warn(`Failed to read ${path}: ${describeError(error)}`);
            return {
                ...base,
                classification: 'invalid',
                modelId: inferred?.id ?? null,
                targetFilename: inferred ? this.registry.targetFilenameFor(name, inferred) : null,
                reason: describeError(error)
            };
        }
    }

    private async listXmlFiles(dir: string): Promise<string[]> {
        const files: string[] = [];
        try {
            const entries = await readdir(dir, { withFileTypes: true });
            entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

            for (const entry of entries) {
                const fullPath = join(dir, entry.name);
                if (entry.isDirectory()) {
                    files.push(...await this.listXmlFiles(fullPath));
                } else if (entry.isFile()
                    && entry.name.toLowerCase().endsWith('.xml')
                    && !IGNORED_FILES.has(entry.name.toLowerCase())) {
                    files.push(fullPath);
                }
            }
        } catch (error) {
            this.logger.warn(`Failed to scan directory ${dir}: ${describeError(error)}`);
        }
        return files;
    }
}
