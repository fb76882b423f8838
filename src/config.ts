import { ConfigError } from './errors.js';
import { isLogLevel, LogLevel } from './logger.js';
import { ForcedPickPolicy } from './types.js';

export interface AppConfig {
    missionPath: string;
    modDirs: string[];
    serverPath: string | null;
    skipMods: string[];
    currentMap: string;
    includeUnknownSchema: boolean;
    annotate: boolean;
    forcedPick: ForcedPickPolicy;
    modBatchSize: number;
    logLevel: LogLevel;
    serverName: string;
    serverVersion: string;
    serverDescription: string;
    help: boolean;
}

const FORCED_PICK_POLICIES: readonly ForcedPickPolicy[] = ['first', 'last', 'mod_priority'];

function isForcedPickPolicy(value: string): value is ForcedPickPolicy {
    return FORCED_PICK_POLICIES.some(policy => policy === value);
}

// Comma-separated list, blanks dropped.
function parseList(value: string): string[] {
    if (!value || value.trim() === '') return [];
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function parsePositiveInt(flag: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new ConfigError(`${flag} expects a positive integer, got '${value}'`);
    }
    return parsed;
}

export function defaultConfig(): AppConfig {
    return {
        missionPath: '',
        modDirs: [],
        serverPath: null,
        skipMods: [],
        currentMap: 'chernarusplus',
        includeUnknownSchema: false,
        annotate: true,
        forcedPick: 'first',
        modBatchSize: 10,
        logLevel: 'info',
        serverName: 'mission-config-merger',
        serverVersion: '1.0.0',
        serverDescription: 'MCP server that merges mod config fragments into mission XML files',
        help: false
    };
}

export function parseArgs(args: string[]): AppConfig {
    const config = defaultConfig();

    for (const arg of args) {
        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const value = eq === -1 ? '' : arg.slice(eq + 1);

        switch (flag) {
            case '--mission-path':
                config.missionPath = value;
                break;
            case '--mod-dirs':
                config.modDirs = parseList(value);
                break;
            case '--server-path':
                config.serverPath = value || null;
                break;
            case '--skip-mods':
                config.skipMods = parseList(value);
                break;
            case '--current-map':
                config.currentMap = value.toLowerCase();
                break;
            case '--include-unknown-schema':
                config.includeUnknownSchema = true;
                break;
            case '--no-annotate':
                config.annotate = false;
                break;
            case '--forced-pick':
                if (!isForcedPickPolicy(value)) {
                    throw new ConfigError(`--forced-pick must be one of ${FORCED_PICK_POLICIES.join(', ')}`);
                }
                config.forcedPick = value;
                break;
            case '--mod-batch-size':
                config.modBatchSize = parsePositiveInt(flag, value);
                break;
            case '--log-level':
                if (!isLogLevel(value)) {
                    throw new ConfigError('--log-level must be one of debug, info, warn, error');
                }
                config.logLevel = value;
                break;
            case '--server-name':
                config.serverName = value;
                break;
            case '--server-version':
                config.serverVersion = value;
                break;
            case '--help':
            case '-h':
                config.help = true;
                break;
            default:
                throw new ConfigError(`Unknown option: ${arg}`);
        }
    }

    if (!config.help && !config.missionPath) {
        throw new ConfigError('--mission-path argument is required');
    }
    return config;
}

export function usage(): string[] {
    return [
        'Mission Config Merger',
        '',
        'Usage: tsx src/index.ts --mission-path=<path> [options]',
        '',
        'Required:',
        '  --mission-path=<path>            Mission folder holding types.xml, events.xml, ...',
        '',
        'Optional:',
        '  --mod-dirs=<paths>               Comma-separated list of mod directories',
        '  --server-path=<path>             Server folder; its @-prefixed folders are scanned as mods',
        '  --skip-mods=<ids>                Comma-separated mod folder names to leave out',
        '  --current-map=<name>             Map the mission runs on (default: chernarusplus)',
        '  --include-unknown-schema         Copy files of unknown schema into the mission as-is',
        '  --no-annotate                    Do not write "Added from @Mod" comments',
        '  --forced-pick=<policy>           Forced-mode pick: first, last, mod_priority (default: first)',
        '  --mod-batch-size=<n>             Number of mods to read metadata for in parallel (default: 10)',
        '  --log-level=<level>              Logging level: debug, info, warn, error (default: info)',
        '  --server-name=<name>             Server name (default: mission-config-merger)',
        '  --server-version=<version>       Server version (default: 1.0.0)',
        '  --help, -h                       Show this help message',
        '',
        'Examples:',
        '  tsx src/index.ts --mission-path="/srv/dayz/mpmissions/dayzOffline.chernarusplus" --server-path="/srv/dayz"',
        '  tsx src/index.ts --mission-path="./mission" --mod-dirs="./@Trader,./@Weapons" --skip-mods="@Trader"'
    ];
}
