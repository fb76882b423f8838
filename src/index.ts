#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AppConfig, parseArgs, usage } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { setLogLevel } from './logger.js';
import { MergeSession } from './MergeSession.js';
import { ToolHandlers } from './ToolHandlers.js';
import { pathExists } from './fileSystem.js';

class MissionMergeServer {
    private server: Server;
    private session: MergeSession;
    private toolHandlers: ToolHandlers;
    private config: AppConfig;

    constructor(config: AppConfig) {
        this.config = config;
        this.session = new MergeSession(config);
        this.toolHandlers = new ToolHandlers(this.session);

        this.server = new Server(
            {
                name: config.serverName,
                version: config.serverVersion,
                description: config.serverDescription
            },
            {
                capabilities: {
                    tools: {}
                }
            }
        );

        this.toolHandlers.setupTools(this.server);
    }

    async start(): Promise<void> {
        console.error('='.repeat(60));
        console.error(`${this.config.serverName.toUpperCase()} v${this.config.serverVersion}`);
        console.error('='.repeat(60));

        if (!(await pathExists(this.config.missionPath))) {
            throw new ConfigError(`Mission folder not found: ${this.config.missionPath}`);
        }

        console.error('\nScanning mods...');
        const report = await this.session.scan();
        const review = report.mods.filter(mod => mod.needsManualReview).length;

        console.error('\n' + '='.repeat(60));
        console.error('Summary:');
        console.error(`  • Mission: ${this.config.missionPath}`);
        console.error(`  • Mods with config files: ${report.mods.length}`);
        console.error(`  • Files scanned: ${report.filesScanned}`);
        console.error(`  • Mods needing manual review: ${review}`);
        console.error('='.repeat(60));

        console.error('\nStarting MCP server...');
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        console.error('Server ready!\n');
    }
}

// ============================================================================
// Entry Point
// ============================================================================

let config: AppConfig;
try {
    config = parseArgs(process.argv.slice(2));
} catch (error) {
    console.error(`${describeError(error)}\n`);
    console.error(usage().join('\n'));
    process.exit(1);
}

if (config.help) {
    console.error(usage().join('\n'));
    process.exit(0);
}

setLogLevel(config.logLevel);
const server = new MissionMergeServer(config);

process.on('SIGINT', () => {
    console.error('\nShutting down server...');
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.error('\nShutting down server...');
    process.exit(0);
});

server.start().catch(error => {
    console.error('Failed to start server:', describeError(error));
    process.exit(1);
});
