/**
 * Command-line handling for the items-api binary
 */

import { loadConfig, type AppConfig } from './config.js';
import { ApiServer } from './server/index.js';
import { SupabaseItemStore } from './storage/index.js';

// ============================================
// CLI Arguments
// ============================================

export interface CliArgs {
  command: 'serve' | 'help';
  port?: number;
  host?: string;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { command: 'serve' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'serve' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      const port = Number.parseInt(argv[++i] ?? '', 10);
      if (Number.isNaN(port)) {
        throw new Error(`Invalid value for ${arg}`);
      }
      result.port = port;
    } else if (arg === '--host') {
      const host = argv[++i];
      if (!host) {
        throw new Error('Missing value for --host');
      }
      result.host = host;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

export function printHelp(): void {
  console.log(`
Items API - CRUD over a hosted items table

Usage: items-api [command] [options]

Commands:
  serve     Start the HTTP server (default)
  help      Show this help message

Options:
  -p, --port <port>   Listen port (default: $PORT or 8000)
  --host <host>       Listen host (default: $HOST or 127.0.0.1)
  -h, --help          Show help

Environment:
  SUPABASE_URL        Store endpoint URL (required)
  SUPABASE_KEY        Store access key (required)
  ITEMS_TABLE         Table name (default: items)
  CORS_ORIGINS        Comma-separated allowed origins
  LOG_REQUESTS        Set to "false" to silence request logs
`);
}

// ============================================
// Commands
// ============================================

export function applyOverrides(config: AppConfig, args: CliArgs): AppConfig {
  return {
    ...config,
    port: args.port ?? config.port,
    host: args.host ?? config.host,
  };
}

async function runServe(config: AppConfig): Promise<void> {
  const store = new SupabaseItemStore({
    url: config.supabaseUrl,
    key: config.supabaseKey,
    table: config.table,
  });

  const server = new ApiServer(store, {
    port: config.port,
    host: config.host,
    corsOrigins: config.corsOrigins,
    logRequests: config.logRequests,
  });

  await server.start();
  console.log(`
Items API running!

Table: ${config.table}

Endpoints:
  GET    /                  - List items
  GET    /items/?name=&price=&count=&category=  - Filter items
  POST   /                  - Add an item
  PUT    /update/:item_id   - Update supplied fields
  DELETE /delete/:item_id   - Delete an item
  GET    /health            - Health check

Press Ctrl+C to stop
`);

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// ============================================
// Main
// ============================================

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const args = parseArgs(argv);

  switch (args.command) {
    case 'help':
      printHelp();
      break;

    case 'serve':
      await runServe(applyOverrides(loadConfig(env), args));
      break;
  }
}
