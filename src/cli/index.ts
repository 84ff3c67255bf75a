#!/usr/bin/env node
/**
 * Relay - CLI Entry Point
 *
 * Usage:
 *   relay serve [options]      - Start the relay server
 *   relay executor [options]   - Start the executor poll loop
 *   relay submit [options]     - Enqueue a command (and optionally wait for its result)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { loadRelayConfig } from '../config';
import { describeError } from '../errors';
import { RelayLogger } from '../logging';
import { FileQueueStore } from '../queue/file-queue-store';
import { HttpQueueStore } from '../queue/http-queue-store';
import { QueuePoller } from '../queue/queue-poller';
import { Dispatcher, buildActionContext } from '../executor/dispatcher';
import { SpawnProcessRunner } from '../executor/process-runner';
import { decodeCommand } from '../executor/command-codec';
import { CoordinatorClient } from '../coordinator/coordinator-client';
import { WebServer } from '../web/server';
import {
  CliUsageError,
  ExecutorArguments,
  ServeArguments,
  SubmitArguments,
  parseExecutorArgs,
  parseServeArgs,
  parseSubmitArgs,
} from './arguments';

/**
 * Help text
 */
const HELP_TEXT = `
Relay - remote task queue

Usage:
  relay <command> [options]

Commands:
  serve                  Start the relay server (Queue Store over HTTP + dashboard)
  executor               Poll the relay server and run commands in the sandbox
  submit                 Enqueue a command

Serve Options:
  --port <number>        Port (default: 8000)
  --host <host>          Bind host (default: 0.0.0.0)
  --storage <dir>        Storage root holding command/ and result/ (default: ./storage)
  --token <token>        API token (or RELAY_API_TOKEN)
  --config <path>        JSON config file (or RELAY_CONFIG)

Executor Options:
  --server <url>         Relay server URL (default: http://127.0.0.1:8000)
  --token <token>        API token (or RELAY_API_TOKEN)
  --sandbox <dir>        Sandbox root (default: ./project)
  --interval <ms>        Poll interval (default: 1000)
  --config <path>        JSON config file (or RELAY_CONFIG)

Submit Options:
  --action <verb>        install_pip, uninstall_pip, create_file, delete_file,
                         update_file, read_file, execute, list_executor_dir
  --file <path>          Target file, relative to the sandbox root
  --package <name>       Package for install_pip / uninstall_pip
  --range <spec>         'start-end', a line number, 'append' or '0-999999'
  --content <text>       File content
  --content-file <path>  Read file content from a local file
  --args <args>          Arguments for execute (whitespace separated)
  --wait                 Wait for the result, print it and delete it
  --timeout <seconds>    Wait limit (default: 60)
  --server, --token, --config as for executor

General Options:
  --help, -h             Show this help message
  --version, -v          Show version

Examples:
  relay serve --port 8000 --token test-secret
  relay executor --server http://127.0.0.1:8000 --token test-secret --sandbox ./project
  relay submit --action read_file --file main.py --range 1-20 --wait
`;

/**
 * Version - read from package.json
 */
function readVersion(): string {
  try {
    const parsed: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8')
    );
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.error(`[CLI] Could not read version: ${describeError(error)}`);
  }
  return 'unknown';
}

/**
 * Stop cleanly on SIGINT/SIGTERM
 */
function onShutdown(stop: () => Promise<void>, logger: RelayLogger): void {
  const shutdown = (): void => {
    logger.info('SERVER', 'Shutting down...');
    stop()
      .then(() => process.exit(0))
      .catch(error => {
        console.error(`Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function startServer(args: ServeArguments): Promise<void> {
  const config = loadRelayConfig({ configPath: args.configPath, overrides: args.overrides });
  const logger = new RelayLogger();

  const queueStore = new FileQueueStore({ storageDir: config.storageDir });
  queueStore.ensureDirectories();
  logger.info('CONFIG', `Storage root: ${config.storageDir}`);

  const server = new WebServer({
    port: config.port,
    host: config.host,
    queueStore,
    apiToken: config.apiToken,
    staticDir: config.staticDir,
    logger,
  });

  await server.start();
  logger.info('SERVER', `Dashboard at ${server.getUrl()}/ui/`);
  onShutdown(() => server.stop(), logger);
}

async function startExecutor(args: ExecutorArguments): Promise<void> {
  const config = loadRelayConfig({ configPath: args.configPath, overrides: args.overrides });
  const logger = new RelayLogger();

  fs.mkdirSync(config.sandboxDir, { recursive: true });
  logger.info('CONFIG', `Sandbox root: ${config.sandboxDir}`);
  logger.info('CONFIG', `Relay server: ${config.serverUrl}`);

  const store = new HttpQueueStore({
    serverUrl: config.serverUrl,
    apiToken: config.apiToken,
    listTimeoutMs: config.listTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  const dispatcher = new Dispatcher({
    store,
    context: buildActionContext(config, new SpawnProcessRunner()),
    logger,
  });
  const poller = new QueuePoller(store, dispatcher, logger, { pollIntervalMs: config.pollIntervalMs });

  onShutdown(() => poller.stop(), logger);
  await poller.start();
}

async function submitCommand(args: SubmitArguments): Promise<void> {
  const config = loadRelayConfig({ configPath: args.configPath, overrides: args.overrides });
  const command = decodeCommand(args.action, args.document);

  const client = new CoordinatorClient({
    store: new HttpQueueStore({
      serverUrl: config.serverUrl,
      apiToken: config.apiToken,
      listTimeoutMs: config.listTimeoutMs,
      requestTimeoutMs: config.requestTimeoutMs,
    }),
  });

  const filename = await client.submit(command);
  if (!args.wait) {
    console.log(filename);
    return;
  }

  const result = await client.waitForResult(filename, { timeoutMs: args.timeoutMs });
  process.stdout.write(yaml.dump(result, { lineWidth: -1 }));
  if (!result.success) {
    process.exitCode = 1;
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(readVersion());
    process.exit(0);
  }

  const command = args[0];
  const restArgs = args.slice(1);

  try {
    switch (command) {
      case 'serve':
        await startServer(parseServeArgs(restArgs));
        break;

      case 'executor':
        await startExecutor(parseExecutorArgs(restArgs));
        break;

      case 'submit':
        await submitCommand(parseSubmitArgs(restArgs));
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.log(HELP_TEXT);
        process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    if (err instanceof CliUsageError) {
      console.error('Run "relay --help" for usage.');
    }
    process.exit(1);
  }
}

main().catch(err => {
  console.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
