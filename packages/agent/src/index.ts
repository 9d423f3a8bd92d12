#!/usr/bin/env node

import type http from 'node:http';
import { createHostCollaborators } from '@ringwatch/probes';
import { EMPTY_CHECKPOINT } from '@ringwatch/shared';
import { hasFlag, parseMonitorOverrides, parseSince } from './cli/args.js';
import { selectKernelLines } from './cli/dmesg.js';
import { ServiceManager, UNIT_NAME } from './cli/service.js';
import {
  ConfigError,
  type MonitorConfig,
  ensureStateDir,
  getCheckpointPath,
  readPidFile,
  removePidFile,
  resolveConfig,
  stopRunningMonitor,
  writePidFile,
} from './config.js';
import { errorMessage, logger } from './logger.js';
import { FileCheckpointStore } from './runtime/checkpoint-store.js';
import { Monitor } from './runtime/monitor.js';
import { FileSnapshotSink } from './runtime/publisher.js';
import { startSnapshotServer } from './server.js';
import { VERSION } from './version.js';

const args = process.argv.slice(2);
const first = args[0];
const command = first === undefined || first.startsWith('--') ? 'monitor' : first;

function printUsage(): void {
  console.log('Usage: ringwatch [command] [options]');
  console.log('');
  console.log('Commands:');
  console.log('  monitor   Poll and publish snapshots until stopped (default)');
  console.log('  dmesg     Print kernel log lines, optionally only those after --since');
  console.log('  metrics   Print CPU, memory, disk, io and network usage as JSON');
  console.log('  process   Print processes with 20+ threads as JSON (--check: busiest only)');
  console.log('  status    Show checkpoint and file locations');
  console.log('  reset     Forget the kernel log checkpoint');
  console.log('  stop      Stop a background monitor');
  console.log('  service   Manage systemd service (install, uninstall, status)');
  console.log('            install takes the monitor options below');
  console.log('');
  console.log('Monitor options:');
  console.log('  --sec <n>          Poll interval in seconds (default 5)');
  console.log('  --min <n>          Poll interval in minutes, added to --sec');
  console.log('  --once             Run a single cycle and exit');
  console.log('  --output <file>    Snapshot file (default ./continuous_monitor.json)');
  console.log('  --state-dir <dir>  Checkpoint directory (default ~/.ringwatch)');
  console.log('  --server <port>    Also serve the snapshot at /api/getAllData');
  console.log('');
  console.log('Dmesg options:');
  console.log('  --since <seconds>  Only lines after this many seconds since boot');
}

function loadConfigOrExit(): MonitorConfig {
  try {
    return resolveConfig(parseMonitorOverrides(args));
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function cmdMonitor(): Promise<void> {
  const config = loadConfigOrExit();
  ensureStateDir(config.stateDir);

  const host = createHostCollaborators();
  const monitor = new Monitor({
    store: new FileCheckpointStore(getCheckpointPath(config.stateDir)),
    sink: new FileSnapshotSink(config.outputFile),
    bootIds: host,
    logs: host,
    host,
    intervalMs: config.intervalMs,
  });

  if (hasFlag(args, '--once')) {
    await monitor.runCycle();
    return;
  }

  let server: http.Server | undefined;
  if (config.serverPort !== undefined) {
    server = startSnapshotServer(config.serverPort, config.outputFile);
  }

  const controller = new AbortController();
  const shutdown = () => {
    logger.info('Shutting down after the current cycle');
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  writePidFile(config.stateDir, process.pid);
  logger.info(
    { version: VERSION, output: config.outputFile, intervalMs: config.intervalMs },
    'Starting continuous monitoring',
  );

  try {
    await monitor.run({ signal: controller.signal });
  } finally {
    removePidFile(config.stateDir);
    server?.close();
  }
}

async function cmdDmesg(): Promise<void> {
  let since: number | undefined;
  try {
    since = parseSince(args);
  } catch (err: unknown) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  const batch = await createHostCollaborators().readLogs();
  const { lines, offset } = selectKernelLines(batch, since);
  for (const line of lines) {
    console.log(line);
  }
  if (offset !== undefined) {
    console.error(`Last timestamp: ${offset.toFixed(6)}`);
  }
}

async function cmdMetrics(): Promise<void> {
  const metrics = await createHostCollaborators().collectMetrics();
  console.log(JSON.stringify([metrics], null, 2));
}

async function cmdProcess(): Promise<void> {
  const host = createHostCollaborators();
  if (!hasFlag(args, '--check')) {
    console.log(JSON.stringify(await host.listProcesses(), null, 2));
    return;
  }

  const busiest = await host.findBusiestProcess();
  if (busiest === undefined) {
    fail('No processes found');
  }
  console.log(JSON.stringify(busiest, null, 2));
}

function cmdStatus(): void {
  const config = loadConfigOrExit();
  const store = new FileCheckpointStore(getCheckpointPath(config.stateDir));
  const checkpoint = store.load();
  const pid = readPidFile(config.stateDir);

  console.log(`Ringwatch v${VERSION}`);
  console.log(`  Monitor:     ${pid === undefined ? 'not running' : `running (PID ${pid})`}`);
  console.log(`  Checkpoint:  ${store.path}`);
  console.log(`  Boot ID:     ${checkpoint.bootId || '(none)'}`);
  console.log(`  Log offset:  ${checkpoint.lastLogOffset.toFixed(6)}`);
  console.log(`  Output:      ${config.outputFile}`);
}

function cmdReset(): void {
  const config = loadConfigOrExit();
  ensureStateDir(config.stateDir);
  const store = new FileCheckpointStore(getCheckpointPath(config.stateDir));
  store.save({ ...EMPTY_CHECKPOINT });
  console.log('Checkpoint cleared. The next cycle reports the whole kernel log.');
}

function cmdStop(): void {
  const service = new ServiceManager();
  if (service.isInstalled() && service.status() === 'active') {
    const result = service.stop();
    console.log(result.message);
    if (!result.success) process.exit(1);
    return;
  }

  const config = loadConfigOrExit();
  if (stopRunningMonitor(config.stateDir)) {
    console.log('Monitor stopped.');
  } else {
    console.log('No running monitor found.');
  }
}

function handleServiceCommand(subArgs: string[]): void {
  const sub = subArgs[0];
  const service = new ServiceManager();

  switch (sub) {
    case 'install': {
      const result = service.install(loadConfigOrExit());
      console.log(result.message);
      if (!result.success) process.exit(1);
      break;
    }
    case 'uninstall': {
      const result = service.uninstall();
      console.log(result.message);
      if (!result.success) process.exit(1);
      break;
    }
    case 'status': {
      console.log(`${UNIT_NAME} service: ${service.status()}`);
      break;
    }
    default:
      console.log('Usage: ringwatch service <command>');
      console.log('');
      console.log('Commands:');
      console.log('  install    Install systemd service (starts on boot) with the given monitor options');
      console.log('  uninstall  Remove systemd service');
      console.log('  status     Show service status');
      if (sub) {
        console.error(`\nUnknown subcommand: ${sub}`);
        process.exit(1);
      }
      break;
  }
}

function fail(err: unknown): never {
  console.error(errorMessage(err));
  process.exit(1);
}

if (hasFlag(args, '--version') || hasFlag(args, '-v')) {
  console.log(VERSION);
  process.exit(0);
}

if (hasFlag(args, '--help') || hasFlag(args, '-h')) {
  printUsage();
  process.exit(0);
}

switch (command) {
  case 'monitor':
    cmdMonitor().catch(fail);
    break;
  case 'dmesg':
    cmdDmesg().catch((err: unknown) => fail(`Cannot read kernel log: ${errorMessage(err)}`));
    break;
  case 'metrics':
    cmdMetrics().catch((err: unknown) => fail(`Cannot collect metrics: ${errorMessage(err)}`));
    break;
  case 'process':
    cmdProcess().catch((err: unknown) => fail(`Cannot list processes: ${errorMessage(err)}`));
    break;
  case 'status':
    cmdStatus();
    break;
  case 'reset':
    try {
      cmdReset();
    } catch (err: unknown) {
      fail(err);
    }
    break;
  case 'stop':
    try {
      cmdStop();
    } catch (err: unknown) {
      fail(err);
    }
    break;
  case 'service':
    handleServiceCommand(args.slice(1));
    break;
  default:
    printUsage();
    console.error(`\nUnknown command: ${command}`);
    process.exit(1);
}

