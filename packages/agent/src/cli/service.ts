import { execFileSync } from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import type { MonitorConfig } from '../config.js';
import { errorMessage } from '../logger.js';

export const UNIT_NAME = 'ringwatch-monitor';
export const UNIT_PATH = `/etc/systemd/system/${UNIT_NAME}.service`;

/** Runs a command synchronously and returns stdout; `input` is piped to stdin */
export type CommandRunner = (command: string, args: string[], input?: string) => string;

export interface ServiceResult {
  success: boolean;
  message: string;
}

export interface UnitAccount {
  username: string;
  homedir: string;
}

export interface UnitFileOptions {
  binary: string;
  account: UnitAccount;
  config: MonitorConfig;
}

export interface ServiceManagerDeps {
  run?: CommandRunner;
  platform?: NodeJS.Platform;
  unitExists?: () => boolean;
  account?: () => UnitAccount;
}

const runCommand: CommandRunner = (command, args, input) =>
  execFileSync(command, args, {
    encoding: 'utf-8',
    input,
    stdio: ['pipe', 'pipe', 'pipe'],
    timeout: 30_000,
  });

/** `monitor` flags that make the service run with exactly `config` */
export function monitorArgs(config: MonitorConfig): string[] {
  const args = [
    'monitor',
    '--state-dir',
    config.stateDir,
    '--output',
    config.outputFile,
    '--sec',
    String(config.intervalMs / 1000),
  ];
  if (config.serverPort !== undefined) {
    args.push('--server', String(config.serverPort));
  }
  return args;
}

/**
 * One ExecStart word. `%` and `$` are doubled so systemd leaves them alone; words
 * with whitespace, quotes or backslashes are double-quoted with C-style escapes.
 */
export function quoteUnitArg(arg: string): string {
  const literal = arg.replace(/[%$]/g, (c) => c + c);
  if (literal !== '' && !/[\s"'\\]/.test(literal)) return literal;
  return `"${literal.replace(/[\\"]/g, (c) => `\\${c}`)}"`;
}

export function renderUnitFile({ binary, account, config }: UnitFileOptions): string {
  const execStart = [binary, ...monitorArgs(config)].map(quoteUnitArg).join(' ');

  return `[Unit]
Description=Ringwatch kernel log monitor
After=local-fs.target

[Service]
Type=simple
User=${account.username}
Environment=HOME=${account.homedir}
WorkingDirectory=${account.homedir}
ExecStart=${execStart}
KillSignal=SIGTERM
Restart=on-failure
RestartSec=5
SyslogIdentifier=${UNIT_NAME}

[Install]
WantedBy=multi-user.target
`;
}

/** Installs and drives the `ringwatch-monitor` systemd unit through sudo and systemctl */
export class ServiceManager {
  private readonly run: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly unitExists: () => boolean;
  private readonly account: () => UnitAccount;

  constructor(deps: ServiceManagerDeps = {}) {
    this.run = deps.run ?? runCommand;
    this.platform = deps.platform ?? process.platform;
    this.unitExists = deps.unitExists ?? (() => fs.existsSync(UNIT_PATH));
    this.account = deps.account ?? (() => os.userInfo());
  }

  isInstalled(): boolean {
    return this.platform === 'linux' && this.unitExists();
  }

  status(): string {
    if (this.platform !== 'linux') return 'unsupported';
    if (!this.unitExists()) return 'not-installed';
    try {
      return this.run('systemctl', ['is-active', UNIT_NAME]).trim();
    } catch {
      // is-active exits non-zero for every state but active
      return 'inactive';
    }
  }

  /** Write the unit for `config`, then enable and start it */
  install(config: MonitorConfig): ServiceResult {
    if (this.platform !== 'linux') return unsupported();

    try {
      const binary = this.run('which', ['ringwatch']).trim();
      const unit = renderUnitFile({ binary, account: this.account(), config });
      this.run('sudo', ['tee', UNIT_PATH], unit);
      this.run('sudo', ['systemctl', 'daemon-reload']);
      this.run('sudo', ['systemctl', 'enable', '--now', UNIT_NAME]);
    } catch (err: unknown) {
      return { success: false, message: `Failed to install service: ${errorMessage(err)}` };
    }

    return {
      success: true,
      message: `${UNIT_NAME} installed and started; snapshots go to ${config.outputFile}`,
    };
  }

  uninstall(): ServiceResult {
    if (this.platform !== 'linux') return unsupported();
    if (!this.unitExists()) return { success: false, message: 'Service is not installed.' };

    try {
      this.run('sudo', ['systemctl', 'disable', '--now', UNIT_NAME]);
      this.run('sudo', ['rm', '-f', UNIT_PATH]);
      this.run('sudo', ['systemctl', 'daemon-reload']);
    } catch (err: unknown) {
      return { success: false, message: `Failed to uninstall service: ${errorMessage(err)}` };
    }
    return { success: true, message: `${UNIT_NAME} removed.` };
  }

  stop(): ServiceResult {
    if (this.platform !== 'linux') return unsupported();

    try {
      this.run('sudo', ['systemctl', 'stop', UNIT_NAME]);
    } catch (err: unknown) {
      return { success: false, message: `Could not stop ${UNIT_NAME}: ${errorMessage(err)}` };
    }
    return { success: true, message: `Stopped ${UNIT_NAME}.` };
  }
}

function unsupported(): ServiceResult {
  return { success: false, message: 'systemd services are only supported on Linux.' };
}
