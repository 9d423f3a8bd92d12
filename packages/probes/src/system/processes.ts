import { PROCESS_THREAD_THRESHOLD, ProcessInfo, type ThreadInfo } from '@ringwatch/shared';
import { formatMemory } from '../format.js';
import type { ExecFn } from '../types.js';

/** Trailing `=` suppresses headers; `user:32` keeps long names from being truncated */
const PROCESS_COLUMNS = 'pid=,nlwp=,user:32=,stat=,pcpu=,pmem=,comm=';
const THREAD_COLUMNS = 'tid=,user:32=,pri=,ni=,vsz=,rss=,stat=,pcpu=,pmem=,etime=,comm=';

/** Threads reported per process */
const MAX_THREADS = 10;

const STATE_NAMES: Record<string, string> = {
  R: 'Running',
  S: 'Sleeping',
  D: 'Waiting',
  Z: 'Zombie',
  T: 'Stopped',
  t: 'Tracing',
  X: 'Dead',
  I: 'Idle',
};

export interface ProcessRow {
  pid: number;
  threadCount: number;
  userName: string;
  status: string;
  cpuUsage: number;
  memoryUsage: number;
  name: string;
}

export interface ProcessContext {
  serverId: string;
  timestamp: number;
}

/** Readable state from the first `ps` STAT letter; modifiers such as `l` or `+` are dropped */
export function describeState(stat: string): string {
  const code = stat.charAt(0);
  return STATE_NAMES[code] ?? stat;
}

export function parsePsOutput(stdout: string): ProcessRow[] {
  const rows: ProcessRow[] = [];

  for (const line of stdout.split('\n')) {
    const [pidStr, nlwpStr, user, stat, pcpu, pmem, ...comm] = line.trim().split(/\s+/);
    if (!pidStr || !nlwpStr || !user || !stat || !pcpu || !pmem || comm.length === 0) continue;

    const pid = Number.parseInt(pidStr, 10);
    const threadCount = Number.parseInt(nlwpStr, 10);
    if (Number.isNaN(pid) || Number.isNaN(threadCount)) continue;

    rows.push({
      pid,
      threadCount,
      userName: user,
      status: describeState(stat),
      cpuUsage: Number(pcpu) || 0,
      memoryUsage: Number(pmem) || 0,
      name: comm.join(' '),
    });
  }

  return rows;
}

/** `ps` elapsed time (`[[dd-]hh:]mm:ss`) as `H:MM:SS` */
export function formatElapsed(etime: string): string {
  const [daysPart, clock] = etime.includes('-') ? etime.split('-', 2) : ['0', etime];
  const units = (clock ?? '').split(':').map((unit) => Number.parseInt(unit, 10) || 0);
  while (units.length < 3) units.unshift(0);
  const [hours = 0, minutes = 0, seconds = 0] = units;

  const totalHours = (Number.parseInt(daysPart ?? '0', 10) || 0) * 24 + hours;
  return `${totalHours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export function parseThreadOutput(stdout: string): ThreadInfo[] {
  const threads: ThreadInfo[] = [];

  for (const line of stdout.split('\n')) {
    if (threads.length >= MAX_THREADS) break;

    const [tid, user, pri, ni, vsz, rss, stat, pcpu, pmem, etime, ...comm] = line.trim().split(/\s+/);
    if (!tid || !user || !pri || !ni || !vsz || !rss || !stat || !pcpu || !pmem || !etime) continue;

    const threadId = Number.parseInt(tid, 10);
    if (Number.isNaN(threadId)) continue;

    threads.push({
      threadId,
      userName: user,
      priority: Number.parseInt(pri, 10) || 0,
      // real-time threads print `-`
      niceValue: Number.parseInt(ni, 10) || 0,
      virtualMemory: formatMemory(Number.parseInt(vsz, 10) || 0),
      residentMemory: formatMemory(Number.parseInt(rss, 10) || 0),
      sharedMemory: formatMemory(0),
      status: describeState(stat),
      cpuUsage: pcpu,
      memoryUsage: pmem,
      runtime: formatElapsed(etime),
      command: comm.join(' '),
    });
  }

  return threads;
}

async function readProcessRows(exec: ExecFn): Promise<ProcessRow[]> {
  return parsePsOutput(await exec('ps', ['-eo', PROCESS_COLUMNS]));
}

/** A process that exits between the listing and this call simply has no threads to show */
async function readThreads(exec: ExecFn, pid: number): Promise<ThreadInfo[]> {
  try {
    return parseThreadOutput(await exec('ps', ['-L', '-p', String(pid), '-o', THREAD_COLUMNS]));
  } catch {
    return [];
  }
}

async function describeProcess(
  exec: ExecFn,
  row: ProcessRow,
  context: ProcessContext,
): Promise<ProcessInfo> {
  return ProcessInfo.parse({
    serverId: context.serverId,
    pid: row.pid,
    name: row.name,
    userName: row.userName,
    status: row.status,
    timestamp: context.timestamp,
    trend: [
      {
        timestamp: context.timestamp,
        cpuUsage: row.cpuUsage,
        memoryUsage: row.memoryUsage,
        threadCount: row.threadCount,
      },
    ],
    threads: await readThreads(exec, row.pid),
  });
}

/** Processes with at least `minThreads` threads, in `ps` order */
export async function listProcesses(
  exec: ExecFn,
  context: ProcessContext,
  minThreads: number = PROCESS_THREAD_THRESHOLD,
): Promise<ProcessInfo[]> {
  const rows = (await readProcessRows(exec)).filter((row) => row.threadCount >= minThreads);
  const processes: ProcessInfo[] = [];
  for (const row of rows) {
    processes.push(await describeProcess(exec, row, context));
  }
  return processes;
}

/** The process with the most threads; the first in `ps` order wins a tie */
export async function findBusiestProcess(
  exec: ExecFn,
  context: ProcessContext,
): Promise<ProcessInfo | undefined> {
  let busiest: ProcessRow | undefined;
  for (const row of await readProcessRows(exec)) {
    if (busiest === undefined || row.threadCount > busiest.threadCount) {
      busiest = row;
    }
  }
  return busiest === undefined ? undefined : describeProcess(exec, busiest, context);
}
