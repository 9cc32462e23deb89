import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';

import { delay } from '../utils.js';

const execFileAsync = promisify(execFile);

const POLL_MS = 100;

export interface TerminationReport {
  // Root last; descendants in discovery order.
  signalled: number[];
  killed: number[];
  survivors: number[];
}

const isGone = (error: unknown): boolean => error instanceof Error && 'code' in error && error.code === 'ESRCH';

const alive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !isGone(error);
  }
};

async function procChildren(pid: number): Promise<number[]> {
  const raw = await readFile(`/proc/${String(pid)}/task/${String(pid)}/children`, 'utf8');
  return raw.trim().split(/\s+/).map(Number).filter((child) => Number.isInteger(child) && child > 0);
}

async function psParentTable(): Promise<Map<number, number[]>> {
  const table = new Map<number, number[]>();
  const { stdout } = await execFileAsync('ps', ['-A', '-o', 'pid=,ppid=']);
  stdout.split('\n').forEach((line) => {
    const [child, parent] = line.trim().split(/\s+/).map(Number);
    if (!Number.isInteger(child) || !Number.isInteger(parent)) return;
    table.set(parent, [...(table.get(parent) ?? []), child]);
  });
  return table;
}

/** Every process below `rootPid`, breadth first. Best effort: an unreadable table yields fewer pids. */
async function descendantsOf(rootPid: number): Promise<number[]> {
  let table: Map<number, number[]> | undefined;
  const childrenOf = async (pid: number): Promise<number[]> => {
    if (process.platform === 'linux') {
      try {
        return await procChildren(pid);
      } catch {
        // /proc/<pid>/task/<pid>/children needs CONFIG_PROC_CHILDREN; fall back to ps.
      }
    }
    table ??= await psParentTable().catch(() => new Map<number, number[]>());
    return table.get(pid) ?? [];
  };
  const found: number[] = [];
  const frontier = [rootPid];
  // eslint-disable-next-line functional/no-loop-statements -- breadth-first walk
  for (let pid = frontier.shift(); pid !== undefined; pid = frontier.shift()) {
    const children = (await childrenOf(pid)).filter((child) => !found.includes(child));
    found.push(...children);
    frontier.push(...children);
  }
  return found;
}

/**
 * Stops a provider process and everything it spawned. Descendants get SIGTERM
 * before the root; whatever is still alive after `graceMs` gets SIGKILL.
 */
export async function terminateProcessTree(
  rootPid: number,
  graceMs: number,
  onProblem: (message: string) => void = () => undefined
): Promise<TerminationReport> {
  if (!Number.isInteger(rootPid) || rootPid <= 0) return { signalled: [], killed: [], survivors: [] };
  const signal = (pid: number, name: NodeJS.Signals): boolean => {
    try {
      process.kill(pid, name);
      return true;
    } catch (error) {
      if (!isGone(error)) onProblem(`cannot send ${name} to pid ${String(pid)}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  };

  const targets = [...(process.platform === 'win32' ? [] : await descendantsOf(rootPid)), rootPid];
  const signalled = targets.filter((pid) => signal(pid, 'SIGTERM'));

  const deadline = Date.now() + graceMs;
  // eslint-disable-next-line functional/no-loop-statements -- poll until the grace period ends
  while (signalled.some(alive) && Date.now() < deadline) {
    await delay(Math.min(POLL_MS, Math.max(deadline - Date.now(), 1)));
  }

  const killed = signalled.filter((pid) => alive(pid) && signal(pid, 'SIGKILL'));
  return { signalled, killed, survivors: signalled.filter(alive) };
}
