import psList from "ps-list";

/**
 * Liveness checks the engine needs from the operating system.
 */
export interface ProcessProbe {
  /** Whether a process with this pid exists. */
  isAlive(pid: number): boolean;
  /** Whether any worker process matching the family pattern is running. */
  isFamilyRunning(): Promise<boolean>;
}

/**
 * Signal 0 checks existence without delivering anything. EPERM means the
 * process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
}

type PsProcess = Awaited<ReturnType<typeof psList>>[number];

export type ProcessEntry = Pick<PsProcess, "pid" | "ppid" | "name" | "cmd">;

function executableName(value: string): string {
  const base = value.split(/[\\/]/).pop() ?? value;
  return base.toLowerCase().replace(/\.(exe|cmd|js|mjs|cjs)$/, "");
}

/**
 * Whether a process is the worker itself: its executable is named after
 * `pattern`, or it is a script launcher (`node /usr/bin/claude ...`) whose
 * script is. Arguments further along the command line never count.
 */
export function isFamilyProcess(proc: Pick<ProcessEntry, "name" | "cmd">, pattern: string): boolean {
  const target = pattern.toLowerCase();
  if (executableName(proc.name) === target) return true;
  const argv = proc.cmd?.trim().split(/\s+/).slice(0, 2) ?? [];
  return argv.some((arg) => arg !== "" && executableName(arg) === target);
}

function ancestorsOf(processes: readonly ProcessEntry[], pid: number): Set<number> {
  const parents = new Map(processes.map((p) => [p.pid, p.ppid]));
  const chain = new Set<number>();
  let current: number | undefined = pid;
  while (current !== undefined && current > 0 && !chain.has(current)) {
    chain.add(current);
    current = parents.get(current);
  }
  return chain;
}

/**
 * Search a process list for the worker family. The daemon and the processes
 * that launched it are skipped.
 */
export function familyRunningIn(
  processes: readonly ProcessEntry[],
  pattern: string,
  ownPid: number = process.pid,
): boolean {
  const excluded = ancestorsOf(processes, ownPid);
  return processes.some((proc) => !excluded.has(proc.pid) && isFamilyProcess(proc, pattern));
}

export async function isProcessFamilyRunning(pattern: string): Promise<boolean> {
  return familyRunningIn(await psList(), pattern);
}

export function createProcessProbe(pattern: string): ProcessProbe {
  return {
    isAlive: isProcessAlive,
    isFamilyRunning: () => isProcessFamilyRunning(pattern),
  };
}
