/**
 * Process helpers shared by the store lock and the daemon manager.
 */

import { existsSync, readFileSync } from 'fs';

/**
 * Check if a specific PID is running
 */
export function isProcessRunning(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    // Signal 0 checks existence without delivering anything
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * Read a pid file. Returns null when the file is missing or does not hold a pid.
 */
export function readPidFile(path: string): number | null {
  if (!existsSync(path)) return null;
  const pid = parseInt(readFileSync(path, 'utf-8').trim(), 10);
  return Number.isNaN(pid) ? null : pid;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
