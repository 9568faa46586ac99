/**
 * Process helpers - run a binary to completion and locate executables on PATH.
 */

import { spawn, type ChildProcess } from 'child_process';
import { access } from 'fs/promises';
import { constants } from 'fs';
import { delimiter, isAbsolute, join, resolve, sep } from 'path';
import { errorMessage } from '@tailwarden/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** Exit code reported when a command is killed for running too long */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when the binary could not be started */
export const SPAWN_FAILED_EXIT_CODE = 127;

// ═══════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Run `file args...` and collect its output. Never rejects: spawn failures
 * and timeouts are reported through the exit code.
 */
export function runCommand(file: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolvePromise) => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      resolvePromise(result);
    };

    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env },
      });
    } catch (error) {
      finish({ code: SPAWN_FAILED_EXIT_CODE, stdout: '', stderr: errorMessage(error) });
      return;
    }

    timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish({
        code: TIMEOUT_EXIT_CODE,
        stdout,
        stderr: `Timeout: ${[file, ...args].join(' ')} did not finish within ${timeoutMs} ms`,
      });
    }, timeoutMs);

    child.stdout?.on('data', (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });
    child.stderr?.on('data', (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on('error', (error: Error) => {
      finish({ code: SPAWN_FAILED_EXIT_CODE, stdout, stderr: error.message });
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      finish({
        code: code ?? 1,
        stdout,
        stderr: stderr || (signal ? `terminated by ${signal}` : ''),
      });
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// LOOKUP
// ═══════════════════════════════════════════════════════════════════════════

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve an executable the way a shell would: paths are checked as given,
 * bare names are searched on PATH. Returns null when nothing executable is found.
 */
export async function findExecutable(
  executable: string,
  searchPath: string = process.env.PATH ?? '',
): Promise<string | null> {
  if (isAbsolute(executable) || executable.includes(sep)) {
    const candidate = resolve(executable);
    return (await isExecutable(candidate)) ? candidate : null;
  }

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, executable);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}
