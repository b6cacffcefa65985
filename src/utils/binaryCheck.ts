/**
 * Binary Availability Checker
 *
 * Verifies that the muxer binary can be executed before any stream is merged.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from './logging.js';
import { getErrorMessage } from './errorHandling.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * Pull the first version number out of a `-version` banner
 */
export function parseVersion(output: string): string {
  const match = output.match(/version\s+n?([\w.-]+)/i) ?? output.match(/(\d+(?:\.\d+)+)/);
  return match?.[1] ?? 'unknown';
}

/**
 * Check if a binary is available and get its version
 */
export async function checkBinary(
  binaryName: string,
  versionArgs: string[] = ['--version']
): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await execFilePromise(binaryName, versionArgs, {
      timeout: 5000,
    });

    const version = parseVersion(stdout || stderr);
    logger.debug(`✓ ${binaryName} found`, { service: 'binaryCheck', version });

    return { binary: binaryName, available: true, version };
  } catch (error) {
    logger.warn(`✗ ${binaryName} not found`, {
      service: 'binaryCheck',
      error: getErrorMessage(error),
    });
    return { binary: binaryName, available: false, error: getErrorMessage(error) };
  }
}
