/**
 * Flat-file persistence for run-command -save
 */

import fs from 'node:fs';
import path from 'node:path';
import { formatFileTimestamp } from '@devsim/mock-device';
import { CliErrorCode, wrapError } from './errors.js';

/**
 * `<device_ip>_<command with spaces as underscores>_<YYYYMMDD_HHMMSS>.txt`
 *
 * @example
 * buildOutputFilename('10.0.0.1', 'show version', new Date(2024, 2, 5, 14, 7, 9));
 * // '10.0.0.1_show_version_20240305_140709.txt'
 */
export function buildOutputFilename(deviceIp: string, command: string, at: Date): string {
  return `${deviceIp}_${command.replace(/ /g, '_')}_${formatFileTimestamp(at)}.txt`;
}

/**
 * Writes `content` to `saveDir/filename` as UTF-8 in a single blocking call.
 * Not atomic, no retry.
 *
 * @returns The path written
 * @throws CliError with code SAVE_FAILED carrying the underlying message
 */
export function saveOutput(saveDir: string, filename: string, content: string): string {
  const filePath = path.join(saveDir, filename);

  try {
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw wrapError(error, CliErrorCode.SAVE_FAILED, { path: filePath });
  }

  return filePath;
}
