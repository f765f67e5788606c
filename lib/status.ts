import { writeFile } from 'fs/promises';
import logger from './logger';

export interface RunStatus {
  success: boolean;
  message: string;
  at: Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatStatusTime(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function formatStatus(status: RunStatus): string {
  return [
    `Last run: ${formatStatusTime(status.at)}`,
    `Status: ${status.success ? 'SUCCESS' : 'FAILURE'}`,
    `Message: ${status.message}`,
    '',
  ].join('\n');
}

/**
 * Overwrite the status file with the outcome of the last cycle.
 * Failure to write is logged, never thrown: the loop keeps running.
 */
export async function writeStatusFile(file: string, status: RunStatus): Promise<boolean> {
  try {
    await writeFile(file, formatStatus(status), 'utf8');
    return true;
  } catch (err) {
    logger.error({ err, file }, 'failed to write status file');
    return false;
  }
}

export default writeStatusFile;
