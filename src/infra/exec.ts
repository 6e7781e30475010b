import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../logger.js';

const execFileAsync = promisify(execFile);

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

/** Runs an external command-line tool (soffice, pdftoppm, pdftotext). */
export type ToolRunner = (command: string, args: readonly string[], options?: { cwd?: string }) => Promise<ToolOutput>;

const MAX_BUFFER = 64 * 1024 * 1024;

export const runTool: ToolRunner = async (command, args, options) => {
  logger.debug({ command, args }, 'Running external tool');
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      cwd: options?.cwd,
      maxBuffer: MAX_BUFFER,
      encoding: 'utf8',
    });
    return { stdout, stderr };
  } catch (err) {
    throw new Error(`${command} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
};
