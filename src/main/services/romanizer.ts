/**
 * Lyric romanization through an external script.
 *
 * The script is run as `<interpreter> <script> <text>` and prints
 * `{"result": "<romanized text>"}` on stdout.
 */

import { execFile } from 'child_process';
import type { Romanizer } from './collaborators';
import { LookupError, errorMessage } from './errors';
import type { Logger } from './logger';

export interface ScriptRomanizerOptions {
  interpreter: string;
  scriptPath: string;
  /** Process timeout in milliseconds */
  timeout?: number;
  logger?: Logger | null;
}

const DEFAULT_TIMEOUT = 30000;
/** stdout cap in bytes */
const MAX_BUFFER = 8 * 1024 * 1024;

/**
 * Extracts `result` from the script's JSON output, or null when the output
 * is not a JSON object with a string result.
 */
export function parseRomanizerOutput(stdout: string): string | null {
  let value: unknown;
  try {
    value = JSON.parse(stdout.trim());
  } catch {
    return null;
  }
  if (typeof value === 'object' && value !== null && 'result' in value && typeof value.result === 'string') {
    return value.result;
  }
  return null;
}

function run(
  file: string,
  args: readonly string[],
  timeout: number,
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { timeout, maxBuffer: MAX_BUFFER, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        reject(error);
        return;
      }
      resolve({ stdout, stderr });
    });
  });
}

export class ScriptRomanizer implements Romanizer {
  private readonly timeout: number;

  constructor(private readonly options: ScriptRomanizerOptions) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
  }

  /** Any failure (spawn, exit code, timeout, malformed output) yields null. */
  async romanize(text: string): Promise<string | null> {
    try {
      const { stdout } = await run(this.options.interpreter, [this.options.scriptPath, text], this.timeout);
      const result = parseRomanizerOutput(stdout);
      if (result === null) {
        this.options.logger?.warn('Romanizer returned malformed output', { step: 'romanize' });
      }
      return result;
    } catch (error: unknown) {
      this.options.logger?.logError(
        new LookupError(`Romanizer failed: ${errorMessage(error)}`, {
          step: 'romanize',
          cause: error instanceof Error ? error : undefined,
        }),
      );
      return null;
    }
  }

  /** Runs the script on a sample word and checks that it answers. */
  async isAvailable(): Promise<boolean> {
    return (await this.romanize('test')) !== null;
  }
}
