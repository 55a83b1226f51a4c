/**
 * Plain-text output of distributions for external plotting tools
 */

import { writeFileSync } from 'node:fs';
import { StatsError, ErrorCode } from '../errors';

/**
 * Anything with a synchronous string `write`, e.g. process.stdout
 */
export interface TextSink {
  write(chunk: string): unknown;
}

export function writeToSink(out: TextSink, text: string): void {
  try {
    out.write(text);
  } catch (error) {
    throw new StatsError(ErrorCode.IO_ERROR, 'Failed to write distribution dump', {}, error);
  }
}

export function writeTextFile(path: string, text: string): void {
  try {
    writeFileSync(path, text, 'utf8');
  } catch (error) {
    throw new StatsError(ErrorCode.IO_ERROR, `Failed to write distribution dump to ${path}`, { path }, error);
  }
}
