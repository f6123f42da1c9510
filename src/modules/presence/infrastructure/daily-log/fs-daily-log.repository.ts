import { Inject, Injectable } from '@nestjs/common';
import fs from 'node:fs/promises';
import path from 'node:path';
import { IDailyLogRepository } from '../../domain/daily-log/daily-log.repository';
import {
  DailyLogReadError,
  DailyLogWriteError,
} from '../../domain/daily-log/daily-log.errors';
import { PRESENCE_TOKENS } from '../../presence.tokens';

const LOG_FILE_EXTENSION = '.txt';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One UTF-8 file per day, `<logDirectory>/YYYY-MM-DD.txt`. Appends rely on
 * the OS append mode; a single process is assumed to own the directory.
 */
@Injectable()
export class FsDailyLogRepository implements IDailyLogRepository {
  constructor(
    @Inject(PRESENCE_TOKENS.LOG_DIRECTORY)
    private readonly logDirectory: string,
  ) {}

  pathFor(logDate: string): string {
    return path.join(this.logDirectory, `${logDate}${LOG_FILE_EXTENSION}`);
  }

  async append(logDate: string, line: string): Promise<void> {
    try {
      await fs.mkdir(this.logDirectory, { recursive: true });
      await fs.appendFile(
        this.pathFor(logDate),
        `${line.replace(/\n+$/, '')}\n`,
        'utf8',
      );
    } catch (error) {
      throw new DailyLogWriteError(logDate, error);
    }
  }

  async readLines(logDate: string): Promise<string[] | null> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(logDate), 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new DailyLogReadError(logDate, error);
    }

    const lines = content.split(/\r?\n/);
    // the terminator of the last line leaves one empty entry
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }
}
