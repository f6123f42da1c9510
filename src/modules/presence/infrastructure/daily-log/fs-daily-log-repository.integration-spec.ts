import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FsDailyLogRepository } from './fs-daily-log.repository';
import {
  DailyLogReadError,
  DailyLogWriteError,
} from '../../domain/daily-log/daily-log.errors';

describe('FsDailyLogRepository Integration Tests', () => {
  let tmpDir: string;
  let logDirectory: string;
  let repository: FsDailyLogRepository;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'presence-log-'));
    logDirectory = path.join(tmpDir, 'nested', 'logs');
    repository = new FsDailyLogRepository(logDirectory);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('append()', () => {
    it('should create the directory and file on first append', async () => {
      await repository.append('2023-03-21', 'first line');

      const content = await fs.readFile(
        path.join(logDirectory, '2023-03-21.txt'),
        'utf8',
      );
      expect(content).toBe('first line\n');
    });

    it('should append lines in order, one per line', async () => {
      await repository.append('2023-03-21', 'one');
      await repository.append('2023-03-21', 'two\n');

      const content = await fs.readFile(repository.pathFor('2023-03-21'), 'utf8');
      expect(content).toBe('one\ntwo\n');
    });

    it('should write UTF-8 Persian text unchanged', async () => {
      const line = 'از ۲۳:۵۹:۵۰ تا ۲۴:۰۰:۰۰ — مدت: ۰:۰۰:۱۰';

      await repository.append('2023-03-21', line);

      expect(await repository.readLines('2023-03-21')).toEqual([line]);
    });

    it('should wrap filesystem failures', async () => {
      // a file where the directory should be
      const blocked = path.join(tmpDir, 'blocked');
      await fs.writeFile(blocked, 'not a directory');
      const broken = new FsDailyLogRepository(blocked);

      await expect(broken.append('2023-03-21', 'line')).rejects.toBeInstanceOf(
        DailyLogWriteError,
      );
    });
  });

  describe('readLines()', () => {
    it('should return null for a day without a log', async () => {
      expect(await repository.readLines('2023-03-22')).toBeNull();
    });

    it('should return lines without terminators', async () => {
      await fs.mkdir(logDirectory, { recursive: true });
      await fs.writeFile(
        repository.pathFor('2023-03-21'),
        'a\r\nb\n\nc\n',
        'utf8',
      );

      expect(await repository.readLines('2023-03-21')).toEqual([
        'a',
        'b',
        '',
        'c',
      ]);
    });

    it('should read a file missing its final newline', async () => {
      await fs.mkdir(logDirectory, { recursive: true });
      await fs.writeFile(repository.pathFor('2023-03-21'), 'a\nb', 'utf8');

      expect(await repository.readLines('2023-03-21')).toEqual(['a', 'b']);
    });

    it('should wrap failures other than a missing file', async () => {
      await fs.mkdir(repository.pathFor('2023-03-21'), { recursive: true });

      await expect(repository.readLines('2023-03-21')).rejects.toBeInstanceOf(
        DailyLogReadError,
      );
    });
  });
});
