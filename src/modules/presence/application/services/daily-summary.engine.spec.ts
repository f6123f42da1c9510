import { describe, it, expect, beforeEach } from 'vitest';
import { DailySummaryEngine } from './daily-summary.engine';
import { InMemoryDailyLogRepository } from '../../infrastructure/daily-log/in-memory-daily-log.repository';
import { InvalidLogDateError } from '../../domain/daily-log/daily-log.errors';
import { FakeDateProvider } from '@/util/date-provider/fake-date.provider';

describe('DailySummaryEngine', () => {
  let engine: DailySummaryEngine;
  let logRepository: InMemoryDailyLogRepository;

  const segmentLines = [
    'از ۱۴:۲۲ تا ۱۵:۱۰ — مدت: ۰:۴۸',
    'از ۲۳:۵۹:۵۰ تا ۲۴:۰۰:۰۰ — مدت: ۰:۰۰:۱۰',
  ];

  beforeEach(() => {
    logRepository = new InMemoryDailyLogRepository();
    engine = new DailySummaryEngine(logRepository, new FakeDateProvider());
  });

  describe('summarizeDay()', () => {
    it('should append the summary line', async () => {
      logRepository.seed('2023-03-21', segmentLines);

      const outcome = await engine.summarizeDay('2023-03-21');

      expect(outcome).toEqual({
        status: 'written',
        logDate: '2023-03-21',
        totalSeconds: 2890,
        line: 'سه‌شنبه ۱ فروردین — ۰:۴۸:۱۰ مجموع',
      });
      expect(logRepository.getLines('2023-03-21')).toEqual([
        ...segmentLines,
        'سه‌شنبه ۱ فروردین — ۰:۴۸:۱۰ مجموع',
      ]);
    });

    it('should write exactly one summary when called twice', async () => {
      logRepository.seed('2023-03-21', segmentLines);

      await engine.summarizeDay('2023-03-21');
      const second = await engine.summarizeDay('2023-03-21');

      expect(second).toEqual({
        status: 'already-summarized',
        logDate: '2023-03-21',
        totalSeconds: 2890,
      });
      const summaries = logRepository
        .getLines('2023-03-21')
        .filter((line) => line.endsWith('مجموع'));
      expect(summaries).toHaveLength(1);
    });

    it('should do nothing for a day without a log', async () => {
      const outcome = await engine.summarizeDay('2023-03-22');

      expect(outcome).toEqual({ status: 'missing', logDate: '2023-03-22' });
      expect(logRepository.getLogDates()).toEqual([]);
    });

    it('should summarize again after new segments follow a summary', async () => {
      logRepository.seed('2023-03-21', [
        'از ۱۰:۰۰:۰۰ تا ۱۰:۰۱:۰۰ — مدت: ۰:۰۱:۰۰',
        'سه‌شنبه ۱ فروردین — ۰:۰۱:۰۰ مجموع',
        'از ۲۰:۰۰:۰۰ تا ۲۰:۰۱:۰۰ — مدت: ۰:۰۱:۰۰',
      ]);

      const outcome = await engine.summarizeDay('2023-03-21');

      expect(outcome.status).toBe('written');
      expect(logRepository.getLines('2023-03-21').at(-1)).toBe(
        'سه‌شنبه ۱ فروردین — ۰:۰۲:۰۰ مجموع',
      );
    });

    it('should write a zero total for a log holding no readable segments', async () => {
      logRepository.seed('2023-03-21', ['garbage']);

      const outcome = await engine.summarizeDay('2023-03-21');

      expect(outcome).toMatchObject({ status: 'written', totalSeconds: 0 });
    });

    it('should reject a malformed date', async () => {
      await expect(engine.summarizeDay('21-03-2023')).rejects.toBeInstanceOf(
        InvalidLogDateError,
      );
      await expect(engine.summarizeDay('2023-02-30')).rejects.toBeInstanceOf(
        InvalidLogDateError,
      );
    });
  });

  describe('getTotalSeconds()', () => {
    it('should sum segment lines and ignore the summary', async () => {
      logRepository.seed('2023-03-21', [
        ...segmentLines,
        'سه‌شنبه ۱ فروردین — ۰:۴۸:۱۰ مجموع',
      ]);

      expect(await engine.getTotalSeconds('2023-03-21')).toBe(2890);
    });

    it('should return zero for a missing log', async () => {
      expect(await engine.getTotalSeconds('2023-03-22')).toBe(0);
    });
  });

  describe('isSummarized()', () => {
    it('should reflect the last line', async () => {
      logRepository.seed('2023-03-21', segmentLines);

      expect(await engine.isSummarized('2023-03-21')).toBe(false);
      await engine.summarizeDay('2023-03-21');
      expect(await engine.isSummarized('2023-03-21')).toBe(true);
      expect(await engine.isSummarized('2023-03-22')).toBe(false);
    });
  });
});
