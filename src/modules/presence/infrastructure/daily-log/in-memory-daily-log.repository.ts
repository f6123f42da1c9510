import { Injectable } from '@nestjs/common';
import { IDailyLogRepository } from '../../domain/daily-log/daily-log.repository';

@Injectable()
export class InMemoryDailyLogRepository implements IDailyLogRepository {
  private logs = new Map<string, string[]>();

  async append(logDate: string, line: string): Promise<void> {
    const lines = this.logs.get(logDate) ?? [];
    lines.push(line.replace(/\n+$/, ''));
    this.logs.set(logDate, lines);
  }

  async readLines(logDate: string): Promise<string[] | null> {
    const lines = this.logs.get(logDate);
    return lines ? [...lines] : null;
  }

  // Test helper methods
  seed(logDate: string, lines: string[]): void {
    this.logs.set(logDate, [...lines]);
  }

  clear(): void {
    this.logs.clear();
  }

  getLogDates(): string[] {
    return Array.from(this.logs.keys()).sort();
  }

  getLines(logDate: string): string[] {
    return [...(this.logs.get(logDate) ?? [])];
  }
}
