import { Injectable } from '@nestjs/common';
import {
  addDays,
  differenceInMilliseconds,
  format,
  isBefore,
  isValid,
  parseISO,
  startOfDay,
  startOfSecond,
} from 'date-fns';
import { IDateProvider } from './date.provider';

@Injectable()
export class OsDateProvider implements IDateProvider {
  now(): Date {
    return new Date();
  }

  startOfDay(date: Date): Date {
    return startOfDay(date);
  }

  startOfSecond(date: Date): Date {
    return startOfSecond(date);
  }

  differenceInMilliseconds(dateLeft: Date, dateRight: Date): number {
    return differenceInMilliseconds(dateLeft, dateRight);
  }

  getIsoDateString(date: Date): string {
    return format(date, 'yyyy-MM-dd');
  }

  addDays(date: Date, amount: number): Date {
    return addDays(date, amount);
  }

  isBefore(date: Date, dateToCompare: Date): boolean {
    return isBefore(date, dateToCompare);
  }

  isValid(date: Date): boolean {
    return isValid(date);
  }

  parseISO(dateString: string): Date {
    return parseISO(dateString);
  }

  format(date: Date, formatStr: string): string {
    return format(date, formatStr);
  }
}
