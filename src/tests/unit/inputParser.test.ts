import { describe, it, expect } from 'vitest';
import { parseClockTime, parseDateArg, parseDuration } from '../../adapters/input/inputParser.js';
import { buildEntry } from '../../adapters/input/entryBuilder.js';
import {
  InconsistentEntryError,
  InputError,
  MalformedDateError,
  MalformedDurationError,
  MalformedTimeError,
} from '../../utils/errors.js';

describe('parseDuration', () => {
  it('reads h:mm and decimal hours', () => {
    expect(parseDuration('7:30')).toBe(7.5);
    expect(parseDuration('6:45')).toBe(6.75);
    expect(parseDuration('7.5')).toBe(7.5);
    expect(parseDuration(' 8 ')).toBe(8);
    expect(parseDuration('.5')).toBe(0.5);
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration('24:00')).toBe(24);
  });

  it.each(['abc', '', '7:75', '7:60', '7:5', '-1', '25', '24:30', '7h', '7,5'])('rejects %j', (input) => {
    expect(() => parseDuration(input)).toThrow(MalformedDurationError);
  });

  it('keeps the raw input in the message', () => {
    expect(() => parseDuration('abc')).toThrow('Invalid duration "abc": use h:mm (7:30) or decimal hours (7.5)');
  });
});

describe('parseClockTime', () => {
  it('reads 24h clock times', () => {
    expect(parseClockTime('23:30')).toBe(23.5);
    expect(parseClockTime('06:45')).toBe(6.75);
    expect(parseClockTime('0:15')).toBe(0.25);
  });

  it.each(['24:00', '23:60', '7', 'noon'])('rejects %j', (input) => {
    expect(() => parseClockTime(input)).toThrow(MalformedTimeError);
  });
});

describe('parseDateArg', () => {
  const now = new Date(2025, 0, 1, 10, 0);

  it('resolves relative words', () => {
    expect(parseDateArg('today', now)).toBe('2025-01-01');
    expect(parseDateArg('', now)).toBe('2025-01-01');
    expect(parseDateArg('Yesterday', now)).toBe('2024-12-31');
  });

  it('places MM-DD in the current year', () => {
    expect(parseDateArg('03-15', now)).toBe('2025-03-15');
  });

  it('accepts full ISO dates', () => {
    expect(parseDateArg('2024-02-29', now)).toBe('2024-02-29');
  });

  it.each(['2025-02-30', '13-01', '2025/01/01', 'tomorrow'])('rejects %j', (input) => {
    expect(() => parseDateArg(input, now)).toThrow(MalformedDateError);
  });
});

describe('buildEntry', () => {
  const settings = { wakeTime: 6.75 };

  it('derives bedtime from hours and the default wake time', () => {
    expect(buildEntry({ date: '2025-01-09', hours: 6.5 }, settings)).toEqual({
      date: '2025-01-09',
      hours: 6.5,
      bedtime: 0.25,
      waketime: 6.75,
    });
  });

  it('derives hours across midnight', () => {
    expect(buildEntry({ date: '2025-01-09', bedtime: 23.5, waketime: 7 }, settings)).toEqual({
      date: '2025-01-09',
      hours: 7.5,
      bedtime: 23.5,
      waketime: 7,
    });
  });

  it('accepts three fields that agree', () => {
    const entry = buildEntry({ date: '2025-01-09', hours: 7, bedtime: 23, waketime: 6 }, settings);
    expect(entry.hours).toBe(7);
  });

  it('rejects three fields that disagree', () => {
    const build = () => buildEntry({ date: '2025-01-09', hours: 8, bedtime: 23, waketime: 6 }, settings);
    expect(build).toThrow(InconsistentEntryError);
    expect(build).toThrow('8:00 hours does not fit bedtime 23:00 and wake 06:00 (7:00 in bed)');
  });

  it('needs hours or a bedtime', () => {
    expect(() => buildEntry({ date: '2025-01-09', waketime: 7 }, settings)).toThrow(InputError);
  });
});
