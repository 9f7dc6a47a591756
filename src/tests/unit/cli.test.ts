import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { createProgram } from '../../cli/program.js';
import type { CliDeps } from '../../cli/context.js';
import { MemoryLedgerStore } from '../fakes/MemoryLedgerStore.js';
import { ScriptedPrompter } from '../fakes/ScriptedPrompter.js';
import { InconsistentEntryError, InputError, MalformedDurationError } from '../../utils/errors.js';
import type { SleepEntry } from '../../core/ledger/types.js';

// Friday morning
const NOW = new Date(2025, 0, 10, 9, 30);

function harness(store: MemoryLedgerStore, answers: string[] = []) {
  const lines: string[] = [];
  const prompter = new ScriptedPrompter(answers);
  const deps: CliDeps = {
    openStore: () => store,
    settings: {},
    now: () => NOW,
    print: (line = '') => {
      lines.push(line);
    },
    prompter,
    chalk: new Chalk({ level: 0 }),
    random: () => 0.5,
  };
  const run = async (...args: string[]): Promise<void> => {
    const program = createProgram(deps);
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
    }
    await program.parseAsync(args, { from: 'user' });
  };
  return { lines, prompter, run };
}

function zeroNights(count: number): SleepEntry[] {
  return Array.from({ length: count }, (_, i) => ({ date: `2025-01-0${i + 1}`, hours: 0 }));
}

describe('sleepdebt log', () => {
  it('records a night and prints tonight’s target', async () => {
    const store = new MemoryLedgerStore();
    const { lines, run } = harness(store);

    await run('log', '2025-01-09', '6:30');

    expect(store.current.entries).toEqual([{ date: '2025-01-09', hours: 6.5, bedtime: 0.25, waketime: 6.75 }]);
    expect(store.saves).toBe(1);
    expect(store.closed).toBe(1);
    expect(lines).toEqual([
      'Added: 2025-01-09 - 6:30 hours',
      '  Bedtime: 00:15 → wake 06:45',
      '  Daily deficit: -0:30',
      '  Total sleep debt: 0:30 hours',
      '',
      "Tonight's Recommendation:",
      '  Target: 7:04 hours',
      '  Bedtime: 23:25 for 06:45 wake',
    ]);
  });

  it('reports an update when the date already exists', async () => {
    const store = new MemoryLedgerStore({ entries: [{ date: '2025-01-09', hours: 5 }] });
    const { lines, run } = harness(store);

    await run('log', '01-09', '8');

    expect(lines[0]).toBe('Updated: 2025-01-09 - 8:00 hours');
    expect(store.current.entries).toHaveLength(1);
    expect(lines).toContain('  Maintain 7:00+ hours. You are at or above target.');
  });

  it('leaves the store untouched on a malformed duration', async () => {
    const store = new MemoryLedgerStore();
    const { run } = harness(store);

    await expect(run('log', 'today', 'abc')).rejects.toThrow(MalformedDurationError);
    expect(store.saves).toBe(0);
  });

  it('prints JSON on request', async () => {
    const store = new MemoryLedgerStore();
    const { lines, run } = harness(store);

    await run('log', 'yesterday', '7.5', '--json');

    expect(JSON.parse(lines.join('\n'))).toEqual({
      action: 'added',
      entry: { date: '2025-01-09', hours: 7.5, bedtime: 23.25, waketime: 6.75 },
      totalDebt: -0.5,
    });
  });
});

describe('sleepdebt add', () => {
  it('takes explicit bedtime and wake time', async () => {
    const store = new MemoryLedgerStore();
    const { run } = harness(store);

    await run('add', '-d', '2025-01-08', '-b', '23:00', '-w', '06:00');

    expect(store.current.entries).toEqual([{ date: '2025-01-08', hours: 7, bedtime: 23, waketime: 6 }]);
  });

  it('rejects hours that contradict the times and saves nothing', async () => {
    const store = new MemoryLedgerStore();
    const { run } = harness(store);

    await expect(run('add', '8', '-b', '23:00', '-w', '06:00')).rejects.toThrow(InconsistentEntryError);
    expect(store.saves).toBe(0);
    expect(store.closed).toBe(1);
  });

  it('prompts when given nothing and re-derives bedtime after a correction', async () => {
    const store = new MemoryLedgerStore();
    const { lines, prompter, run } = harness(store, ['2025-01-09', '23:30', '', 'n', '6:30']);

    await run('add');

    expect(prompter.questions).toEqual([
      'Date [2025-01-10]: ',
      'Bedtime (HH:MM, e.g., 23:30): ',
      'Wake time (HH:MM) [06:45]: ',
      'Correct? [Y/n]: ',
      'Enter actual hours (h:mm or decimal): ',
    ]);
    expect(lines).toContain('Calculated sleep: 7:15 hours');
    expect(store.current.entries).toEqual([{ date: '2025-01-09', hours: 6.5, bedtime: 0.25, waketime: 6.75 }]);
  });
});

describe('sleepdebt add with prompts', () => {
  it('offers the date and wake time given as options', async () => {
    const store = new MemoryLedgerStore();
    const { prompter, run } = harness(store, ['', '23:00', '', '']);

    await run('add', '-d', '2025-01-05', '-w', '07:30');

    expect(prompter.questions).toEqual([
      'Date [2025-01-05]: ',
      'Bedtime (HH:MM, e.g., 23:30): ',
      'Wake time (HH:MM) [07:30]: ',
      'Correct? [Y/n]: ',
    ]);
    expect(store.current.entries).toEqual([{ date: '2025-01-05', hours: 8.5, bedtime: 23, waketime: 7.5 }]);
  });

  it('still lets the answers override the options', async () => {
    const store = new MemoryLedgerStore();
    const { run } = harness(store, ['2025-01-06', '23:00', '06:00', 'y']);

    await run('add', '-d', '2025-01-05', '-w', '07:30');

    expect(store.current.entries).toEqual([{ date: '2025-01-06', hours: 7, bedtime: 23, waketime: 6 }]);
  });
});

describe('sleepdebt status', () => {
  it('explains how to start on an empty ledger', async () => {
    const { lines, run } = harness(new MemoryLedgerStore());

    await run('status');

    expect(lines).toEqual(['No sleep data recorded yet.', 'Use: sleepdebt log <date> <hours:minutes>']);
  });

  it('summarizes debt as JSON', async () => {
    const store = new MemoryLedgerStore({
      entries: [
        { date: '2025-01-08', hours: 6 },
        { date: '2025-01-09', hours: 5.5 },
      ],
    });
    const { lines, run } = harness(store);

    await run('status', '--json');

    const output: unknown = JSON.parse(lines.join('\n'));
    expect(output).toMatchObject({ nights: 2, totalDebt: 2.5, recentNights: 2, recentDebt: 2.5 });
    expect(store.saves).toBe(0);
  });

  it('warns about significant debt', async () => {
    const { lines, run } = harness(new MemoryLedgerStore({ entries: zeroNights(2) }));

    await run('status');

    expect(lines).toContain('WARNING: Significant sleep debt detected!');
    expect(lines).toContain('  Total sleep debt:  14:00 hours');
  });
});

describe('sleepdebt plan', () => {
  it('schedules recovery from today', async () => {
    const { lines, run } = harness(new MemoryLedgerStore({ entries: zeroNights(3) }));

    await run('plan', '--json');

    const plan: unknown = JSON.parse(lines.join('\n'));
    expect(plan).toMatchObject({
      status: 'scheduled',
      debt: 21,
      weeks: 3,
      dailyRecovery: 1,
      clearedOn: '2025-01-27',
      weekly: [{ remainingDebt: 13 }, { remainingDebt: 5 }, { remainingDebt: 0 }],
    });
  });

  it('prints the no-debt message', async () => {
    const { lines, run } = harness(new MemoryLedgerStore({ entries: [{ date: '2025-01-09', hours: 8 }] }));

    await run('plan');

    expect(lines.at(-1)).toBe('No sleep debt to recover! Keep maintaining 7:00+ hours/night.');
  });

  it('rejects a non-positive week count', async () => {
    const { run } = harness(new MemoryLedgerStore());
    await expect(run('plan', '-w', '0')).rejects.toThrow('Must be a positive whole number.');
  });
});

describe('sleepdebt recommend', () => {
  it('asks for data first on an empty ledger', async () => {
    const { lines, run } = harness(new MemoryLedgerStore());
    await run('recommend');
    expect(lines).toEqual(['No sleep data. Add some entries first.']);
  });

  it('lists rules grouped by priority', async () => {
    const { lines, run } = harness(new MemoryLedgerStore({ entries: [{ date: '2025-01-09', hours: 4 }] }));

    await run('recommend');

    expect(lines).toContain('[HIGH PRIORITY]');
    expect(lines).toContain('  ! Tonight: Aim for 7:25 hours of sleep');
    expect(lines).toContain('  - No caffeine after 2:00 PM');
    expect(lines).not.toContain('[MEDIUM PRIORITY]');
  });
});

describe('sleepdebt missing and catchup', () => {
  const entries = [{ date: '2025-01-07', hours: 6 }];

  it('lists the days since the last entry', async () => {
    const { lines, run } = harness(new MemoryLedgerStore({ entries }));
    await run('missing', '--json');
    expect(JSON.parse(lines.join('\n'))).toEqual(['2025-01-08', '2025-01-09']);
  });

  it('fills answered days and skips malformed ones', async () => {
    const store = new MemoryLedgerStore({ entries });
    const { lines, prompter, run } = harness(store, ['7:30', 'x']);

    await run('catchup');

    expect(prompter.questions).toHaveLength(2);
    expect(store.current.entries).toEqual([
      { date: '2025-01-07', hours: 6 },
      { date: '2025-01-08', hours: 7.5, bedtime: 23.25, waketime: 6.75 },
    ]);
    expect(lines).toContain('    Invalid format, skipped');
    expect(lines.at(-1)).toBe('1 night(s) recorded. Total sleep debt: 0:30 hours');
  });

  it('saves nothing when every day is skipped', async () => {
    const store = new MemoryLedgerStore({ entries });
    const { run } = harness(store, ['', '']);

    await run('catchup');

    expect(store.saves).toBe(0);
  });
});

describe('sleepdebt init', () => {
  it('loads thirty sample nights once', async () => {
    const store = new MemoryLedgerStore();
    const { run } = harness(store);

    await run('init');

    expect(store.current.entries).toHaveLength(30);
    expect(store.current.entries[0]?.date).toBe('2024-12-11');
    expect(store.current.profile.notes).toBe('Sample user data');

    await expect(run('init')).rejects.toThrow(InputError);
    expect(store.saves).toBe(1);

    await run('init', '--force');
    expect(store.saves).toBe(2);
    expect(store.current.entries).toHaveLength(30);
  });
});

describe('sleepdebt profile', () => {
  it('updates target and wake time', async () => {
    const store = new MemoryLedgerStore();
    const { lines, run } = harness(store);

    await run('profile', '--target', '7:30', '--wake', '07:00', '--name', 'Sam', '--json');

    expect(JSON.parse(lines.join('\n'))).toEqual({ target: 7.5, wakeTime: 7, name: 'Sam' });
    expect(store.current.profile).toEqual({ target: 7.5, wakeTime: 7, name: 'Sam' });
  });

  it('rejects an age the ledger file could not hold', async () => {
    const store = new MemoryLedgerStore({ entries: [{ date: '2025-01-09', hours: 7 }] });
    const { run } = harness(store);

    await expect(run('profile', '--age', '200')).rejects.toThrow('Must be at most 130.');
    expect(store.saves).toBe(0);

    await run('profile', '--age', '130');
    expect(store.current.profile.age).toBe(130);
  });

  it('shows without saving when nothing changes', async () => {
    const store = new MemoryLedgerStore({ profile: { target: 7, wakeTime: 6.75, birthdate: '1990-06-15' } });
    const { lines, run } = harness(store);

    await run('profile');

    expect(store.saves).toBe(0);
    expect(lines).toContain('  Age:               34');
    expect(lines).toContain('  Recommended range: 7-9 hrs (adult (26-64))');
  });
});

describe('interactive mode', () => {
  it('declines sample data and quits with a bedtime', async () => {
    const store = new MemoryLedgerStore();
    const { lines, prompter, run } = harness(store, ['n', 'q']);

    await run();

    expect(prompter.questions).toEqual(['Load 30 days of sample data? [y/N]: ', 'Choose option: ']);
    expect(lines.at(-1)).toBe('Sleep well! Aim for bed by 23:30 tonight.');
    expect(store.saves).toBe(0);
  });

  it('reports bad input and keeps the menu running', async () => {
    const store = new MemoryLedgerStore();
    const { lines, run } = harness(store, ['n', '1', '', 'abc', '', 'q']);

    await run();

    expect(lines).toContain('Invalid duration "abc": use h:mm (7:30) or decimal hours (7.5)');
    expect(lines.at(-1)).toBe('Sleep well! Aim for bed by 23:30 tonight.');
  });

  it('logs a night from the menu', async () => {
    const store = new MemoryLedgerStore();
    const { lines, run } = harness(store, ['n', '1', 'yesterday', '6:30', '', 'q']);

    await run();

    expect(store.current.entries).toEqual([{ date: '2025-01-09', hours: 6.5, bedtime: 0.25, waketime: 6.75 }]);
    expect(lines.at(-1)).toBe('Sleep well! Aim for bed by 23:25 tonight.');
  });
});
