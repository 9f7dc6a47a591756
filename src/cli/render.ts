import chalk, { type ChalkInstance } from 'chalk';
import type { LedgerSettings, NightlyTarget, SleepEntry, SleepProfile, UpsertAction } from '../core/ledger/types.js';
import type { StatusSummary } from '../core/analysis/status.js';
import type { RangeAnalysis } from '../core/analysis/history.js';
import type { CalendarWeek } from '../core/analysis/calendar.js';
import type { RecoveryPlan } from '../core/recovery/RecoverySchedule.js';
import { groupByPriority, type Priority, type Recommendation } from '../core/recommendations/recommendations.js';
import { ageFromBirthdate, recommendedRangeForAge, sleepBand } from '../core/analysis/bands.js';
import { parseIsoDate } from '../utils/dates.js';
import { formatClock, formatHours } from '../utils/format.js';

const RULE = '='.repeat(60);

export function hoursColor(hours: number, c: ChalkInstance = chalk): ChalkInstance {
  const band = sleepBand(hours);
  return band === 'good' ? c.green : band === 'short' ? c.yellow : c.red;
}

function debtColor(debt: number, c: ChalkInstance): ChalkInstance {
  return debt > 0 ? c.red : c.green;
}

function cumulativeColor(debt: number, c: ChalkInstance): ChalkInstance {
  return debt <= 0 ? c.green : debt < 7 ? c.yellow : c.red;
}

function signedDeficit(deficit: number): string {
  return deficit < 0 ? `+${formatHours(-deficit)}` : `-${formatHours(deficit)}`;
}

export function banner(title: string, c: ChalkInstance = chalk): string[] {
  return [c.bold(RULE), c.bold.cyan(`  ${title}`), c.bold(RULE), ''];
}

export function renderStatus(summary: StatusSummary, c: ChalkInstance = chalk): string[] {
  const lines = banner('SLEEP STATUS REPORT', c);
  const debt = summary.totalDebt;

  lines.push(c.bold(`Overall Statistics (${summary.nights} nights):`));
  lines.push(`  Average sleep:     ${hoursColor(summary.averageSleep, c)(formatHours(summary.averageSleep))} hours/night`);
  lines.push(`  Target sleep:      ${formatHours(summary.target)} hours/night`);
  lines.push(`  Total sleep debt:  ${debtColor(debt, c)(formatHours(Math.abs(debt)))} hours`);
  lines.push('');
  lines.push(c.bold(`Last ${summary.recentNights} Nights:`));
  lines.push(`  Average:           ${hoursColor(summary.recentAverage, c)(formatHours(summary.recentAverage))} hours/night`);
  lines.push(`  Week debt:         ${debtColor(summary.recentDebt, c)(formatHours(Math.abs(summary.recentDebt)))} hours`);

  if (summary.averageBedtime !== undefined && summary.averageWaketime !== undefined) {
    lines.push('');
    lines.push(c.bold('Sleep Timing (avg):'));
    lines.push(`  Typical bedtime:   ${c.magenta(formatClock(summary.averageBedtime))}`);
    lines.push(`  Typical wake:      ${c.blue(formatClock(summary.averageWaketime))}`);
  }

  lines.push('');
  lines.push(c.bold('Recent Sleep Log:'));
  const timed = summary.rows.some((row) => row.bedtime !== undefined);
  if (timed) {
    lines.push(c.dim(`  ${'Date'.padEnd(12)} ${'Bed'.padStart(6)} ${'Wake'.padStart(6)} ${'Sleep'.padStart(6)} ${'Deficit'.padStart(8)} ${'Cum.Debt'.padStart(10)}`));
    lines.push(`  ${'-'.repeat(52)}`);
  } else {
    lines.push(c.dim(`  ${'Date'.padEnd(12)} ${'Sleep'.padStart(8)} ${'Deficit'.padStart(10)} ${'Cum.Debt'.padStart(10)}`));
    lines.push(`  ${'-'.repeat(42)}`);
  }

  for (const row of summary.rows) {
    const sleep = hoursColor(row.hours, c);
    const deficit = row.dailyDeficit < 0 ? c.green : c.red;
    const cumulative = cumulativeColor(row.cumulativeDebt, c)(formatHours(row.cumulativeDebt).padStart(10));
    if (timed && row.bedtime !== undefined) {
      const bed = c.magenta(formatClock(row.bedtime).padStart(6));
      const wake = c.blue((row.waketime !== undefined ? formatClock(row.waketime) : '--').padStart(6));
      lines.push(`  ${row.date.padEnd(12)} ${bed} ${wake} ${sleep(formatHours(row.hours).padStart(6))} ${deficit(signedDeficit(row.dailyDeficit).padStart(8))} ${cumulative}`);
    } else {
      lines.push(`  ${row.date.padEnd(12)} ${sleep(formatHours(row.hours).padStart(8))} ${deficit(signedDeficit(row.dailyDeficit).padStart(10))} ${cumulative}`);
    }
  }

  if (summary.significantDebt) {
    lines.push('');
    lines.push(c.red.bold('WARNING: Significant sleep debt detected!'));
    lines.push(c.red('Consider prioritizing sleep recovery to prevent health events.'));
  }
  return lines;
}

export function renderTonight(nightly: NightlyTarget, settings: LedgerSettings, c: ChalkInstance = chalk): string[] {
  if (nightly.atOrAboveTarget) {
    return [`  ${c.green(`Maintain ${formatHours(settings.target)}+ hours. You are at or above target.`)}`];
  }
  return [
    `  Target: ${c.green(formatHours(nightly.targetTonight))} hours`,
    `  Bedtime: ${c.magenta(formatClock(nightly.bedtime))} for ${formatClock(settings.wakeTime)} wake`,
  ];
}

export function renderLogged(
  action: UpsertAction,
  entry: SleepEntry,
  totalDebt: number,
  nightly: NightlyTarget,
  settings: LedgerSettings,
  c: ChalkInstance = chalk
): string[] {
  const deficit = settings.target - entry.hours;
  const lines = [
    `${c.green(action === 'added' ? 'Added:' : 'Updated:')} ${entry.date} - ${hoursColor(entry.hours, c)(formatHours(entry.hours))} hours`,
  ];
  if (entry.bedtime !== undefined && entry.waketime !== undefined) {
    lines.push(`  Bedtime: ${c.magenta(formatClock(entry.bedtime))} → wake ${c.blue(formatClock(entry.waketime))}`);
  }
  lines.push(
    deficit > 0
      ? `  Daily deficit: ${c.red(`-${formatHours(deficit)}`)}`
      : `  Daily surplus: ${c.green(`+${formatHours(-deficit)}`)}`
  );
  lines.push(`  Total sleep debt: ${debtColor(totalDebt, c)(formatHours(Math.abs(totalDebt)))} hours`);
  lines.push('');
  lines.push(c.bold("Tonight's Recommendation:"));
  lines.push(...renderTonight(nightly, settings, c));
  return lines;
}

const PRIORITY_STYLE: Record<Priority, { symbol: string; color: (c: ChalkInstance) => ChalkInstance }> = {
  HIGH: { symbol: '!', color: (c) => c.red },
  MEDIUM: { symbol: '~', color: (c) => c.yellow },
  LOW: { symbol: '-', color: (c) => c.dim },
};

export function renderRecommendations(
  recommendations: readonly Recommendation[],
  nightly: NightlyTarget,
  settings: LedgerSettings,
  c: ChalkInstance = chalk
): string[] {
  const lines = banner('PERSONALIZED SLEEP RECOMMENDATIONS', c);
  lines.push(c.bold('Current Status:'));
  lines.push(`  Sleep debt: ${debtColor(nightly.debt, c)(formatHours(Math.abs(nightly.debt)))} hours`);
  lines.push(`  Wake time: ${c.blue(formatClock(settings.wakeTime))} (configured)`);
  lines.push('');

  for (const [priority, recs] of groupByPriority(recommendations)) {
    const style = PRIORITY_STYLE[priority];
    const color = style.color(c);
    lines.push(color.bold(`[${priority} PRIORITY]`));
    for (const rec of recs) {
      lines.push(`  ${color(style.symbol)} ${c.bold(rec.action)}`);
      lines.push(`    ${c.dim(rec.detail)}`);
    }
    lines.push('');
  }

  if (!nightly.atOrAboveTarget) {
    lines.push(...banner("TONIGHT'S PLAN", c));
    lines.push(`  Target sleep:  ${c.green(formatHours(nightly.targetTonight))} hours`);
    lines.push(`  Bedtime:       ${c.magenta(formatClock(nightly.bedtime))}`);
    lines.push(`  Wake time:     ${c.blue(formatClock(settings.wakeTime))}`);
    lines.push(`  Extra needed:  ${formatHours(nightly.extra)} hours beyond minimum`);
    lines.push('');
    lines.push(`  ${c.dim(`Following this plan: debt cleared in ~${nightly.daysToRecover} days`)}`);
  }
  return lines;
}

export function renderPlan(plan: RecoveryPlan, settings: LedgerSettings, c: ChalkInstance = chalk): string[] {
  const lines = banner('SLEEP RECOVERY PLAN', c);
  if (plan.status === 'no-debt') {
    lines.push(c.green(plan.message));
    return lines;
  }

  lines.push(c.bold('Current Status:'));
  lines.push(`  Sleep debt:        ${c.red(formatHours(plan.debt))} hours`);
  lines.push(`  Wake time:         ${c.blue(formatClock(settings.wakeTime))}`);
  lines.push(`  Recovery period:   ${plan.weeks} weeks`);
  lines.push('');
  lines.push(c.bold('Recovery Strategy:'));
  lines.push(`  Daily target:      ${c.green(formatHours(plan.dailyTarget))} hours/night`);
  lines.push(`  Recommended bed:   ${c.magenta(formatClock(plan.bedtime))}`);
  lines.push(`  Extra sleep/night: +${formatHours(plan.dailyRecovery)} hours`);
  lines.push(`  Est. full recovery: ${Math.floor(plan.estimatedRecoveryDays)} days`);
  if (plan.clearedOn) {
    lines.push(`  Debt cleared by:   ${c.green(plan.clearedOn)}`);
  }

  lines.push('');
  lines.push(c.bold('Weekly Targets:'));
  lines.push(c.dim(`  ${'Week'.padEnd(8)} ${'Bedtime'.padStart(10)} ${'Target'.padStart(10)} ${'Recovered'.padStart(10)} ${'Debt Left'.padStart(12)}`));
  lines.push(`  ${'-'.repeat(54)}`);
  for (const week of plan.weekly) {
    const left = week.remainingDebt === 0 ? c.green : week.remainingDebt < plan.debt / 2 ? c.yellow : c.red;
    lines.push(
      `  ${`Week ${week.week}`.padEnd(8)} ${c.magenta(formatClock(week.bedtime).padStart(10))} ${c.green(formatHours(week.target).padStart(10))} ${formatHours(week.recovered).padStart(10)} ${left(formatHours(week.remainingDebt).padStart(12))}`
    );
  }

  lines.push('');
  lines.push(c.bold(`Next ${plan.daily.length} Days:`));
  lines.push(c.dim(`  ${'Date'.padEnd(12)} ${'Day'.padEnd(6)} ${'Bedtime'.padStart(10)} ${'Target'.padStart(8)} ${'Recovery'.padStart(12)}`));
  lines.push(`  ${'-'.repeat(52)}`);
  for (const night of plan.daily) {
    const done = night.remaining === 0 ? c.green : c.yellow;
    const mark = night.weekend ? c.cyan('*') : ' ';
    lines.push(
      `  ${night.date.padEnd(12)} ${night.weekday.padEnd(6)} ${c.magenta(formatClock(night.bedtime).padStart(10))} ${c.green(formatHours(night.target).padStart(8))} ${done(`${formatHours(night.recovered).padStart(10)} done`)}${mark}`
    );
  }
  lines.push('');
  lines.push(`  ${c.cyan('* Weekend - extra recovery opportunity')}`);
  return lines;
}

export function renderHistory(analysis: RangeAnalysis, label: string, c: ChalkInstance = chalk): string[] {
  const lines = banner(`SLEEP ANALYSIS: ${label.toUpperCase()}`, c);
  const { quality } = analysis;
  const pct = (n: number): number => Math.floor((100 * n) / analysis.nights);

  lines.push(c.bold(`Summary (${analysis.nights} nights):`));
  lines.push(`  Average sleep:     ${hoursColor(analysis.averageSleep, c)(formatHours(analysis.averageSleep))} hrs/night`);
  lines.push(`  Total sleep debt:  ${debtColor(analysis.totalDebt, c)(formatHours(Math.abs(analysis.totalDebt)))} hours`);
  lines.push(`  Target:            ${formatHours(analysis.target)} hrs/night`);
  lines.push('');
  lines.push(c.bold('Sleep Quality Breakdown:'));
  lines.push(`  ${c.green('Good (7+ hrs):')}    ${quality.good} nights (${pct(quality.good)}%)`);
  lines.push(`  ${c.yellow('Short (6-7 hrs):')}  ${quality.short} nights (${pct(quality.short)}%)`);
  lines.push(`  ${c.red('Severe (<6 hrs):')}  ${quality.severe} nights (${pct(quality.severe)}%)`);
  lines.push('');
  lines.push(c.bold('Extremes:'));
  lines.push(`  Best night:  ${c.green(`${analysis.best.date} - ${formatHours(analysis.best.hours)} hrs`)}`);
  lines.push(`  Worst night: ${c.red(`${analysis.worst.date} - ${formatHours(analysis.worst.hours)} hrs`)}`);
  lines.push('');
  lines.push(c.bold('Day of Week Averages:'));
  for (const day of analysis.dayOfWeek) {
    if (day.average === null) {
      lines.push(`  ${day.day}: ${c.dim('no data')}`);
    } else {
      const color = hoursColor(day.average, c);
      lines.push(`  ${day.day}: ${color(formatHours(day.average).padStart(5))}  ${color('█'.repeat(Math.trunc(day.average * 3)))}`);
    }
  }

  if (analysis.trend) {
    const { firstAverage, lastAverage, change, direction } = analysis.trend;
    lines.push('');
    lines.push(c.bold('Trend Analysis:'));
    lines.push(`  First 7 nights avg: ${hoursColor(firstAverage, c)(formatHours(firstAverage))}`);
    lines.push(`  Last 7 nights avg:  ${hoursColor(lastAverage, c)(formatHours(lastAverage))}`);
    if (direction === 'improving') lines.push(`  Trend: ${c.green(`↑ Improving (+${formatHours(change)})`)}`);
    else if (direction === 'declining') lines.push(`  Trend: ${c.red(`↓ Declining (${formatHours(change)})`)}`);
    else lines.push(`  Trend: ${c.yellow('→ Stable')}`);
  }

  if (analysis.progression.length > 0) {
    lines.push('');
    lines.push(c.bold('Debt Progression:'));
    for (const point of analysis.progression) {
      lines.push(`  ${point.date}: ${cumulativeColor(point.cumulativeDebt, c)(`${formatHours(point.cumulativeDebt)} debt`)}`);
    }
  }
  return lines;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

function weekLabel(iso: string): string {
  const date = parseIsoDate(iso);
  if (!date) return iso;
  return `${MONTHS[date.getMonth()] ?? ''} ${String(date.getDate()).padStart(2, '0')}`;
}

export function renderCalendar(weeks: readonly CalendarWeek[], c: ChalkInstance = chalk): string[] {
  const lines = banner('SLEEP CALENDAR', c);
  lines.push(`  ${c.green('█')} 7+ hrs  ${c.yellow('█')} 6-7 hrs  ${c.red('█')} <6 hrs  ${c.dim('░')} no data`);
  lines.push('');
  lines.push(`${' '.repeat(8)}${c.dim(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'].map((d) => d.padStart(5)).join(' '))}`);
  for (const week of weeks) {
    const cells = week.days.map((cell) => {
      if (cell.kind === 'recorded') return hoursColor(cell.hours, c)(formatHours(cell.hours).padStart(5));
      if (cell.kind === 'missing') return c.dim('--'.padStart(5));
      return c.dim('(7+)'.padStart(5));
    });
    lines.push(`${c.dim(weekLabel(week.weekOf).padEnd(6))}  ${cells.join(' ')}`);
  }
  return lines;
}

export function renderMissing(missing: readonly string[], c: ChalkInstance = chalk): string[] {
  if (missing.length === 0) return [c.green('All caught up! No missing days.')];
  return [
    c.yellow.bold(`You have ${missing.length} day(s) without sleep records:`),
    ...missing.map((date) => `  ${date}`),
  ];
}

export function renderProfile(profile: SleepProfile, now: Date, c: ChalkInstance = chalk): string[] {
  const age = profile.age ?? (profile.birthdate ? ageFromBirthdate(profile.birthdate, now) : undefined);
  const range = recommendedRangeForAge(age);
  const lines = [c.bold.cyan('Profile')];
  if (profile.name) lines.push(`  Name:              ${profile.name}`);
  if (age !== undefined) lines.push(`  Age:               ${age}`);
  lines.push(`  Target sleep:      ${formatHours(profile.target)} hours/night`);
  lines.push(`  Wake time:         ${c.blue(formatClock(profile.wakeTime))}`);
  lines.push(`  Recommended range: ${range.min}-${range.max} hrs (${range.label})`);
  if (profile.notes) lines.push(`  Notes:             ${c.dim(profile.notes)}`);
  return lines;
}
