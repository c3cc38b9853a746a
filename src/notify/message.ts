import { CheckResult } from '../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

export function shouldNotify(result: CheckResult): boolean {
  return result.due.length > 0 || result.unparseableCount > 0;
}

export function renderMessage(result: CheckResult, now: Date): string {
  const windowHours = Math.round((result.windowEnd.valueOf() - result.windowStart.valueOf()) / HOUR_MS);
  const lines = [`⚠ LMS: ${result.due.length} assignment(s) due within ${windowHours}h`];

  for (const assignment of result.due) {
    const hoursLeft = Math.floor((assignment.dueAt.valueOf() - now.getTime()) / HOUR_MS);
    lines.push(
      `• ${assignment.course} | ${assignment.title} (due ${assignment.dueAt.format('YYYY-MM-DD HH:mm')}, in ${hoursLeft}h)`
    );
  }

  if (result.unparseableCount > 0) {
    lines.push('', `? ${result.unparseableCount} assignment(s) with an unreadable due date:`);
    for (const assignment of result.unparseable) {
      lines.push(`• ${assignment.course} | ${assignment.title}: "${assignment.sourceText}"`);
    }
  }

  return lines.join('\n');
}
