import { LogAction, LogEntry, isLogAction } from '../events/ledger.events';
import { formatTimestamp } from '../utils/format';

// [2026-10-18 14:03:59] SALE: 4x Apple @ $2.50 each = $10.00 (remaining: 6)
const LINE_PATTERN =
  /^\[(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\] ([A-Z]+): (.*)$/;

const SALE_AMOUNT_PATTERN = / each = \$(\d+(?:\.\d+)?) \(remaining: \d+\)$/;

export function formatHistoryLine(entry: LogEntry): string {
  return `[${formatTimestamp(entry.timestamp)}] ${entry.action}: ${entry.detail}`;
}

export function parseHistoryLine(line: string): LogEntry | null {
  const match = LINE_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const [, year, month, day, hours, minutes, seconds, action, detail] = match;
  if (!isLogAction(action)) {
    return null;
  }

  const entry: LogEntry = {
    timestamp: new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds),
    ),
    action,
    detail,
  };

  if (action === LogAction.SALE) {
    const amount = SALE_AMOUNT_PATTERN.exec(detail);
    if (amount) {
      entry.amount = Number(amount[1]);
    }
  }

  return entry;
}
