export enum LogAction {
  SALE = 'SALE',
  ADD = 'ADD',
  RESTOCK = 'RESTOCK',
  UPDATE = 'UPDATE',
  DELETE = 'DELETE',
  SYSTEM = 'SYSTEM',
}

export const LOG_ACTIONS: readonly LogAction[] = Object.values(LogAction);

export function isLogAction(value: string): value is LogAction {
  return LOG_ACTIONS.some((action) => action === value);
}

export interface LogEntry {
  timestamp: Date;
  action: LogAction;
  detail: string;
  amount?: number;
}

export type LogSummary = { total: number } & Record<LogAction, number>;

export interface AppendOutcome {
  entry: LogEntry;
  persisted: boolean;
  error?: string;
}
