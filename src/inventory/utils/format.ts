export function formatMoney(value: number): string {
  return value.toFixed(2);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
