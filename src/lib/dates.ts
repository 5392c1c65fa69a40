const pad = (n: number) => String(n).padStart(2, '0');

/** Local calendar date as YYYY-MM-DD. */
export function todayIsoDate(now: Date = new Date()): string {
    return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/** Local date and time as YYYY-MM-DD HH:MM. */
export function formatTimestamp(value: Date): string {
    return `${todayIsoDate(value)} ${pad(value.getHours())}:${pad(value.getMinutes())}`;
}
