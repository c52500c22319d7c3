function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * `YYYYMMDD_HHMMSS` in local time. One value is shared by every file of a run.
 */
export function formatRunTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}`
}
