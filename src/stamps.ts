/**
 * Date and time stamps used in log paths and log lines (local time)
 */

function pad(value: number, width: number = 2): string {
  return value.toString().padStart(width, "0");
}

/** YYYY-MM-DD */
export function createDatestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** HHMMSS */
export function createTimestamp(date: Date): string {
  return `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** YYYY-MM-DD_HHMMSS */
export function createLogDatetimeStamp(date: Date): string {
  return `${createDatestamp(date)}_${createTimestamp(date)}`;
}

/**
 * Compose the identifier shared by every logger of one program run.
 * The run name, when given, is appended to the datetime stamp.
 */
export function composeRunId(date: Date, runName?: string): string {
  const stamp = createLogDatetimeStamp(date);
  return runName ? `${stamp}_${runName}` : stamp;
}

/** Timestamp written into log lines: YYYY-MM-DD HH:mm:ss,SSS */
export function formatRecordTime(date: Date): string {
  const hours = pad(date.getHours());
  const minutes = pad(date.getMinutes());
  const seconds = pad(date.getSeconds());
  return `${createDatestamp(date)} ${hours}:${minutes}:${seconds},${pad(date.getMilliseconds(), 3)}`;
}
