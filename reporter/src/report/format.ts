function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** YYYY-MM-DD HH:MM in UTC. */
export function formatMinute(timestamp: number): string {
  const d = new Date(timestamp);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`
  );
}

/** YYYY-MM-DD HH:MM:SS in UTC. */
export function formatSecond(timestamp: number): string {
  return `${formatMinute(timestamp)}:${pad(new Date(timestamp).getUTCSeconds())}`;
}

export function formatDay(timestamp: number): string {
  return formatMinute(timestamp).slice(0, 10);
}

export function formatScore(score: number): string {
  return score.toFixed(1);
}

export function formatOptional(value: number | undefined): string {
  return value === undefined ? "-" : String(Number(value.toFixed(3)));
}
