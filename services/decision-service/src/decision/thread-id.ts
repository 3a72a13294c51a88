import { randomBytes } from "node:crypto";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatThreadTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

// Suffix keeps two submissions within the same second apart
export function buildThreadId(date: Date, suffix: string = randomBytes(4).toString("hex")): string {
  return `decision_${formatThreadTimestamp(date)}_${suffix}`;
}
