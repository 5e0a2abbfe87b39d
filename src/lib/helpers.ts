// src/lib/helpers.ts

// Wait for the specified time in milliseconds
export const timeout = (ms: number): Promise<void> =>
  new Promise((ok) => {
    setTimeout(() => ok(), ms);
  });

// Discord ids are snowflakes: numeric strings that grow with creation time
export function compareSnowflakes(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

// Parse `"1, 2,3"` into ids; returns null when any entry is not a number
export function parseIdList(raw: string): string[] | null {
  const ids = raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return ids.every((id) => /^\d+$/.test(id)) ? ids : null;
}
