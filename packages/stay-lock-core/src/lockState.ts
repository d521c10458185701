import { KEYPAD_CODE_KIND, type AccessWindow, type AuthorizationEntry, type LockAuthStore } from "./types.js";

export const WINDOW_TOLERANCE_MS = 60_000;

function normalizeName(value: string): string {
  return value.trim().toLocaleLowerCase("en-US");
}

export function findAuthorization(entries: AuthorizationEntry[], authName: string): AuthorizationEntry | null {
  const wanted = normalizeName(authName);
  return entries.find((entry) => entry.kind === KEYPAD_CODE_KIND && normalizeName(entry.name) === wanted) ?? null;
}

export async function readCurrent(store: LockAuthStore, lockId: number, authName: string): Promise<AuthorizationEntry | null> {
  const entries = await store.list(lockId);
  if (entries.length === 0) {
    return null;
  }
  return findAuthorization(entries, authName);
}

function boundsEqual(a: Date, b: Date, toleranceMs: number): boolean {
  return Math.abs(a.getTime() - b.getTime()) <= toleranceMs;
}

export function windowsEqual(
  a: AccessWindow | null,
  b: AccessWindow | null,
  toleranceMs: number = WINDOW_TOLERANCE_MS
): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return boundsEqual(a.start, b.start, toleranceMs) && boundsEqual(a.end, b.end, toleranceMs);
}
