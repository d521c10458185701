import { BackendError, ConfigurationError, describeError } from "./errors.js";
import { readCurrent, windowsEqual } from "./lockState.js";
import { formatLocalDateTime } from "./time.js";
import {
  ALL_WEEKDAYS,
  KEYPAD_CODE_KIND,
  type AccessWindow,
  type AuthorizationEntry,
  type LockAuthStore,
  type Logger,
  type ReconcileOutcome,
  type SyncSettings,
  type UnitConfig,
  type WindowAction
} from "./types.js";

export function planWindowChange(args: { entry: AuthorizationEntry; desired: AccessWindow | null }): WindowAction {
  const { entry, desired } = args;

  if (desired === null) {
    if (entry.currentWindow === null && !entry.openBound) {
      return { type: "already_disabled" };
    }
    return { type: "clear", authId: entry.authId };
  }

  if (!entry.openBound && windowsEqual(entry.currentWindow, desired)) {
    return { type: "already_correct", window: desired };
  }
  return { type: "update", authId: entry.authId, window: desired };
}

function describeAction(unit: UnitConfig, action: WindowAction, timeZone: string): string {
  const code = `code '${unit.authName}'`;
  switch (action.type) {
    case "already_disabled":
      return `${unit.displayName}: no stay - ${code} was already disabled`;
    case "clear":
      return `${unit.displayName}: no stay - ${code} disabled`;
    case "already_correct":
      return `${unit.displayName}: ${code} already correct: ${formatLocalDateTime(action.window.start, timeZone)} to ${formatLocalDateTime(action.window.end, timeZone)}`;
    case "update":
      return `${unit.displayName}: ${code} set valid from ${formatLocalDateTime(action.window.start, timeZone)} to ${formatLocalDateTime(action.window.end, timeZone)}`;
  }
}

async function ensureAuthorization(args: {
  unit: UnitConfig;
  store: LockAuthStore;
  dryRun: boolean;
}): Promise<{ entry: AuthorizationEntry; created: boolean }> {
  const { unit, store, dryRun } = args;
  const existing = await readCurrent(store, unit.lockId, unit.authName);
  if (existing) {
    return { entry: existing, created: false };
  }

  const pin = unit.provisioningPin;
  if (pin === null) {
    throw new ConfigurationError(`Code '${unit.authName}' does not exist on lock ${unit.lockId} and no PIN is configured`);
  }

  if (dryRun) {
    return {
      entry: { authId: "(pending)", name: unit.authName, kind: KEYPAD_CODE_KIND, currentWindow: null, openBound: false },
      created: true
    };
  }

  await store.create({ lockId: unit.lockId, name: unit.authName, pin, weekdayMask: ALL_WEEKDAYS });
  // Re-read rather than use the create response.
  const created = await readCurrent(store, unit.lockId, unit.authName);
  if (!created) {
    throw new BackendError(`Code '${unit.authName}' was created on lock ${unit.lockId} but cannot be found`);
  }
  return { entry: created, created: true };
}

async function forceSyncQuietly(unit: UnitConfig, store: LockAuthStore, logger?: Logger): Promise<void> {
  if (!store.forceSync) {
    return;
  }
  try {
    await store.forceSync(unit.lockId);
    logger?.info(`[OK] ${unit.displayName}: forced sync triggered`);
  } catch (error) {
    logger?.warn(`[WARN] ${unit.displayName}: forced sync failed: ${describeError(error)}`);
  }
}

export async function reconcileUnit(args: {
  unit: UnitConfig;
  desired: AccessWindow | null;
  store: LockAuthStore;
  settings: SyncSettings;
  logger?: Logger;
  note?: string;
}): Promise<ReconcileOutcome> {
  const { unit, desired, store, settings, logger } = args;
  const prefix = settings.dryRun ? "[DRY-RUN] " : "";
  const lines: string[] = [];

  const { entry, created } = await ensureAuthorization({ unit, store, dryRun: settings.dryRun });
  if (created) {
    lines.push(`${prefix}[OK] ${unit.displayName}: code '${unit.authName}' created on lock ${unit.lockId}`);
  }

  const action = planWindowChange({ entry, desired });
  let writes = created && !settings.dryRun ? 1 : 0;

  if (!settings.dryRun && (action.type === "update" || action.type === "clear")) {
    await store.setWindow({
      lockId: unit.lockId,
      authId: action.authId,
      start: action.type === "update" ? action.window.start : null,
      end: action.type === "update" ? action.window.end : null
    });
    writes += 1;
  }

  const message = `${prefix}[OK] ${describeAction(unit, action, settings.timeZone)}${args.note ?? ""}`;
  lines.push(message);

  if (writes > 0 && settings.forceSyncAfterChange) {
    await forceSyncQuietly(unit, store, logger);
  }

  return { action: action.type, created, writes, message, lines };
}
