import {
  ALL_WEEKDAYS,
  BackendError,
  KEYPAD_CODE_KIND,
  createBackendError,
  findAuthorization,
  type AccessWindow,
  type AuthorizationEntry,
  type LockAuthStore
} from "@stay-lock/core";

export type NukiClientOptions = {
  baseUrl: string;
  token: string;
  timeoutMs: number;
};

type RawResponse = {
  status: number;
  ok: boolean;
  text: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseApiDate(value: unknown): Date | null {
  if (typeof value !== "string" || !value.trim()) {
    return null;
  }
  const trimmed = value.trim();
  // Dates without an offset are UTC on this API.
  const withZone = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed) ? trimmed : `${trimmed}Z`;
  const parsed = new Date(withZone);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function parseAuthorization(raw: unknown): AuthorizationEntry {
  if (!isRecord(raw)) {
    throw new BackendError("Malformed authorization entry from lock API");
  }
  const id = raw.id ?? raw.authId;
  if (typeof id !== "string" && typeof id !== "number") {
    throw new BackendError(`Authorization entry without id: ${JSON.stringify(raw).slice(0, 200)}`);
  }

  const from = parseApiDate(raw.allowedFromDate);
  const until = parseApiDate(raw.allowedUntilDate);
  const currentWindow: AccessWindow | null = from && until ? { start: from, end: until } : null;

  return {
    authId: String(id),
    name: typeof raw.name === "string" ? raw.name : "",
    kind: typeof raw.type === "number" ? raw.type : -1,
    currentWindow,
    openBound: (from === null) !== (until === null)
  };
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new BackendError(`Lock API returned invalid JSON for ${what}`, undefined, { cause: error });
  }
}

/** Keypad-code authorizations over the Nuki Web API; no retries, the next pass is the retry. */
export class NukiLockClient implements LockAuthStore {
  constructor(private readonly options: NukiClientOptions) {}

  private async request(method: "GET" | "PUT" | "POST", path: string, body?: unknown): Promise<RawResponse> {
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal
      });
      const text = await response.text();
      return { status: response.status, ok: response.ok, text };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new BackendError(`${method} ${path} timed out after ${this.options.timeoutMs} ms`, undefined, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BackendError(`${method} ${path} failed: ${message}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async list(lockId: number): Promise<AuthorizationEntry[]> {
    const response = await this.request("GET", `/smartlock/${lockId}/auth`);
    if (!response.ok) {
      throw createBackendError(response.status, response.text);
    }
    if (response.status === 204 || !response.text.trim()) {
      return [];
    }
    const payload = parseJson(response.text, `lock ${lockId} authorizations`);
    if (!Array.isArray(payload)) {
      throw new BackendError(`Lock API returned a non-list for lock ${lockId} authorizations`);
    }
    return payload.map(parseAuthorization);
  }

  async create(args: { lockId: number; name: string; pin: string; weekdayMask: number }): Promise<AuthorizationEntry | null> {
    const response = await this.request("PUT", "/smartlock/auth", {
      name: args.name,
      type: KEYPAD_CODE_KIND,
      code: Number(args.pin),
      smartlockIds: [args.lockId],
      allowedWeekDays: args.weekdayMask
    });

    if (response.status === 409) {
      return findAuthorization(await this.list(args.lockId), args.name);
    }
    if (!response.ok) {
      throw createBackendError(response.status, response.text);
    }
    if (!response.text.trim()) {
      return null;
    }
    const payload = parseJson(response.text, "created authorization");
    return isRecord(payload) && (payload.id !== undefined || payload.authId !== undefined) ? parseAuthorization(payload) : null;
  }

  async setWindow(args: { lockId: number; authId: string; start: Date | null; end: Date | null }): Promise<void> {
    const body =
      args.start && args.end
        ? {
            allowedFromDate: args.start.toISOString(),
            allowedUntilDate: args.end.toISOString(),
            allowedWeekDays: ALL_WEEKDAYS
          }
        : { allowedFromDate: null, allowedUntilDate: null };

    const response = await this.request("POST", `/smartlock/${args.lockId}/auth/${encodeURIComponent(args.authId)}`, body);
    if (!response.ok) {
      throw createBackendError(response.status, response.text);
    }
  }

  async forceSync(lockId: number): Promise<void> {
    const response = await this.request("POST", `/smartlock/${lockId}/sync`);
    if (![200, 202, 204].includes(response.status)) {
      throw createBackendError(response.status, response.text);
    }
  }
}
