import { readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { UserRefreshClient } from "google-auth-library";
import { SourceError, StayLockError, describeError, type Booking, type BookingSource } from "@stay-lock/core";
import { parseBookingRows, readFirstSheet, type BookingColumns } from "./workbook.js";

export interface WorkbookLoader {
  load(fileId: string): Promise<Buffer>;
}

export class DirectoryWorkbookLoader implements WorkbookLoader {
  constructor(private readonly directory: string) {}

  async load(fileId: string): Promise<Buffer> {
    const fileName = extname(fileId) ? fileId : `${fileId}.xlsx`;
    return readFile(join(this.directory, fileName));
  }
}

export const DRIVE_READONLY_SCOPE = "https://www.googleapis.com/auth/drive.readonly";

export type AuthorizedUserFile = {
  type?: "authorized_user";
  client_id: string;
  client_secret: string;
  refresh_token: string;
  token?: string;
};

export function isAuthorizedUserFile(value: unknown): value is AuthorizedUserFile {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.client_id === "string" &&
    typeof record.client_secret === "string" &&
    typeof record.refresh_token === "string" &&
    (record.token === undefined || typeof record.token === "string")
  );
}

export async function readAuthorizedUserFile(path: string): Promise<AuthorizedUserFile> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
  if (!isAuthorizedUserFile(parsed)) {
    throw new SourceError(`${path} is not an authorized user credential`);
  }
  return parsed;
}

/** Downloads the workbook from Google Drive with a stored OAuth user credential (read-only scope). */
export class DriveWorkbookLoader implements WorkbookLoader {
  private client: UserRefreshClient | null = null;

  constructor(private readonly options: { tokenPath: string; timeoutMs: number }) {}

  private async authClient(): Promise<UserRefreshClient> {
    if (this.client) {
      return this.client;
    }
    const parsed = await readAuthorizedUserFile(this.options.tokenPath);
    const client = new UserRefreshClient(parsed.client_id, parsed.client_secret, parsed.refresh_token);
    if (parsed.token) {
      client.setCredentials({ access_token: parsed.token, refresh_token: parsed.refresh_token });
    }
    this.client = client;
    return client;
  }

  async load(fileId: string): Promise<Buffer> {
    const client = await this.authClient();
    const response = await client.request<ArrayBuffer>({
      url: `https://www.googleapis.com/drive/v3/files/${encodeURIComponent(fileId)}?alt=media`,
      responseType: "arraybuffer",
      timeout: this.options.timeoutMs
    });
    return Buffer.from(response.data);
  }
}

export class WorkbookBookingSource implements BookingSource {
  constructor(
    private readonly loader: WorkbookLoader,
    private readonly columns: BookingColumns,
    private readonly headerScanRows: number
  ) {}

  async fetch(fileId: string): Promise<Booking[]> {
    try {
      const data = await this.loader.load(fileId);
      return parseBookingRows(readFirstSheet(data), this.columns, this.headerScanRows);
    } catch (error) {
      if (error instanceof StayLockError) {
        throw error;
      }
      throw new SourceError(`Booking file ${fileId} could not be read: ${describeError(error)}`, { cause: error });
    }
  }
}
