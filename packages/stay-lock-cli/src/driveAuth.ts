import { readdirSync, readFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { OAuth2Client, type Credentials } from "google-auth-library";
import { ConfigurationError, SourceError } from "@stay-lock/core";
import { DRIVE_READONLY_SCOPE, type AuthorizedUserFile } from "./bookingSource.js";

export type ClientSecret = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

export interface AuthCodeClient {
  generateAuthUrl(options: { access_type: string; prompt: string; scope: string[] }): string;
  getToken(code: string): Promise<{ tokens: Credentials }>;
}

const CLIENT_SECRET_PATTERN = /^client_secret.*\.json$/;
const LOOPBACK_REDIRECT = "http://localhost";

/** First `client_secret*.json` in the directory, falling back to `credentials.json`. */
export function findClientSecretFile(directory: string): string | null {
  const names = readdirSync(directory).sort();
  const match = names.find((name) => CLIENT_SECRET_PATTERN.test(name)) ?? names.find((name) => name === "credentials.json");
  return match ? join(directory, match) : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseClientSecret(raw: unknown, path: string): ClientSecret {
  // Console downloads wrap the client under "installed" (desktop app) or "web".
  const section = isRecord(raw) ? raw.installed ?? raw.web : undefined;
  if (!isRecord(section) || typeof section.client_id !== "string" || typeof section.client_secret !== "string") {
    throw new ConfigurationError(`${path} is not an OAuth client secret file`);
  }
  const redirects = Array.isArray(section.redirect_uris) ? section.redirect_uris : [];
  const redirectUri = redirects.find((uri): uri is string => typeof uri === "string") ?? LOOPBACK_REDIRECT;
  return { clientId: section.client_id, clientSecret: section.client_secret, redirectUri };
}

export function readClientSecret(path: string): ClientSecret {
  return parseClientSecret(JSON.parse(readFileSync(path, "utf8")), path);
}

/** Accepts either the bare code or the whole redirect URL pasted from the browser. */
export function extractAuthCode(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//.test(trimmed)) {
    const code = new URL(trimmed).searchParams.get("code");
    if (!code) {
      throw new ConfigurationError("The pasted URL has no code parameter");
    }
    return code;
  }
  if (!trimmed) {
    throw new ConfigurationError("No authorization code entered");
  }
  return trimmed;
}

export function toAuthorizedUserFile(secret: ClientSecret, tokens: Credentials): AuthorizedUserFile {
  if (!tokens.refresh_token) {
    throw new SourceError("Google did not return a refresh token; revoke the app's access and authorize again");
  }
  const file: AuthorizedUserFile = {
    type: "authorized_user",
    client_id: secret.clientId,
    client_secret: secret.clientSecret,
    refresh_token: tokens.refresh_token
  };
  return tokens.access_token ? { ...file, token: tokens.access_token } : file;
}

export function createAuthCodeClient(secret: ClientSecret): AuthCodeClient {
  return new OAuth2Client(secret.clientId, secret.clientSecret, secret.redirectUri);
}

/**
 * One-time consent flow for the Drive booking source: prints the consent URL, exchanges the code
 * the user pastes back and writes the authorized-user file the Drive loader reads.
 */
export async function authorizeDrive(options: {
  clientSecretPath: string;
  tokenPath: string;
  prompt: (question: string) => Promise<string>;
  createClient?: (secret: ClientSecret) => AuthCodeClient;
  print?: (message: string) => void;
}): Promise<AuthorizedUserFile> {
  const print = options.print ?? console.log;
  const secret = readClientSecret(options.clientSecretPath);
  const client = (options.createClient ?? createAuthCodeClient)(secret);

  const url = client.generateAuthUrl({ access_type: "offline", prompt: "consent", scope: [DRIVE_READONLY_SCOPE] });
  print(`Open this URL, grant read-only Drive access and paste the code (or the full redirect URL):\n${url}`);

  const code = extractAuthCode(await options.prompt("Code: "));
  const { tokens } = await client.getToken(code);
  const file = toAuthorizedUserFile(secret, tokens);

  mkdirSync(dirname(options.tokenPath), { recursive: true });
  writeFileSync(options.tokenPath, `${JSON.stringify(file, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
  print(`Token saved to ${options.tokenPath}`);
  return file;
}
