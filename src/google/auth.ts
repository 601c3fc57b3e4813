import { randomBytes } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import path from "node:path";
import express from "express";
import { google } from "googleapis";
import type { Auth } from "googleapis";
import open from "open";
import type { Logger } from "pino";
import { z } from "zod";
import { AuthenticationError, errorMessage } from "../errors.js";
import { logger as defaultLogger } from "../logger.js";

export const SCOPES = [
  "https://www.googleapis.com/auth/gmail.modify",
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/documents",
  "https://www.googleapis.com/auth/drive",
  "https://www.googleapis.com/auth/presentations",
  "https://www.googleapis.com/auth/calendar",
];

const DEFAULT_TOKEN_URI = "https://oauth2.googleapis.com/token";
const AUTHORIZE_TIMEOUT_MS = 5 * 60 * 1000;

/** On-disk token layout, shared with the authorized-user files other Google tooling writes. */
export const storedTokenSchema = z.object({
  token: z.string().optional(),
  refresh_token: z.string().optional(),
  token_uri: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  expiry: z.string().optional(),
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

export interface GoogleAuthOptions {
  clientId?: string;
  clientSecret?: string;
  tokenFile: string;
  accountsDir: string;
  logger?: Logger;
  /** Opens the consent URL; replaced in tests. */
  openUrl?: (url: string) => Promise<unknown>;
}

/** Token file for an account: the default file, or `<accountsDir>/<account>.json`. */
export function tokenPath(options: Pick<GoogleAuthOptions, "tokenFile" | "accountsDir">, account?: string): string {
  if (!account) return options.tokenFile;
  const safe = account.replace(/[^a-zA-Z0-9@._-]/g, "_");
  return path.join(options.accountsDir, `${safe}.json`);
}

export function toCredentials(stored: StoredToken): Auth.Credentials {
  const expiry = stored.expiry ? Date.parse(stored.expiry) : NaN;
  return {
    access_token: stored.token,
    refresh_token: stored.refresh_token,
    scope: stored.scopes?.join(" "),
    expiry_date: Number.isNaN(expiry) ? undefined : expiry,
  };
}

/** Merge fresh credentials over what is stored; Google omits the refresh token on refresh. */
export function mergeCredentials(
  stored: StoredToken,
  credentials: Auth.Credentials,
  client: { clientId: string; clientSecret: string }
): StoredToken {
  return {
    token: credentials.access_token ?? stored.token,
    refresh_token: credentials.refresh_token ?? stored.refresh_token,
    token_uri: stored.token_uri ?? DEFAULT_TOKEN_URI,
    client_id: client.clientId,
    client_secret: client.clientSecret,
    scopes: credentials.scope ? credentials.scope.split(" ") : stored.scopes ?? SCOPES,
    expiry:
      typeof credentials.expiry_date === "number"
        ? new Date(credentials.expiry_date).toISOString()
        : stored.expiry,
  };
}

export class GoogleAuthProvider {
  private readonly options: GoogleAuthOptions;
  private readonly log: Logger;
  private readonly clients = new Map<string, Auth.OAuth2Client>();

  constructor(options: GoogleAuthOptions) {
    this.options = options;
    this.log = (options.logger ?? defaultLogger).child({ component: "google-auth" });
  }

  async readToken(account?: string): Promise<StoredToken | undefined> {
    const file = tokenPath(this.options, account);
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new AuthenticationError(`Token file ${file} is not valid JSON`);
    }
    const parsed = storedTokenSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthenticationError(`Token file ${file} has an unexpected format`);
    }
    return parsed.data;
  }

  async writeToken(token: StoredToken, account?: string): Promise<string> {
    const file = tokenPath(this.options, account);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, JSON.stringify(token, null, 2) + "\n", { mode: 0o600 });
    return file;
  }

  /** Authorized client for an account. Cached per account for the life of the process. */
  async getClient(account?: string): Promise<Auth.OAuth2Client> {
    const key = account ?? "";
    const cached = this.clients.get(key);
    if (cached) return cached;

    const stored = await this.readToken(account);
    if (!stored || (!stored.refresh_token && !stored.token)) {
      const who = account ? ` for ${account}` : "";
      throw new AuthenticationError(
        `No Google token found${who}. Run 'workspace-mcp auth${account ? ` ${account}` : ""}' first`
      );
    }

    const client = this.clientCredentials(stored);
    const oauth = new google.auth.OAuth2(client.clientId, client.clientSecret);
    oauth.setCredentials(toCredentials(stored));
    oauth.on("tokens", (credentials) => {
      this.writeToken(mergeCredentials(stored, credentials, client), account).catch(
        (error: unknown) => this.log.warn({ err: error }, "failed to persist refreshed token")
      );
    });

    this.clients.set(key, oauth);
    return oauth;
  }

  /**
   * Interactive consent: serve a loopback callback, open the consent page,
   * exchange the returned code and store the token.
   */
  async authorize(account?: string): Promise<string> {
    const client = this.clientCredentials();
    const state = randomBytes(16).toString("hex");

    const { server, redirectUri, code } = await this.listenForCode(state);
    // The callback can fail while the browser is still opening; it is awaited below.
    code.catch((error: unknown) => this.log.debug({ error: errorMessage(error) }, "consent callback failed"));
    try {
      const oauth = new google.auth.OAuth2(client.clientId, client.clientSecret, redirectUri);
      const url = oauth.generateAuthUrl({
        access_type: "offline",
        prompt: "consent",
        scope: SCOPES,
        state,
        login_hint: account,
      });

      this.log.info({ url }, "opening browser for Google consent");
      process.stderr.write(`If the browser does not open, visit:\n${url}\n`);
      await (this.options.openUrl ?? open)(url);

      const { tokens } = await oauth.getToken(await code);
      const file = await this.writeToken(
        mergeCredentials({ token_uri: DEFAULT_TOKEN_URI }, tokens, client),
        account
      );
      this.clients.delete(account ?? "");
      return file;
    } finally {
      server.close();
    }
  }

  private clientCredentials(stored?: StoredToken): { clientId: string; clientSecret: string } {
    const clientId = this.options.clientId ?? stored?.client_id;
    const clientSecret = this.options.clientSecret ?? stored?.client_secret;
    if (!clientId || !clientSecret) {
      throw new AuthenticationError(
        "Google OAuth client credentials are missing. Set GOOGLE_OAUTH_CLIENT_ID and GOOGLE_OAUTH_CLIENT_SECRET, then run 'workspace-mcp auth'"
      );
    }
    return { clientId, clientSecret };
  }

  private listenForCode(
    state: string
  ): Promise<{ server: Server; redirectUri: string; code: Promise<string> }> {
    let settle: { resolve: (code: string) => void; reject: (error: Error) => void } | undefined;
    const code = new Promise<string>((resolve, reject) => {
      settle = { resolve, reject };
    });
    const timer = setTimeout(
      () => settle?.reject(new AuthenticationError("Timed out waiting for Google consent")),
      AUTHORIZE_TIMEOUT_MS
    );
    timer.unref();

    const app = express();
    app.get("/callback", (req, res) => {
      const { code: received, state: returned, error } = req.query;
      if (typeof error === "string") {
        res.status(400).send(`Authorization failed: ${error}`);
        settle?.reject(new AuthenticationError(`Authorization failed: ${error}`));
      } else if (returned !== state || typeof received !== "string") {
        res.status(400).send("Invalid authorization response");
        settle?.reject(new AuthenticationError("Invalid authorization response"));
      } else {
        res.send("Authorization complete. You can close this window.");
        settle?.resolve(received);
      }
      clearTimeout(timer);
    });

    return new Promise((resolve, reject) => {
      const server = app.listen(0, "127.0.0.1", () => {
        const address: AddressInfo | string | null = server.address();
        if (address === null || typeof address === "string") {
          reject(new AuthenticationError("Could not start the local callback server"));
          return;
        }
        resolve({ server, redirectUri: `http://127.0.0.1:${address.port}/callback`, code });
      });
      server.on("error", reject);
    });
  }
}
