import { google } from "googleapis";
import type { Auth } from "googleapis";
import type { GoogleAuthProvider } from "./auth.js";
import { CalendarApi } from "./calendar.js";
import { DocsApi } from "./docs.js";
import { DriveApi } from "./drive.js";
import { GmailApi } from "./gmail.js";
import { SheetsApi } from "./sheets.js";
import { SlidesApi } from "./slides.js";
import type { GatewayFactory, WorkspaceGateway } from "./types.js";

export function googleGateway(auth: Auth.OAuth2Client): WorkspaceGateway {
  return {
    gmail: new GmailApi(google.gmail({ version: "v1", auth })),
    sheets: new SheetsApi(google.sheets({ version: "v4", auth })),
    docs: new DocsApi(google.docs({ version: "v1", auth })),
    drive: new DriveApi(google.drive({ version: "v3", auth })),
    slides: new SlidesApi(google.slides({ version: "v1", auth })),
    calendar: new CalendarApi(google.calendar({ version: "v3", auth })),
  };
}

/** One gateway per account, built on first use from that account's stored token. */
export function gatewayFactory(auth: GoogleAuthProvider): GatewayFactory {
  const gateways = new Map<string, WorkspaceGateway>();
  return async (account) => {
    const key = account ?? "";
    const existing = gateways.get(key);
    if (existing) return existing;
    const gateway = googleGateway(await auth.getClient(account));
    gateways.set(key, gateway);
    return gateway;
  };
}
