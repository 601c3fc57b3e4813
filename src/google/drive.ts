import type { drive_v3 } from "googleapis";
import { UpstreamError } from "../errors.js";
import { callGoogle, opt } from "./request.js";
import type { DriveFile, DriveGateway, ShareRole } from "./types.js";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const FILE_FIELDS = "id,name,mimeType,modifiedTime,webViewLink";

function escapeQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** Drive `q` expression: excludes trashed files, optionally scoped to a folder. */
export function buildFileQuery(query?: string, folderId?: string): string {
  const clauses = ["trashed = false"];
  if (folderId) clauses.push(`'${escapeQuery(folderId)}' in parents`);
  if (query) clauses.push(`(${query})`);
  return clauses.join(" and ");
}

function toFile(file: drive_v3.Schema$File): DriveFile {
  if (!file.id) throw new UpstreamError("Drive did not return a file ID");
  return {
    id: file.id,
    name: file.name ?? "",
    mimeType: file.mimeType ?? "",
    modifiedTime: opt(file.modifiedTime),
    webViewLink: opt(file.webViewLink),
  };
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  throw new UpstreamError("Drive export returned an unexpected payload");
}

export class DriveApi implements DriveGateway {
  constructor(private readonly drive: drive_v3.Drive) {}

  async list(options: { query?: string; folderId?: string; limit: number }): Promise<DriveFile[]> {
    const res = await callGoogle("Drive list", () =>
      this.drive.files.list({
        q: buildFileQuery(options.query, options.folderId),
        pageSize: options.limit,
        orderBy: "modifiedTime desc",
        fields: `files(${FILE_FIELDS})`,
      })
    );
    return (res.data.files ?? []).map(toFile);
  }

  async createFile(options: {
    name: string;
    mimeType: string;
    content?: string;
    folderId?: string;
  }): Promise<DriveFile> {
    // Google-native targets are converted from uploaded plain text.
    const uploadType = options.mimeType.startsWith("application/vnd.google-apps.")
      ? "text/plain"
      : options.mimeType;
    const res = await callGoogle("Drive create", () =>
      this.drive.files.create({
        requestBody: {
          name: options.name,
          mimeType: options.mimeType,
          parents: options.folderId ? [options.folderId] : undefined,
        },
        media:
          options.content === undefined
            ? undefined
            : { mimeType: uploadType, body: options.content },
        fields: FILE_FIELDS,
      })
    );
    return toFile(res.data);
  }

  createFolder(name: string, parentId?: string): Promise<DriveFile> {
    return this.createFile({ name, mimeType: FOLDER_MIME_TYPE, folderId: parentId });
  }

  async share(fileId: string, email: string, role: ShareRole): Promise<{ permissionId: string }> {
    const res = await callGoogle("Drive share", () =>
      this.drive.permissions.create({
        fileId,
        sendNotificationEmail: false,
        transferOwnership: role === "owner",
        requestBody: { type: "user", role, emailAddress: email },
        fields: "id",
      })
    );
    return { permissionId: res.data.id ?? "" };
  }

  async remove(fileId: string): Promise<void> {
    await callGoogle("Drive delete", () => this.drive.files.delete({ fileId }));
  }

  async export(fileId: string, mimeType: string): Promise<Buffer> {
    const res = await callGoogle("Drive export", () =>
      this.drive.files.export({ fileId, mimeType }, { responseType: "arraybuffer" })
    );
    return toBuffer(res.data);
  }
}
