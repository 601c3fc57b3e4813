import type { docs_v1 } from "googleapis";
import { UpstreamError } from "../errors.js";
import { callGoogle } from "./request.js";
import type { DocsGateway, DocumentRef, DocumentText } from "./types.js";

export function documentUrl(id: string): string {
  return `https://docs.google.com/document/d/${id}/edit`;
}

/** Concatenate every text run, descending into tables and tables of contents. */
export function extractText(elements: docs_v1.Schema$StructuralElement[] | null | undefined): string {
  let text = "";
  for (const element of elements ?? []) {
    for (const run of element.paragraph?.elements ?? []) {
      text += run.textRun?.content ?? "";
    }
    for (const row of element.table?.tableRows ?? []) {
      for (const cell of row.tableCells ?? []) {
        text += extractText(cell.content);
      }
    }
    text += extractText(element.tableOfContents?.content);
  }
  return text;
}

function endIndexOf(document: docs_v1.Schema$Document): number {
  const content = document.body?.content ?? [];
  const last = content[content.length - 1];
  return last?.endIndex ?? 1;
}

export class DocsApi implements DocsGateway {
  constructor(private readonly docs: docs_v1.Docs) {}

  async create(title: string, content?: string): Promise<DocumentRef> {
    const res = await callGoogle("Docs create", () =>
      this.docs.documents.create({ requestBody: { title } })
    );
    const id = res.data.documentId;
    if (!id) throw new UpstreamError("Docs did not return a document ID");

    if (content) {
      await this.insert(id, content, 1);
    }
    return { documentId: id, title: res.data.title ?? title, url: documentUrl(id) };
  }

  async read(documentId: string): Promise<DocumentText> {
    const res = await callGoogle("Docs read", () => this.docs.documents.get({ documentId }));
    return {
      documentId,
      title: res.data.title ?? "",
      url: documentUrl(documentId),
      text: extractText(res.data.body?.content),
    };
  }

  async append(documentId: string, text: string): Promise<{ documentId: string; inserted: number }> {
    const res = await callGoogle("Docs read", () => this.docs.documents.get({ documentId }));
    // The body always ends with a newline that cannot be written before.
    await this.insert(documentId, text, Math.max(1, endIndexOf(res.data) - 1));
    return { documentId, inserted: text.length };
  }

  private async insert(documentId: string, text: string, index: number): Promise<void> {
    await callGoogle("Docs update", () =>
      this.docs.documents.batchUpdate({
        documentId,
        requestBody: { requests: [{ insertText: { location: { index }, text } }] },
      })
    );
  }
}
