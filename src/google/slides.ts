import type { slides_v1 } from "googleapis";
import { UpstreamError } from "../errors.js";
import { callGoogle } from "./request.js";
import type { PresentationDetail, PresentationRef, SlideText, SlidesGateway } from "./types.js";

export function presentationUrl(id: string): string {
  return `https://docs.google.com/presentation/d/${id}/edit`;
}

function textOf(text: slides_v1.Schema$TextContent | null | undefined): string {
  return (text?.textElements ?? [])
    .map((e) => e.textRun?.content ?? "")
    .join("")
    .trim();
}

/** Text of each shape and table cell on a slide, in page order, blanks dropped. */
export function slideText(page: slides_v1.Schema$Page): SlideText {
  const text: string[] = [];
  for (const element of page.pageElements ?? []) {
    text.push(textOf(element.shape?.text));
    for (const row of element.table?.tableRows ?? []) {
      for (const cell of row.tableCells ?? []) {
        text.push(textOf(cell.text));
      }
    }
  }
  return { objectId: page.objectId ?? "", text: text.filter((t) => t !== "") };
}

export class SlidesApi implements SlidesGateway {
  constructor(private readonly slides: slides_v1.Slides) {}

  async create(title: string): Promise<PresentationRef> {
    const res = await callGoogle("Slides create", () =>
      this.slides.presentations.create({ requestBody: { title } })
    );
    const id = res.data.presentationId;
    if (!id) throw new UpstreamError("Slides did not return a presentation ID");
    return { presentationId: id, title: res.data.title ?? title, url: presentationUrl(id) };
  }

  async read(presentationId: string): Promise<PresentationDetail> {
    const res = await callGoogle("Slides read", () =>
      this.slides.presentations.get({ presentationId })
    );
    return {
      presentationId,
      title: res.data.title ?? "",
      url: presentationUrl(presentationId),
      slides: (res.data.slides ?? []).map(slideText),
    };
  }
}
