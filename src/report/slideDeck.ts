import path from "node:path";
import JSZip from "jszip";
import { getErrorMessage, TemplateUnavailableError } from "../lib/errors";

export type SlideContent = {
  fields: Record<string, string>;
  image: Buffer | null;
};

export const SCREENSHOT_ALT_TEXT = "{{screenshot}}";
export const DESCRIPTION_FIELD = "description";
/** Hundredths of a point. */
export const DESCRIPTION_FONT_SIZE = 1050;

const CONTENT_TYPES_PATH = "[Content_Types].xml";
const PRESENTATION_PATH = "ppt/presentation.xml";
const PRESENTATION_RELS_PATH = "ppt/_rels/presentation.xml.rels";
const APP_PROPS_PATH = "docProps/app.xml";

const SLIDE_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.presentationml.slide+xml";
const SLIDE_REL_TYPE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide";
const IMAGE_REL_TYPE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image";
const EMPTY_RELS =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>';

const TOKEN_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;
const DESCRIPTION_TOKEN = /\{\{\s*description\s*\}\}/;

type Relationship = { id: string; type: string; target: string; tag: string };

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function attr(tag: string, name: string): string | undefined {
  return tag.match(new RegExp(`\\s${escapeRegExp(name)}="([^"]*)"`))?.[1];
}

function parseRelationships(xml: string): Relationship[] {
  const tags = xml.match(/<Relationship\b[^>]*\/>/g) ?? [];
  return tags.map((tag) => ({
    id: attr(tag, "Id") ?? "",
    type: attr(tag, "Type") ?? "",
    target: attr(tag, "Target") ?? "",
    tag,
  }));
}

function nextRelationshipNumber(rels: readonly Relationship[]): number {
  let max = 0;
  for (const rel of rels) {
    const match = rel.id.match(/^rId(\d+)$/);
    if (match) max = Math.max(max, Number(match[1]));
  }
  return max + 1;
}

function appendBefore(xml: string, closingTag: string, fragment: string): string {
  const idx = xml.lastIndexOf(closingTag);
  if (idx === -1) return xml;
  return xml.slice(0, idx) + fragment + xml.slice(idx);
}

/** Resolves a relationship target against the folder of the part that owns it. */
function resolvePart(ownerDir: string, target: string): string {
  if (target.startsWith("/")) return target.slice(1);
  return path.posix.normalize(path.posix.join(ownerDir, target));
}

function relsPathFor(partPath: string): string {
  return `${path.posix.dirname(partPath)}/_rels/${path.posix.basename(partPath)}.rels`;
}

function sizeRun(run: string): string {
  if (!/<a:rPr\b/.test(run)) {
    return run.replace("<a:r>", `<a:r><a:rPr sz="${DESCRIPTION_FONT_SIZE}"/>`);
  }
  return run.replace(/<a:rPr\b[^>]*>/, (tag) =>
    /\ssz="/.test(tag)
      ? tag.replace(/\ssz="[^"]*"/, ` sz="${DESCRIPTION_FONT_SIZE}"`)
      : tag.replace("<a:rPr", `<a:rPr sz="${DESCRIPTION_FONT_SIZE}"`)
  );
}

/**
 * Substitutes `{{field}}` tokens inside text runs. Tokens without a field are
 * left as written. The run holding the description is set to 10.5pt.
 */
export function fillSlideText(xml: string, fields: Record<string, string>): string {
  return xml.replace(/<a:r>[\s\S]*?<\/a:r>/g, (run) => {
    const sized = DESCRIPTION_TOKEN.test(run) ? sizeRun(run) : run;
    return sized.replace(/(<a:t(?:\s[^>]*)?>)([\s\S]*?)(<\/a:t>)/g, (_match, open: string, text: string, close: string) => {
      const filled = text.replace(TOKEN_PATTERN, (token: string, key: string) =>
        Object.hasOwn(fields, key) ? escapeXml(fields[key]) : token
      );
      return `${open}${filled}${close}`;
    });
  });
}

/** Points the picture whose alt text is the screenshot marker at `relId`. */
export function swapScreenshot(xml: string, relId: string | null): string {
  return xml.replace(/<p:pic>[\s\S]*?<\/p:pic>/g, (pic) => {
    if (!pic.includes(`descr="${SCREENSHOT_ALT_TEXT}"`)) return pic;
    const relabeled = pic.replace(`descr="${SCREENSHOT_ALT_TEXT}"`, 'descr="Website screenshot"');
    return relId ? relabeled.replace(/r:embed="[^"]*"/, `r:embed="${relId}"`) : relabeled;
  });
}

type TemplateSlide = {
  partPath: string;
  relId: string;
  xml: string;
  rels: Relationship[];
  relsXml: string;
};

async function readText(zip: JSZip, partPath: string): Promise<string> {
  const file = zip.file(partPath);
  if (!file) {
    throw new TemplateUnavailableError("invalid", `Template is missing ${partPath}.`);
  }
  return file.async("string");
}

/**
 * A .pptx package whose template slide is copied once per case. Built up with
 * `addSlide`, then written once with `toBuffer`.
 */
export class SlideDeck {
  private nextSlideNumber: number;
  private nextSlideId: number;
  private nextPresentationRel: number;
  private finished = false;
  private added = 0;

  private constructor(
    private readonly zip: JSZip,
    private readonly template: TemplateSlide,
    private presentationXml: string,
    private presentationRelsXml: string,
    private contentTypesXml: string
  ) {
    let maxSlide = 0;
    for (const name of Object.keys(zip.files)) {
      const match = name.match(/^ppt\/slides\/slide(\d+)\.xml$/);
      if (match) maxSlide = Math.max(maxSlide, Number(match[1]));
    }
    this.nextSlideNumber = maxSlide + 1;

    let maxId = 255;
    for (const tag of presentationXml.match(/<p:sldId\b[^>]*\/>/g) ?? []) {
      maxId = Math.max(maxId, Number(attr(tag, "id") ?? 0));
    }
    this.nextSlideId = maxId + 1;
    this.nextPresentationRel = nextRelationshipNumber(parseRelationships(presentationRelsXml));
  }

  /** `slideIndex` is 1-based, in presentation order. */
  static async load(template: Buffer, slideIndex: number): Promise<SlideDeck> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(template);
    } catch (err) {
      throw new TemplateUnavailableError("invalid", `Template is not a readable .pptx: ${getErrorMessage(err)}`);
    }

    const presentationXml = await readText(zip, PRESENTATION_PATH);
    const presentationRelsXml = await readText(zip, PRESENTATION_RELS_PATH);
    const contentTypesXml = await readText(zip, CONTENT_TYPES_PATH);

    const slideTags = presentationXml.match(/<p:sldId\b[^>]*\/>/g) ?? [];
    const slideTag = slideTags[slideIndex - 1];
    const relId = slideTag ? attr(slideTag, "r:id") : undefined;
    const rel = parseRelationships(presentationRelsXml).find((entry) => entry.id === relId);
    if (!relId || !rel) {
      throw new TemplateUnavailableError(
        "invalid",
        `Template has no slide ${slideIndex} (found ${slideTags.length}).`
      );
    }

    const partPath = resolvePart("ppt", rel.target);
    const xml = await readText(zip, partPath);
    const relsFile = zip.file(relsPathFor(partPath));
    const relsXml = relsFile ? await relsFile.async("string") : EMPTY_RELS;

    return new SlideDeck(
      zip,
      { partPath, relId, xml, rels: parseRelationships(relsXml), relsXml },
      presentationXml,
      presentationRelsXml,
      contentTypesXml
    );
  }

  get slideCount(): number {
    return this.added;
  }

  addSlide(content: SlideContent): void {
    if (this.finished) throw new Error("Deck already written");

    const number = this.nextSlideNumber++;
    const partPath = `ppt/slides/slide${number}.xml`;

    // Notes belong to the template slide; copies go without.
    let relsXml = this.template.relsXml;
    for (const rel of this.template.rels) {
      if (rel.type.endsWith("/notesSlide")) relsXml = relsXml.replace(rel.tag, "");
    }

    let imageRelId: string | null = null;
    if (content.image) {
      imageRelId = `rId${nextRelationshipNumber(this.template.rels)}`;
      const mediaName = `case-screenshot-${number}.png`;
      this.zip.file(`ppt/media/${mediaName}`, content.image);
      relsXml = appendBefore(
        relsXml,
        "</Relationships>",
        `<Relationship Id="${imageRelId}" Type="${IMAGE_REL_TYPE}" Target="../media/${mediaName}"/>`
      );
    }

    const xml = swapScreenshot(fillSlideText(this.template.xml, content.fields), imageRelId);
    this.zip.file(partPath, xml);
    this.zip.file(relsPathFor(partPath), relsXml);

    const presentationRelId = `rId${this.nextPresentationRel++}`;
    this.presentationRelsXml = appendBefore(
      this.presentationRelsXml,
      "</Relationships>",
      `<Relationship Id="${presentationRelId}" Type="${SLIDE_REL_TYPE}" Target="slides/slide${number}.xml"/>`
    );
    this.presentationXml = appendBefore(
      this.presentationXml,
      "</p:sldIdLst>",
      `<p:sldId id="${this.nextSlideId++}" r:id="${presentationRelId}"/>`
    );
    this.contentTypesXml = appendBefore(
      this.contentTypesXml,
      "</Types>",
      `<Override PartName="/${partPath}" ContentType="${SLIDE_CONTENT_TYPE}"/>`
    );
    this.added += 1;
  }

  private removeTemplateSlide(): void {
    const { partPath, relId, rels } = this.template;

    for (const rel of rels) {
      if (!rel.type.endsWith("/notesSlide")) continue;
      const notesPath = resolvePart(path.posix.dirname(partPath), rel.target);
      this.zip.remove(notesPath);
      this.zip.remove(relsPathFor(notesPath));
      this.contentTypesXml = this.contentTypesXml.replace(
        new RegExp(`<Override\\b[^>]*PartName="/${escapeRegExp(notesPath)}"[^>]*/>`),
        ""
      );
    }

    this.zip.remove(partPath);
    this.zip.remove(relsPathFor(partPath));
    this.contentTypesXml = this.contentTypesXml.replace(
      new RegExp(`<Override\\b[^>]*PartName="/${escapeRegExp(partPath)}"[^>]*/>`),
      ""
    );
    this.presentationXml = this.presentationXml.replace(
      new RegExp(`<p:sldId\\b[^>]*r:id="${escapeRegExp(relId)}"[^>]*/>`),
      ""
    );
    const rel = parseRelationships(this.presentationRelsXml).find((entry) => entry.id === relId);
    if (rel) this.presentationRelsXml = this.presentationRelsXml.replace(rel.tag, "");
  }

  async toBuffer(): Promise<Buffer> {
    if (this.finished) throw new Error("Deck already written");
    this.finished = true;

    this.removeTemplateSlide();
    if (!/Extension="png"/i.test(this.contentTypesXml)) {
      this.contentTypesXml = this.contentTypesXml.replace(
        /<Types\b[^>]*>/,
        (open) => `${open}<Default Extension="png" ContentType="image/png"/>`
      );
    }

    this.zip.file(PRESENTATION_PATH, this.presentationXml);
    this.zip.file(PRESENTATION_RELS_PATH, this.presentationRelsXml);
    this.zip.file(CONTENT_TYPES_PATH, this.contentTypesXml);

    const appProps = this.zip.file(APP_PROPS_PATH);
    if (appProps) {
      const slides = (this.presentationXml.match(/<p:sldId\b[^>]*\/>/g) ?? []).length;
      const xml = await appProps.async("string");
      this.zip.file(APP_PROPS_PATH, xml.replace(/<Slides>\d+<\/Slides>/, `<Slides>${slides}</Slides>`));
    }

    return this.zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  }
}
