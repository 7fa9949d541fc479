import fs from "fs/promises";
import { DEFAULT_DOCUMENT_TITLE } from "../config";
import { ScratchHandle, ScratchTracker } from "../scratch/scratchTracker";
import { FormatTag } from "../types";
import { MAX_MESSAGE_LENGTH, chunkText } from "./chunkText";
import { DocxEncoder } from "./docxEncoder";
import { PdfEncoder } from "./pdfEncoder";
import { DocumentEncoder, buildTranscriptDocument } from "./transcriptDocument";

export type Deliverable =
  | { kind: "messages"; parts: string[] }
  | { kind: "document"; file: ScratchHandle; displayName: string };

export type DocumentRendererOptions = {
  title: string;
  filenameBase: string;
  maxMessageLength: number;
};

export type DocumentEncoders = {
  docx: DocumentEncoder;
  pdf: DocumentEncoder;
};

/**
 * A `document` deliverable hands its scratch file to the caller, who must
 * release it through the same tracker once delivery is over.
 */
export class DocumentRenderer {
  private readonly scratch: ScratchTracker;
  private readonly encoders: DocumentEncoders;
  private readonly options: DocumentRendererOptions;

  constructor(
    scratch: ScratchTracker,
    encoders?: Partial<DocumentEncoders>,
    options?: Partial<DocumentRendererOptions>
  ) {
    this.scratch = scratch;
    this.encoders = {
      docx: encoders?.docx ?? new DocxEncoder(),
      pdf: encoders?.pdf ?? new PdfEncoder()
    };
    this.options = {
      title: options?.title ?? DEFAULT_DOCUMENT_TITLE,
      filenameBase: options?.filenameBase ?? "transcript",
      maxMessageLength: options?.maxMessageLength ?? MAX_MESSAGE_LENGTH
    };
  }

  async render(text: string, format: FormatTag, generatedAt: Date, signal?: AbortSignal): Promise<Deliverable> {
    switch (format) {
      case "inline":
        return { kind: "messages", parts: chunkText(text, this.options.maxMessageLength) };
      case "txt":
        return this.writeDocument("txt", Buffer.from(text, "utf-8"));
      case "docx":
      case "pdf": {
        const encoder = this.encoders[format];
        const document = buildTranscriptDocument(this.options.title, text, generatedAt);
        const bytes = await encoder.encode(document, signal);
        return this.writeDocument(encoder.extension, bytes);
      }
    }
  }

  private async writeDocument(extension: string, bytes: Buffer): Promise<Deliverable> {
    const file = await this.scratch.create("render", extension);
    try {
      await fs.writeFile(file.path, bytes);
    } catch (error) {
      await this.scratch.release(file);
      throw error;
    }
    return {
      kind: "document",
      file,
      displayName: `${this.options.filenameBase}.${extension}`
    };
  }
}
