import { Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import { DocumentEncoder, TranscriptDocument } from "./transcriptDocument";

export class DocxEncoder implements DocumentEncoder {
  readonly extension = "docx";

  async encode(document: TranscriptDocument): Promise<Buffer> {
    const bodyParagraphs = document.body.split(/\r?\n/).map((line) => new Paragraph({ text: line }));

    const docx = new Document({
      sections: [
        {
          children: [
            new Paragraph({ text: document.title, heading: HeadingLevel.TITLE }),
            ...bodyParagraphs,
            new Paragraph({ text: "" }),
            new Paragraph({ children: [new TextRun({ text: document.footer, italics: true })] })
          ]
        }
      ]
    });

    return Packer.toBuffer(docx);
  }
}
