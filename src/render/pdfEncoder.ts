import { parseInteger } from "../config";
import { ProcessRunner, runProcess } from "../process/runProcess";
import { DocumentEncoder, TranscriptDocument, buildTranscriptHtml } from "./transcriptDocument";

export type PdfEncoderConfig = {
  binary: string;
  timeoutMs: number;
};

/** Renders the HTML form of the document through wkhtmltopdf (stdin → stdout). */
export class PdfEncoder implements DocumentEncoder {
  readonly extension = "pdf";
  private readonly config: PdfEncoderConfig;
  private readonly run: ProcessRunner;

  constructor(config?: Partial<PdfEncoderConfig>, run: ProcessRunner = runProcess) {
    this.config = {
      binary: config?.binary ?? process.env.WKHTMLTOPDF_PATH ?? "wkhtmltopdf",
      timeoutMs: config?.timeoutMs ?? parseInteger(process.env.RENDER_TIMEOUT_MS, 60000)
    };
    this.run = run;
  }

  async encode(document: TranscriptDocument, signal?: AbortSignal): Promise<Buffer> {
    const args = [
      "--quiet",
      "--page-size",
      "A4",
      "--margin-top",
      "0.75in",
      "--margin-right",
      "0.75in",
      "--margin-bottom",
      "0.75in",
      "--margin-left",
      "0.75in",
      "--encoding",
      "UTF-8",
      "-",
      "-"
    ];

    const result = await this.run(this.config.binary, args, {
      timeoutMs: this.config.timeoutMs,
      input: buildTranscriptHtml(document),
      signal
    });

    if (result.code !== 0) {
      throw new Error(`wkhtmltopdf exited with ${result.code}: ${result.stderr.trim() || "no output"}`);
    }
    if (result.stdout.length === 0) {
      throw new Error("wkhtmltopdf produced an empty document");
    }
    return result.stdout;
  }
}
