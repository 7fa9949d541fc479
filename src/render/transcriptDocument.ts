export type TranscriptDocument = {
  title: string;
  body: string;
  footer: string;
};

export function buildTranscriptDocument(title: string, body: string, generatedAt: Date): TranscriptDocument {
  return {
    title,
    body,
    footer: `— Generated: ${formatTimestamp(generatedAt)}`
  };
}

/** Local time, `YYYY-MM-DD HH:MM`. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export function escapeHtml(input: string): string {
  return input.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function buildTranscriptHtml(document: TranscriptDocument): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    '<head><meta charset="UTF-8"></head>',
    "<body>",
    `<h1>${escapeHtml(document.title)}</h1>`,
    `<pre style="white-space: pre-wrap; font-family: Arial, sans-serif;">${escapeHtml(document.body)}</pre>`,
    `<p><i>${escapeHtml(document.footer)}</i></p>`,
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

export interface DocumentEncoder {
  readonly extension: string;
  encode(document: TranscriptDocument, signal?: AbortSignal): Promise<Buffer>;
}
