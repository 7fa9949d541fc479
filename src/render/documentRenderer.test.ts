import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ProcessRunner, RunProcessOptions } from "../process/runProcess";
import { ScratchTracker } from "../scratch/scratchTracker";
import { Deliverable, DocumentRenderer } from "./documentRenderer";
import { PdfEncoder } from "./pdfEncoder";

const GENERATED_AT = new Date(2026, 2, 4, 9, 30);

async function withScratch(run: (scratch: ScratchTracker) => Promise<void>): Promise<void> {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "voice-scribe-render-"));
  try {
    await run(new ScratchTracker({ rootDir }));
  } finally {
    await fs.rm(rootDir, { recursive: true, force: true });
  }
}

function requireDocument(deliverable: Deliverable) {
  if (deliverable.kind !== "document") {
    assert.fail(`expected a document, got ${deliverable.kind}`);
  }
  return deliverable;
}

test("inline renders message parts without touching scratch", async () => {
  await withScratch(async (scratch) => {
    const renderer = new DocumentRenderer(scratch, {}, { maxMessageLength: 5 });
    const deliverable = await renderer.render("hello world", "inline", GENERATED_AT);

    assert.deepEqual(deliverable, { kind: "messages", parts: ["hello", " worl", "d"] });
    assert.equal(scratch.liveCount(), 0);
  });
});

test("txt writes the transcript as UTF-8 bytes", async () => {
  await withScratch(async (scratch) => {
    const renderer = new DocumentRenderer(scratch);
    const document = requireDocument(await renderer.render("привет, мир", "txt", GENERATED_AT));

    assert.equal(document.displayName, "transcript.txt");
    assert.equal(await fs.readFile(document.file.path, "utf-8"), "привет, мир");
    assert.equal(scratch.isLive(document.file), true);
  });
});

test("pdf feeds escaped HTML to wkhtmltopdf on stdin", async () => {
  const invocations: { command: string; args: string[]; options: RunProcessOptions }[] = [];
  const runner: ProcessRunner = async (command, args, options) => {
    invocations.push({ command, args, options });
    return { code: 0, stdout: Buffer.from("%PDF-1.4 fake"), stderr: "" };
  };

  await withScratch(async (scratch) => {
    const renderer = new DocumentRenderer(
      scratch,
      { pdf: new PdfEncoder({ binary: "wkhtmltopdf-test", timeoutMs: 1234 }, runner) },
      { title: "Notes" }
    );
    const document = requireDocument(await renderer.render("<script>x</script>", "pdf", GENERATED_AT));

    assert.equal(document.displayName, "transcript.pdf");
    assert.equal(await fs.readFile(document.file.path, "utf-8"), "%PDF-1.4 fake");
  });

  assert.equal(invocations.length, 1);
  const [invocation] = invocations;
  assert.equal(invocation.command, "wkhtmltopdf-test");
  assert.deepEqual(invocation.args.slice(-2), ["-", "-"]);
  assert.equal(invocation.options.timeoutMs, 1234);
  const html = invocation.options.input ?? "";
  assert.ok(html.includes("<h1>Notes</h1>"));
  assert.ok(html.includes("&lt;script&gt;x&lt;/script&gt;"));
  assert.ok(html.includes("<p><i>— Generated: 2026-03-04 09:30</i></p>"));
});

test("pdf failure leaves no scratch artifact behind", async () => {
  const runner: ProcessRunner = async () => ({ code: 1, stdout: Buffer.alloc(0), stderr: "boom\n" });

  await withScratch(async (scratch) => {
    const renderer = new DocumentRenderer(scratch, { pdf: new PdfEncoder({}, runner) });

    await assert.rejects(renderer.render("text", "pdf", GENERATED_AT), /wkhtmltopdf exited with 1: boom/);
    assert.equal(scratch.liveCount(), 0);
  });
});

test("empty pdf output is a render failure", async () => {
  const runner: ProcessRunner = async () => ({ code: 0, stdout: Buffer.alloc(0), stderr: "" });

  await withScratch(async (scratch) => {
    const renderer = new DocumentRenderer(scratch, { pdf: new PdfEncoder({}, runner) });

    await assert.rejects(renderer.render("text", "pdf", GENERATED_AT), /empty document/);
  });
});

test("docx produces a zip container", async () => {
  await withScratch(async (scratch) => {
    const renderer = new DocumentRenderer(scratch);
    const document = requireDocument(await renderer.render("line one\nline two", "docx", GENERATED_AT));

    const bytes = await fs.readFile(document.file.path);
    assert.equal(document.displayName, "transcript.docx");
    assert.equal(bytes.subarray(0, 2).toString("latin1"), "PK");
  });
});
