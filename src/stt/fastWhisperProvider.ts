import fs from "fs/promises";
import path from "path";
import { parseBoolean, parseInteger } from "../config";
import { ProcessRunner, runProcess } from "../process/runProcess";
import { STTInput, STTProvider, TranscriptionResult } from "./types";

type FastWhisperResult = {
  text?: unknown;
  language?: unknown;
  error?: unknown;
};

export type FastWhisperProviderConfig = {
  pythonBin: string;
  scriptPath: string;
  model: string;
  device: string;
  computeType: string;
  language?: string;
  beamSize: number;
  vadFilter: boolean;
  timeoutMs: number;
  autoInstall: boolean;
};

export class FastWhisperSTTProvider implements STTProvider {
  readonly name = "fast-whisper";
  private readonly config: FastWhisperProviderConfig;
  private readonly run: ProcessRunner;

  constructor(config?: Partial<FastWhisperProviderConfig>, run: ProcessRunner = runProcess) {
    this.config = {
      pythonBin: config?.pythonBin ?? process.env.STT_FAST_WHISPER_PYTHON ?? "python3",
      scriptPath:
        config?.scriptPath ??
        process.env.STT_FAST_WHISPER_SCRIPT ??
        path.resolve(process.cwd(), "scripts", "fast-whisper-transcribe.py"),
      model: config?.model ?? process.env.STT_FAST_WHISPER_MODEL ?? "base",
      device: config?.device ?? process.env.STT_FAST_WHISPER_DEVICE ?? "cpu",
      computeType: config?.computeType ?? process.env.STT_FAST_WHISPER_COMPUTE_TYPE ?? "int8",
      language: config?.language ?? process.env.STT_FAST_WHISPER_LANGUAGE,
      beamSize: config?.beamSize ?? parseInteger(process.env.STT_FAST_WHISPER_BEAM_SIZE, 5),
      vadFilter: config?.vadFilter ?? parseBoolean(process.env.STT_FAST_WHISPER_VAD_FILTER, true),
      timeoutMs: config?.timeoutMs ?? parseInteger(process.env.STT_FAST_WHISPER_TIMEOUT_MS, 300000),
      autoInstall: config?.autoInstall ?? parseBoolean(process.env.STT_FAST_WHISPER_AUTO_INSTALL, true)
    };
    this.run = run;
  }

  async ensureReady(): Promise<void> {
    await fs.access(this.config.scriptPath);

    if (!this.config.autoInstall) {
      return;
    }

    const importCheck = await this.runPython(["-c", "import faster_whisper"], 10000);
    if (importCheck.code === 0) {
      return;
    }

    console.log("[stt] faster-whisper missing, installing with pip...");
    const install = await this.runPython(
      ["-m", "pip", "install", "--disable-pip-version-check", "faster-whisper"],
      300000
    );

    if (install.code !== 0) {
      const detail = (install.stderr || install.stdout).trim();
      throw new Error(`failed to install faster-whisper: ${detail || "unknown error"}`);
    }
  }

  async transcribe(input: STTInput): Promise<TranscriptionResult> {
    await fs.access(input.audioPath);

    const args = [
      this.config.scriptPath,
      "--audio",
      input.audioPath,
      "--model",
      this.config.model,
      "--device",
      this.config.device,
      "--compute-type",
      this.config.computeType,
      "--beam-size",
      String(this.config.beamSize),
      "--vad-filter",
      this.config.vadFilter ? "true" : "false"
    ];

    if (this.config.language && this.config.language.trim().length > 0) {
      args.push("--language", this.config.language.trim());
    }

    const result = await this.runPython(args, this.config.timeoutMs, input.signal);
    if (result.code !== 0) {
      throw new Error((result.stderr || result.stdout || "fast-whisper execution failed").trim());
    }

    return parseFastWhisperOutput(result.stdout);
  }

  private async runPython(
    args: string[],
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<{ code: number; stdout: string; stderr: string }> {
    const result = await this.run(this.config.pythonBin, args, { timeoutMs, signal });
    return {
      code: result.code,
      stdout: result.stdout.toString("utf-8"),
      stderr: result.stderr
    };
  }
}

/**
 * The script may print model-loading noise before its result; only the last
 * non-empty line is the JSON payload.
 */
export function parseFastWhisperOutput(stdout: string): TranscriptionResult {
  const lastLine = stdout
    .trim()
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .pop();
  if (!lastLine) {
    return { text: "", language: "" };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(lastLine);
  } catch {
    throw new Error(`invalid fast-whisper output: ${lastLine}`);
  }
  if (typeof decoded !== "object" || decoded === null) {
    throw new Error(`invalid fast-whisper output: ${lastLine}`);
  }
  const parsed: FastWhisperResult = decoded;

  if (typeof parsed.error === "string" && parsed.error.trim()) {
    throw new Error(parsed.error.trim());
  }

  return {
    text: typeof parsed.text === "string" ? parsed.text.trim() : "",
    language: typeof parsed.language === "string" ? parsed.language.trim() : ""
  };
}
