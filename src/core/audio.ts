import { AudioRef } from "../types";

export function inferAudioExtension(audio: AudioRef, fallback = "ogg"): string {
  const fromFilename = audio.fileName?.match(/\.([A-Za-z0-9]+)$/)?.[1];
  if (fromFilename) {
    return sanitizeExtension(fromFilename);
  }

  const normalizedType = (audio.mimeType ?? "").toLowerCase();
  if (normalizedType.includes("audio/ogg")) return "ogg";
  if (normalizedType.includes("audio/mpeg")) return "mp3";
  if (normalizedType.includes("audio/mp4")) return "m4a";
  if (normalizedType.includes("audio/x-m4a")) return "m4a";
  if (normalizedType.includes("audio/wav")) return "wav";
  if (normalizedType.includes("audio/x-wav")) return "wav";
  if (normalizedType.includes("audio/webm")) return "webm";
  if (normalizedType.includes("audio/flac")) return "flac";
  if (normalizedType.includes("audio/amr")) return "amr";
  return sanitizeExtension(fallback);
}

function sanitizeExtension(input: string): string {
  const normalized = input.toLowerCase().replace(/[^a-z0-9]/g, "");
  return normalized || "dat";
}
