// scripts/transcribe_smoke.ts
import { Blob } from "node:buffer";
import fs from "node:fs";
import path from "node:path";
import { fetch, FormData } from "undici";

const API_URL = process.env.TRANSCRIBE_API_URL ?? "http://127.0.0.1:5000";

async function main() {
  const audioPath = process.argv[2];
  if (!audioPath) {
    console.error("Usage: tsx scripts/transcribe_smoke.ts <audio-file> [diarize]");
    process.exit(2);
  }
  const diarize = process.argv[3] === "diarize";

  const health = await fetch(`${API_URL}/health`);
  console.log("health:", health.status, await health.text());

  const form = new FormData();
  form.append("file", new Blob([fs.readFileSync(audioPath)]), path.basename(audioPath));
  if (diarize) {
    form.append("enable_diarization", "true");
  }

  const startedAt = Date.now();
  const res = await fetch(`${API_URL}/api/transcribe`, { method: "POST", body: form });
  console.log("status:", res.status, `(${Date.now() - startedAt}ms)`);
  console.log(await res.text());
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
