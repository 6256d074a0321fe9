import { readFileSync } from 'fs';
import { parentPort, workerData } from 'worker_threads';
import { diarizeStereo } from '../diarization/stereo';
import { AudioJob, AudioJobResult, AudioJobSchema, AudioWorkerReply, transferables } from './audioJobs';
import { decodeWav, encodeWav, ENGINE_SAMPLE_RATE_HZ, toEngineSamples } from './pcm';

// Entry point of an audio worker thread: runs the job in workerData, posts
// one reply and exits. Loaded by audioWorkerClient, never imported.

function run(job: AudioJob): AudioJobResult {
  switch (job.kind) {
    case 'prepare': {
      const audio = decodeWav(readFileSync(job.inputPath));
      const engineWav = encodeWav(toEngineSamples(audio), ENGINE_SAMPLE_RATE_HZ);
      return { kind: 'prepare', sampleRateHz: audio.sampleRateHz, channels: audio.channels, engineWav };
    }
    case 'stereo': {
      const result = diarizeStereo({ sampleRateHz: job.sampleRateHz, channels: [job.left, job.right] }, job.mode);
      return { kind: 'stereo', result, left: job.left, right: job.right };
    }
  }
}

function viewsOf(result: AudioJobResult): ArrayBufferView[] {
  return result.kind === 'prepare' ? [...result.channels, result.engineWav] : [result.left, result.right];
}

const port = parentPort;
if (port) {
  let reply: AudioWorkerReply;
  let transfer: ArrayBuffer[] = [];
  const job = AudioJobSchema.safeParse(workerData);
  if (!job.success) {
    reply = { ok: false, message: `invalid audio job: ${job.error.issues.map((issue) => issue.message).join(', ')}` };
  } else {
    try {
      const result = run(job.data);
      reply = { ok: true, result };
      transfer = transferables(viewsOf(result));
    } catch (error) {
      reply = { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
  }
  port.postMessage(reply, transfer);
}
