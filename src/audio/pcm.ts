import { parseWavInfo, WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM } from './wavInfo';

export const ENGINE_SAMPLE_RATE_HZ = 16000;

/** Per-channel samples as floats in [-1, 1]. */
export interface PcmAudio {
  sampleRateHz: number;
  channels: Float32Array[];
}

/** Decoded upload plus the 16 kHz mono PCM16 WAV the engines take. */
export interface PreparedAudio {
  audio: PcmAudio;
  engineWav: Buffer;
}

function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

export function frameCount(audio: PcmAudio): number {
  return audio.channels.length === 0 ? 0 : audio.channels[0].length;
}

export function durationSeconds(audio: PcmAudio): number {
  return audio.sampleRateHz > 0 ? frameCount(audio) / audio.sampleRateHz : 0;
}

/**
 * Decodes a RIFF/WAVE buffer holding 16-bit PCM or 32-bit float samples.
 * Throws `unsupported_wav_encoding` for anything else so callers can hand the
 * file to an external decoder instead.
 */
export function decodeWav(wav: Buffer): PcmAudio {
  const info = parseWavInfo(wav);
  const isPcm16 = info.audioFormat === WAVE_FORMAT_PCM && info.bitsPerSample === 16;
  const isFloat32 = info.audioFormat === WAVE_FORMAT_IEEE_FLOAT && info.bitsPerSample === 32;
  if (!isPcm16 && !isFloat32) {
    throw new Error('unsupported_wav_encoding');
  }

  const bytesPerSample = info.bitsPerSample / 8;
  const bytesPerFrame = bytesPerSample * info.channels;
  const frames = Math.floor(info.dataBytes / bytesPerFrame);
  const channels: Float32Array[] = [];
  for (let ch = 0; ch < info.channels; ch += 1) {
    channels.push(new Float32Array(frames));
  }

  for (let i = 0; i < frames; i += 1) {
    const frameOffset = info.dataOffset + i * bytesPerFrame;
    for (let ch = 0; ch < info.channels; ch += 1) {
      const sampleOffset = frameOffset + ch * bytesPerSample;
      channels[ch][i] = isPcm16 ? wav.readInt16LE(sampleOffset) / 32768 : wav.readFloatLE(sampleOffset);
    }
  }

  return { sampleRateHz: info.sampleRateHz, channels };
}

export function downmix(audio: PcmAudio): Float32Array {
  const frames = frameCount(audio);
  if (audio.channels.length === 1) {
    return audio.channels[0];
  }
  const mono = new Float32Array(frames);
  const count = audio.channels.length;
  for (let i = 0; i < frames; i += 1) {
    let sum = 0;
    for (const channel of audio.channels) {
      sum += channel[i];
    }
    mono[i] = sum / count;
  }
  return mono;
}

export function resampleLinear(
  samples: Float32Array,
  inputSampleRateHz: number,
  outputSampleRateHz: number,
): Float32Array {
  if (samples.length === 0) return samples;
  if (inputSampleRateHz <= 0 || outputSampleRateHz <= 0) return samples;
  if (inputSampleRateHz === outputSampleRateHz) return samples;

  const outputLength = Math.max(1, Math.round(samples.length * (outputSampleRateHz / inputSampleRateHz)));
  const output = new Float32Array(outputLength);

  const ratio = inputSampleRateHz / outputSampleRateHz;
  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.min(Math.floor(position), samples.length - 1);
    const nextIndex = Math.min(index + 1, samples.length - 1);
    const frac = position - index;
    const s0 = samples[index];
    const s1 = samples[nextIndex];
    output[i] = s0 + (s1 - s0) * frac;
  }

  return output;
}

export function toEngineSamples(audio: PcmAudio): Float32Array {
  return resampleLinear(downmix(audio), audio.sampleRateHz, ENGINE_SAMPLE_RATE_HZ);
}

function wavHeader(pcmDataBytes: number, sampleRate: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

/** Mono 16-bit PCM WAV from float samples. */
export function encodeWav(samples: Float32Array, sampleRateHz: number): Buffer {
  const pcm = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    pcm.writeInt16LE(clampInt16(Math.round(samples[i] * 32767)), i * 2);
  }
  return Buffer.concat([wavHeader(pcm.length, sampleRateHz, 1), pcm]);
}
