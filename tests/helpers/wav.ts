/** PCM16 WAV with the given per-channel samples (floats in [-1, 1]). */
export function makeWav(channels: number[][], sampleRateHz: number): Buffer {
  const channelCount = channels.length;
  const frames = channelCount === 0 ? 0 : channels[0].length;
  const dataBytes = frames * channelCount * 2;
  const buffer = Buffer.alloc(44 + dataBytes);
  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(channelCount, 22);
  buffer.writeUInt32LE(sampleRateHz, 24);
  buffer.writeUInt32LE(sampleRateHz * channelCount * 2, 28);
  buffer.writeUInt16LE(channelCount * 2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);
  for (let i = 0; i < frames; i += 1) {
    for (let ch = 0; ch < channelCount; ch += 1) {
      const value = Math.max(-32768, Math.min(32767, Math.round(channels[ch][i] * 32767)));
      buffer.writeInt16LE(value, 44 + (i * channelCount + ch) * 2);
    }
  }
  return buffer;
}

/** Mono tone of `seconds` length; amplitude 0.5 square wave. */
export function makeToneWav(seconds: number, sampleRateHz = 16000): Buffer {
  const frames = Math.round(seconds * sampleRateHz);
  const samples: number[] = [];
  for (let i = 0; i < frames; i += 1) {
    samples.push(Math.floor(i / 20) % 2 === 0 ? 0.5 : -0.5);
  }
  return makeWav([samples], sampleRateHz);
}

/**
 * Stereo PCM16 recording where the left channel carries a ±0.5 square wave
 * for the first half and the right channel for the second half.
 */
export function makeAlternatingStereoWav(seconds: number, sampleRateHz: number): Buffer {
  const frames = Math.round(seconds * sampleRateHz);
  const half = Math.floor(frames / 2);
  const wav = makeWav([[], []], sampleRateHz);
  const dataBytes = frames * 4;
  const buffer = Buffer.alloc(44 + dataBytes);
  wav.copy(buffer, 0, 0, 44);
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.writeUInt32LE(dataBytes, 40);
  for (let i = 0; i < frames; i += 1) {
    const value = Math.floor(i / 20) % 2 === 0 ? 16384 : -16384;
    buffer.writeInt16LE(i < half ? value : 0, 44 + i * 4);
    buffer.writeInt16LE(i < half ? 0 : value, 44 + i * 4 + 2);
  }
  return buffer;
}
