export const WAVE_FORMAT_PCM = 1;
export const WAVE_FORMAT_IEEE_FLOAT = 3;
export const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
  dataOffset: number;
  /** Bytes of sample data actually present; may be less than declared for a truncated file. */
  dataBytes: number;
  durationSeconds: number;
}

export interface WavHeaderSummary {
  riff: boolean;
  wave: boolean;
  first16Hex: string;
}

export function isRiffWav(buffer: Buffer): boolean {
  return (
    buffer.length >= 12 &&
    buffer.toString('ascii', 0, 4) === 'RIFF' &&
    buffer.toString('ascii', 8, 12) === 'WAVE'
  );
}

export function describeWavHeader(buffer: Buffer): WavHeaderSummary {
  const riff = buffer.length >= 4 && buffer.toString('ascii', 0, 4) === 'RIFF';
  const wave = buffer.length >= 12 && buffer.toString('ascii', 8, 12) === 'WAVE';
  return { riff, wave, first16Hex: buffer.subarray(0, 16).toString('hex') };
}

export function parseWavInfo(buffer: Buffer): WavInfo {
  if (!isRiffWav(buffer)) {
    throw new Error('invalid_riff_header');
  }

  let offset = 12;
  let audioFormat: number | null = null;
  let channels: number | null = null;
  let sampleRateHz: number | null = null;
  let bitsPerSample: number | null = null;
  let dataOffset: number | null = null;
  let declaredDataBytes: number | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const chunkStart = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkStart + 16 > buffer.length) {
        throw new Error('fmt_chunk_truncated');
      }
      audioFormat = buffer.readUInt16LE(chunkStart);
      channels = buffer.readUInt16LE(chunkStart + 2);
      sampleRateHz = buffer.readUInt32LE(chunkStart + 4);
      bitsPerSample = buffer.readUInt16LE(chunkStart + 14);
      if (audioFormat === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 26 && chunkStart + 26 <= buffer.length) {
        // sub-format GUID starts with the real format tag
        audioFormat = buffer.readUInt16LE(chunkStart + 24);
      }
    } else if (chunkId === 'data') {
      dataOffset = chunkStart;
      declaredDataBytes = chunkSize;
      break;
    }

    const paddedSize = chunkSize + (chunkSize % 2);
    const nextOffset = chunkStart + paddedSize;
    if (nextOffset <= offset) {
      break;
    }
    offset = nextOffset;
  }

  if (audioFormat === null || channels === null || sampleRateHz === null || bitsPerSample === null) {
    throw new Error('missing_fmt_chunk');
  }
  if (dataOffset === null || declaredDataBytes === null) {
    throw new Error('missing_data_chunk');
  }
  if (channels <= 0 || sampleRateHz <= 0 || bitsPerSample <= 0) {
    throw new Error('invalid_format_values');
  }

  const dataBytes = Math.min(declaredDataBytes, buffer.length - dataOffset);
  const bytesPerSample = bitsPerSample / 8;
  const durationSeconds = dataBytes / (sampleRateHz * channels * bytesPerSample);

  return {
    audioFormat,
    channels,
    sampleRateHz,
    bitsPerSample,
    dataOffset,
    dataBytes,
    durationSeconds,
  };
}
