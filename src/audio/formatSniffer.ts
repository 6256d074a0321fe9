export type AudioFormat = 'mp3' | 'wav' | 'm4a' | 'flac' | 'ogg' | 'webm' | 'unknown';

export interface AudioFormatInfo {
  extension: string;
  contentType: string;
}

export const FORMAT_INFO: Readonly<Record<AudioFormat, AudioFormatInfo>> = {
  mp3: { extension: 'mp3', contentType: 'audio/mpeg' },
  wav: { extension: 'wav', contentType: 'audio/wav' },
  m4a: { extension: 'm4a', contentType: 'audio/mp4' },
  flac: { extension: 'flac', contentType: 'audio/flac' },
  ogg: { extension: 'ogg', contentType: 'audio/ogg' },
  webm: { extension: 'webm', contentType: 'audio/webm' },
  unknown: { extension: 'bin', contentType: 'application/octet-stream' },
};

const MIN_SNIFF_BYTES = 12;

function ascii(bytes: Buffer, offset: number, text: string): boolean {
  if (bytes.length < offset + text.length) return false;
  return bytes.toString('latin1', offset, offset + text.length) === text;
}

/** Classifies audio bytes by magic number at fixed offsets. Pure. */
export function classify(bytes: Buffer): AudioFormat {
  if (bytes.length < MIN_SNIFF_BYTES) {
    return 'unknown';
  }

  // ID3 tag, or an MPEG frame sync (11 set bits)
  if (ascii(bytes, 0, 'ID3') || (bytes[0] === 0xff && (bytes[1] & 0xe0) === 0xe0)) {
    return 'mp3';
  }
  if (ascii(bytes, 0, 'RIFF') && ascii(bytes, 8, 'WAVE')) {
    return 'wav';
  }
  if (ascii(bytes, 4, 'ftyp')) {
    return 'm4a';
  }
  if (ascii(bytes, 0, 'fLaC')) {
    return 'flac';
  }
  if (ascii(bytes, 0, 'OggS')) {
    return 'ogg';
  }
  if (bytes[0] === 0x1a && bytes[1] === 0x45 && bytes[2] === 0xdf && bytes[3] === 0xa3) {
    return 'webm';
  }
  return 'unknown';
}

const CONTENT_TYPE_FORMATS: Readonly<Record<string, AudioFormat>> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/wave': 'wav',
  'audio/mp4': 'm4a',
  'audio/m4a': 'm4a',
  'audio/x-m4a': 'm4a',
  'audio/flac': 'flac',
  'audio/x-flac': 'flac',
  'audio/ogg': 'ogg',
  'audio/webm': 'webm',
  'video/webm': 'webm',
};

/** Maps a client-declared content type to a format; only used for mismatch logging. */
export function formatFromContentType(contentType: string | null | undefined): AudioFormat | null {
  if (!contentType) return null;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_FORMATS[mediaType] ?? null;
}
