import { createHash } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

// NUL-separated so ('ab', 'c') and ('a', 'bc') never collide
export function hashParts(...parts: string[]): string {
  return sha256(parts.join('\u0000'));
}

// NFC, unified newlines, trimmed, single spaces, lowercase
export function normalizeText(text: string): string {
  return text
    .normalize('NFC')
    .replace(/\r\n/g, '\n')
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase();
}
