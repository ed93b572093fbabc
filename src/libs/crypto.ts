import { createHash, createHmac } from 'crypto';

/**
 * Kraken private endpoint signature:
 * base64(HMAC-SHA512(base64decode(secret), path + SHA256(nonce + postData)))
 */
export function signKrakenRequest(urlPath: string, nonce: string, postData: string, secretB64: string): string {
  const digest = createHash('sha256').update(nonce + postData, 'utf8').digest();
  const message = Buffer.concat([Buffer.from(urlPath, 'utf8'), digest]);
  return createHmac('sha512', Buffer.from(secretB64, 'base64')).update(message).digest('base64');
}

/**
 * Millisecond nonces that never repeat or go backwards within a process,
 * even when two requests are signed in the same millisecond
 */
export class NonceSource {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): string {
    const candidate = this.now();
    this.last = candidate > this.last ? candidate : this.last + 1;
    return String(this.last);
  }
}
