import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_PREFIX = 'sha256=';

/**
 * Computes the `X-Hub-Signature-256` value for a raw request body.
 */
export function signPayload(payload: Buffer | string, secret: string): string {
  const digest = createHmac('sha256', secret).update(payload).digest('hex');
  return `${SIGNATURE_PREFIX}${digest}`;
}

/**
 * Checks a webhook signature against the raw, unparsed request body.
 *
 * @param payload - Body bytes exactly as received.
 * @param signatureHeader - `X-Hub-Signature-256` header value, if any.
 * @param secret - Shared webhook secret.
 * @returns `true` only when the header carries the expected `sha256=` digest.
 */
export function verifySignature(
  payload: Buffer | string,
  signatureHeader: string | undefined,
  secret: string,
): boolean {
  if (!signatureHeader || !signatureHeader.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const expected = Buffer.from(signPayload(payload, secret), 'utf8');
  const provided = Buffer.from(signatureHeader, 'utf8');
  if (expected.length !== provided.length) {
    return false;
  }

  return timingSafeEqual(expected, provided);
}
