import * as crypto from 'crypto';
import {
  ConfigurationError,
  SignatureVerificationError,
} from '../domain/errors';

export const SIGNATURE_HEADER = 'x-hub-signature-256';
export const SIGNATURE_PREFIX = 'sha256=';

export type IncomingHeaders = Record<string, string | string[] | undefined>;

/**
 * Webhook signature verifier
 *
 * The platform signs every delivery with HMAC-SHA256 of the raw body keyed by
 * the app secret and sends it as `X-Hub-Signature-256: sha256=<hex>`.
 * Comparison is constant-time.
 */
export class SignatureVerifier {
  constructor(private readonly appSecret?: string) {}

  /**
   * Compute the header value the platform would send for `rawBody`
   */
  static sign(rawBody: Buffer | string, secret: string): string {
    const digest = crypto
      .createHmac('sha256', secret)
      .update(rawBody)
      .digest('hex');
    return `${SIGNATURE_PREFIX}${digest}`;
  }

  /**
   * Find the signature header regardless of header-name casing
   */
  static extractHeader(headers: IncomingHeaders): string | undefined {
    for (const [name, value] of Object.entries(headers)) {
      if (name.toLowerCase() !== SIGNATURE_HEADER) {
        continue;
      }
      return Array.isArray(value) ? value[0] : value;
    }
    return undefined;
  }

  /**
   * Verify `signatureHeader` against `rawBody`.
   * Throws ConfigurationError when no secret is configured and
   * SignatureVerificationError on any rejection.
   */
  verify(rawBody: Buffer, signatureHeader: string | undefined): true {
    if (!this.appSecret) {
      throw new ConfigurationError(
        'Webhook app secret is not configured',
        'WHATSAPP_APP_SECRET',
      );
    }

    if (!signatureHeader) {
      throw new SignatureVerificationError(
        'Missing signature header',
        'missing_header',
      );
    }

    if (!signatureHeader.startsWith(SIGNATURE_PREFIX)) {
      throw new SignatureVerificationError(
        `Signature header must start with '${SIGNATURE_PREFIX}'`,
        'malformed_header',
      );
    }

    const expected = SignatureVerifier.sign(rawBody, this.appSecret);
    if (!this.timingSafeEqual(expected, signatureHeader)) {
      throw new SignatureVerificationError(
        'Signature does not match payload',
        'mismatch',
      );
    }

    return true;
  }

  /**
   * Boolean form of verify() for callers that only branch on the result
   */
  isValid(rawBody: Buffer, signatureHeader: string | undefined): boolean {
    try {
      return this.verify(rawBody, signatureHeader);
    } catch (error) {
      if (error instanceof SignatureVerificationError) {
        return false;
      }
      throw error;
    }
  }

  private timingSafeEqual(a: string, b: string): boolean {
    const bufferA = Buffer.from(a);
    const bufferB = Buffer.from(b);

    if (bufferA.length !== bufferB.length) {
      return false;
    }

    return crypto.timingSafeEqual(bufferA, bufferB);
  }
}
