import { createHmac, timingSafeEqual } from 'node:crypto';

export type HeaderMap = Record<string, string | string[] | undefined>;

export type SignatureFailureCode = 'MISSING_SIGNATURE' | 'INVALID_SIGNATURE' | 'STALE_TIMESTAMP';

export type SignatureVerificationResult =
  | { valid: true }
  | { valid: false; code: SignatureFailureCode; message: string };

export type VerifySignatureOptions = {
  /** The secret key used to generate the HMAC */
  secret: string;
  /** The raw request body, exactly as received */
  rawBody: Buffer | string;
  /** The signature header value from the request */
  signatureHeader: string | undefined;
  /** Prefix to strip from the signature header, e.g. 'sha256='. Empty for bare digests. */
  signaturePrefix?: string;
};

const MISSING: SignatureVerificationResult = {
  valid: false,
  code: 'MISSING_SIGNATURE',
  message: 'Signature header is missing'
};

const INVALID: SignatureVerificationResult = {
  valid: false,
  code: 'INVALID_SIGNATURE',
  message: 'Signature verification failed'
};

function toBuffer(body: Buffer | string): Buffer {
  return typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;
}

export function computeHmacSha256Hex(secret: string, data: Buffer | string): string {
  return createHmac('sha256', secret).update(toBuffer(data)).digest('hex');
}

const LOWER_HEX = /^[0-9a-f]+$/;

/**
 * Constant-time comparison of two lowercase hex digests. The supplied digest
 * must be whole lowercase hex of the expected length: Buffer.from(..., 'hex')
 * stops at the first bad character and would otherwise ignore a trailing tail.
 */
export function digestsMatch(providedHex: string, expectedHex: string): boolean {
  if (providedHex.length !== expectedHex.length || !LOWER_HEX.test(providedHex)) {
    return false;
  }
  const providedBuffer = Buffer.from(providedHex, 'hex');
  const expectedBuffer = Buffer.from(expectedHex, 'hex');
  if (providedBuffer.length === 0 || providedBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return timingSafeEqual(providedBuffer, expectedBuffer);
}

/**
 * Read a header case-insensitively. Node lowercases incoming header names,
 * but handlers are also called directly with hand-built maps.
 */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const lowered = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== lowered) {
      continue;
    }
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

/**
 * Verify an HMAC-SHA256 signature computed over the raw body.
 */
export function verifyHmacSha256(options: VerifySignatureOptions): SignatureVerificationResult {
  const { secret, rawBody, signatureHeader, signaturePrefix = 'sha256=' } = options;

  if (!signatureHeader) {
    return MISSING;
  }
  if (signaturePrefix && !signatureHeader.startsWith(signaturePrefix)) {
    return INVALID;
  }

  const providedSignature = signatureHeader.slice(signaturePrefix.length);
  const expectedSignature = computeHmacSha256Hex(secret, rawBody);

  return digestsMatch(providedSignature, expectedSignature) ? { valid: true } : INVALID;
}

/**
 * Generate an HMAC-SHA256 signature header value.
 */
export function generateHmacSha256(secret: string, body: Buffer | string, prefix = 'sha256='): string {
  return `${prefix}${computeHmacSha256Hex(secret, body)}`;
}

export const SLACK_SIGNATURE_VERSION = 'v0';
export const SLACK_MAX_CLOCK_SKEW_SECONDS = 5 * 60;

export type VerifySlackSignatureOptions = {
  secret: string;
  rawBody: Buffer | string;
  signatureHeader: string | undefined;
  timestampHeader: string | undefined;
  /** Seconds since epoch; defaults to the current time. */
  nowSeconds?: number;
  maxClockSkewSeconds?: number;
};

/**
 * Slack signs `v0:{timestamp}:{body}` and sends `v0={hex}`. Requests outside
 * the clock skew window are rejected to limit replays.
 */
export function verifySlackSignature(options: VerifySlackSignatureOptions): SignatureVerificationResult {
  const { secret, rawBody, signatureHeader, timestampHeader } = options;
  if (!signatureHeader || !timestampHeader) {
    return MISSING;
  }

  const timestamp = Number(timestampHeader);
  const nowSeconds = options.nowSeconds ?? Math.floor(Date.now() / 1000);
  const maxSkew = options.maxClockSkewSeconds ?? SLACK_MAX_CLOCK_SKEW_SECONDS;
  if (!Number.isFinite(timestamp) || Math.abs(nowSeconds - timestamp) > maxSkew) {
    return { valid: false, code: 'STALE_TIMESTAMP', message: 'Request timestamp outside the accepted window' };
  }

  const baseString = Buffer.concat([
    Buffer.from(`${SLACK_SIGNATURE_VERSION}:${timestampHeader}:`, 'utf-8'),
    toBuffer(rawBody)
  ]);

  return verifyHmacSha256({
    secret,
    rawBody: baseString,
    signatureHeader,
    signaturePrefix: `${SLACK_SIGNATURE_VERSION}=`
  });
}

export function generateSlackSignature(secret: string, timestamp: number | string, body: Buffer | string): string {
  const baseString = Buffer.concat([
    Buffer.from(`${SLACK_SIGNATURE_VERSION}:${timestamp}:`, 'utf-8'),
    toBuffer(body)
  ]);
  return generateHmacSha256(secret, baseString, `${SLACK_SIGNATURE_VERSION}=`);
}

/**
 * Raised when a webhook fails authentication. Never retried: it means the
 * payload was forged or the stored secret is wrong.
 */
export class SignatureValidationError extends Error {
  public readonly code: SignatureFailureCode;
  public readonly status = 401;
  public readonly retryable = false;
  public readonly provider?: string;

  constructor(code: SignatureFailureCode, message: string, provider?: string) {
    super(message);
    this.name = 'SignatureValidationError';
    this.code = code;
    this.provider = provider;
  }
}

/**
 * Throw SignatureValidationError unless the result is valid.
 */
export function assertValidSignature(result: SignatureVerificationResult, provider?: string): void {
  if (!result.valid) {
    throw new SignatureValidationError(result.code, result.message, provider);
  }
}
