import crypto from 'node:crypto';

const DIGEST_HEX = /^[0-9a-f]{64}$/;

/**
 * Numeric one-time code, each digit drawn independently from the CSPRNG so
 * leading zeros are as likely as any other digit.
 */
export function generateOtp(length = 6): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`invalid_otp_length:${length}`);
  }
  let code = '';
  for (let i = 0; i < length; i += 1) {
    code += crypto.randomInt(0, 10).toString();
  }
  return code;
}

export class OtpHasher {
  constructor(private readonly secret: string) {}

  digest(phoneE164: string, code: string): string {
    return crypto.createHmac('sha256', this.secret).update(`${phoneE164}:${code}`).digest('hex');
  }

  matches(phoneE164: string, code: string, secretDigest: string): boolean {
    if (!DIGEST_HEX.test(secretDigest)) {
      return false;
    }
    const expected = Buffer.from(this.digest(phoneE164, code), 'hex');
    const stored = Buffer.from(secretDigest, 'hex');
    return expected.length === stored.length && crypto.timingSafeEqual(expected, stored);
  }
}
