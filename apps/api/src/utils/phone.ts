const E164_REGEX = /^\+[1-9]\d{7,14}$/;

/**
 * Normalizes user input to E.164. Ten bare digits are read as a national
 * number in `defaultCountryCode`; digits that already start with that code
 * and are long enough only get the leading `+`.
 */
export function normalizePhoneE164(raw: string | undefined, defaultCountryCode = '1'): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return;
  }

  const digits = trimmed.replace(/\D/g, '');
  if (!digits) {
    return;
  }

  let candidate: string;
  if (trimmed.startsWith('+')) {
    candidate = `+${digits}`;
  } else if (trimmed.startsWith('00')) {
    candidate = `+${digits.slice(2)}`;
  } else if (digits.length === 10) {
    candidate = `+${defaultCountryCode}${digits}`;
  } else if (digits.length === defaultCountryCode.length + 10 && digits.startsWith(defaultCountryCode)) {
    candidate = `+${digits}`;
  } else {
    return;
  }

  return E164_REGEX.test(candidate) ? candidate : undefined;
}

export function maskPhone(phoneE164: string): string {
  if (phoneE164.length <= 6) {
    return '****';
  }
  return `${phoneE164.slice(0, 2)}${'*'.repeat(phoneE164.length - 6)}${phoneE164.slice(-4)}`;
}
