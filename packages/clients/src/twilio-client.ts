import { randomUUID } from 'node:crypto';

export interface TwilioClientOptions {
  accountSid?: string;
  authToken?: string;
  fromPhone?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

interface TwilioMessageResponse {
  sid?: string;
  status?: string;
}

function maskPhone(phone: string): string {
  return phone.length > 4 ? `${'*'.repeat(phone.length - 4)}${phone.slice(-4)}` : '****';
}

export class TwilioClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: TwilioClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://api.twilio.com';
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  isConfigured(): boolean {
    return Boolean(this.options.accountSid && this.options.authToken && this.options.fromPhone);
  }

  /**
   * Sends an SMS and returns the provider message SID. Without credentials the
   * message is not sent: only the masked destination is printed and a dev
   * reference comes back, so message bodies never reach the console.
   */
  async sendSms(to: string, body: string): Promise<string> {
    const { accountSid, authToken, fromPhone } = this.options;
    if (!accountSid || !authToken || !fromPhone) {
      console.log('[twilio:dev] SMS', { to: maskPhone(to), length: body.length });
      return `dev-${randomUUID()}`;
    }

    const encoded = new URLSearchParams({
      To: to,
      From: fromPhone,
      Body: body
    });

    const token = Buffer.from(`${accountSid}:${authToken}`).toString('base64');
    const res = await fetch(`${this.baseUrl}/2010-04-01/Accounts/${accountSid}/Messages.json`, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${token}`,
        'Content-Type': 'application/x-www-form-urlencoded'
      },
      body: encoded,
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`twilio_send_failed:${res.status}:${text}`);
    }

    const payload = (await res.json()) as TwilioMessageResponse;
    if (!payload.sid) {
      throw new Error('twilio_send_failed:missing_sid');
    }
    return payload.sid;
  }
}
