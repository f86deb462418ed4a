import type { TwilioClient } from '@phonekey/clients';

export interface SmsGateway {
  /** Returns the provider's delivery reference. Throws on any failure. */
  send(phoneE164: string, message: string): Promise<string>;
}

export class TwilioSmsGateway implements SmsGateway {
  constructor(private readonly twilio: TwilioClient) {}

  async send(phoneE164: string, message: string): Promise<string> {
    return this.twilio.sendSms(phoneE164, message);
  }
}
