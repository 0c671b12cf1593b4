/**
 * Message Channels
 *
 * TwilioWhatsAppChannel delivers through the Twilio WhatsApp API.
 * DryRunChannel only logs, for local runs and manual checks.
 */
import twilio from 'twilio';
import { ConfigurationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { MessagingConfig } from '../lib/config.js';
import { maskPhoneNumber } from './format.js';

const log = createLogger('channel');

export interface SentMessage {
  sid: string;
}

export interface MessageStatus {
  status: string;
  errorCode: number | null;
  errorMessage: string | null;
}

export interface MessageChannel {
  readonly name: string;
  send(to: string, body: string): Promise<SentMessage>;
  fetchStatus(sid: string): Promise<MessageStatus>;
}

/**
 * The slice of the Twilio client this module calls
 */
export interface TwilioMessagesClient {
  messages: {
    create(params: { from: string; to: string; body: string }): Promise<{ sid: string }>;
    (sid: string): {
      fetch(): Promise<{ status: string; errorCode: number | null; errorMessage: string | null }>;
    };
  };
}

export class TwilioWhatsAppChannel implements MessageChannel {
  readonly name = 'twilio-whatsapp';
  private readonly client: TwilioMessagesClient;

  constructor(
    private readonly from: string,
    credentials: { accountSid: string; authToken: string },
    client?: TwilioMessagesClient
  ) {
    this.client = client ?? twilio(credentials.accountSid, credentials.authToken);
  }

  async send(to: string, body: string): Promise<SentMessage> {
    const message = await this.client.messages.create({
      from: this.from,
      to: to.startsWith('whatsapp:') ? to : `whatsapp:${to}`,
      body,
    });
    return { sid: message.sid };
  }

  async fetchStatus(sid: string): Promise<MessageStatus> {
    const message = await this.client.messages(sid).fetch();
    return {
      status: message.status,
      errorCode: message.errorCode ?? null,
      errorMessage: message.errorMessage ?? null,
    };
  }
}

export class DryRunChannel implements MessageChannel {
  readonly name = 'dry-run';
  private counter = 0;

  async send(to: string, body: string): Promise<SentMessage> {
    this.counter += 1;
    const sid = `dry-run-${this.counter}`;
    log.info(`[dry-run] Message for ${maskPhoneNumber(to)}:\n${body}`, { sid });
    return { sid };
  }

  async fetchStatus(): Promise<MessageStatus> {
    return { status: 'dry-run', errorCode: null, errorMessage: null };
  }
}

export function createMessageChannel(config: MessagingConfig): MessageChannel {
  if (config.dryRun) {
    return new DryRunChannel();
  }
  if (!config.accountSid || !config.authToken) {
    throw new ConfigurationError('TWILIO_ACCOUNT_SID and TWILIO_AUTH_TOKEN are required unless messaging.dryRun is set');
  }
  return new TwilioWhatsAppChannel(config.from, {
    accountSid: config.accountSid,
    authToken: config.authToken,
  });
}
