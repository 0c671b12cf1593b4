import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../lib/errors.js';
import { createMessageChannel, DryRunChannel, TwilioWhatsAppChannel, type TwilioMessagesClient } from './channel.js';

function fakeTwilio() {
  const fetchStatus = vi.fn(async () => ({ status: 'delivered', errorCode: null, errorMessage: null }));
  const create = vi.fn(async () => ({ sid: 'SM0001' }));
  const context = vi.fn((_sid: string) => ({ fetch: fetchStatus }));
  const client: TwilioMessagesClient = { messages: Object.assign(context, { create }) };
  return { client, create, context, fetchStatus };
}

const credentials = { accountSid: 'test-account-sid', authToken: 'test-auth-token' };

describe('TwilioWhatsAppChannel', () => {
  it('sends from the WhatsApp sender to the prefixed recipient', async () => {
    const { client, create } = fakeTwilio();
    const channel = new TwilioWhatsAppChannel('whatsapp:+14155238886', credentials, client);

    await expect(channel.send('+15555550100', 'hello')).resolves.toEqual({ sid: 'SM0001' });
    expect(create).toHaveBeenCalledWith({
      from: 'whatsapp:+14155238886',
      to: 'whatsapp:+15555550100',
      body: 'hello',
    });
  });

  it('does not double the whatsapp prefix', async () => {
    const { client, create } = fakeTwilio();

    await new TwilioWhatsAppChannel('whatsapp:+14155238886', credentials, client).send('whatsapp:+15555550100', 'x');

    expect(create).toHaveBeenCalledWith(expect.objectContaining({ to: 'whatsapp:+15555550100' }));
  });

  it('fetches the status of a message', async () => {
    const { client, context } = fakeTwilio();
    const channel = new TwilioWhatsAppChannel('whatsapp:+14155238886', credentials, client);

    await expect(channel.fetchStatus('SM0001')).resolves.toEqual({
      status: 'delivered',
      errorCode: null,
      errorMessage: null,
    });
    expect(context).toHaveBeenCalledWith('SM0001');
  });
});

describe('DryRunChannel', () => {
  it('hands out sequential SIDs without sending', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const channel = new DryRunChannel();

    const first = await channel.send('+15555550100', 'a');
    const second = await channel.send('+15555550101', 'b');

    expect([first.sid, second.sid]).toEqual(['dry-run-1', 'dry-run-2']);
    await expect(channel.fetchStatus()).resolves.toEqual({ status: 'dry-run', errorCode: null, errorMessage: null });
  });
});

describe('createMessageChannel', () => {
  const base = { from: 'whatsapp:+14155238886', recipients: [], statusCheckDelayMs: 0, dryRun: false };

  it('uses the dry-run channel without credentials', () => {
    expect(createMessageChannel({ ...base, dryRun: true })).toBeInstanceOf(DryRunChannel);
  });

  it('requires credentials to send', () => {
    expect(() => createMessageChannel(base)).toThrow(ConfigurationError);
  });
});
