import { sleep } from '../lib/async.js';
import { toErrorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { MessageChannel } from './channel.js';
import { maskPhoneNumber } from './format.js';

const log = createLogger('broadcast');

export interface DeliveryRecord {
  /** Masked recipient */
  recipient: string;
  ok: boolean;
  sid: string | null;
  status: string | null;
  error: string | null;
}

export interface BroadcastOptions {
  /** Label used in logs, e.g. "header" or an event title */
  label: string;
  /** Wait before checking the status of each sent message */
  statusCheckDelayMs?: number;
}

async function checkStatus(channel: MessageChannel, sid: string, masked: string): Promise<string | null> {
  try {
    const result = await channel.fetchStatus(sid);
    log.info(`Message ${sid} to ${masked} status: ${result.status}`);
    if (result.errorCode !== null) {
      log.warn(`Message ${sid} has error code: ${result.errorCode}`, {
        errorMessage: result.errorMessage,
      });
    }
    return result.status;
  } catch (err) {
    log.error(`Error checking message status for SID ${sid}: ${toErrorMessage(err)}`);
    return null;
  }
}

/**
 * Send one message to every recipient, in order.
 * A failed send is recorded and the next recipient is still tried.
 */
export async function broadcast(
  channel: MessageChannel,
  recipients: readonly string[],
  body: string,
  options: BroadcastOptions
): Promise<DeliveryRecord[]> {
  const records: DeliveryRecord[] = [];

  for (const recipient of recipients) {
    const masked = maskPhoneNumber(recipient);
    log.info(`Sending ${options.label} to ${masked}`);

    let sid: string;
    try {
      ({ sid } = await channel.send(recipient, body));
    } catch (err) {
      const error = toErrorMessage(err);
      log.error(`Failed to send ${options.label} to ${masked}: ${error}`);
      records.push({ recipient: masked, ok: false, sid: null, status: null, error });
      continue;
    }

    log.info(`Message sent successfully to ${masked}. SID: ${sid}`);
    if (options.statusCheckDelayMs) {
      await sleep(options.statusCheckDelayMs);
    }
    const status = await checkStatus(channel, sid, masked);
    records.push({ recipient: masked, ok: true, sid, status, error: null });
  }

  return records;
}
