/**
 * Inngest Client Configuration
 */
import { Inngest } from 'inngest';
import { getInngestConfig } from '../lib/config.js';

const { eventKey, baseUrl } = getInngestConfig();

export const inngest = new Inngest({
  id: 'daily-brief',
  name: 'Daily Brief',
  eventKey,
  baseUrl,
});
