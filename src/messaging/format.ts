import type { EventSummary } from '../ai/summarizer.js';
import type { BriefDate } from '../scraper/brief-date.js';

/**
 * Hide all but the last four digits of a phone number
 */
export function maskPhoneNumber(phoneNumber: string): string {
  return `xxx-xxx-${phoneNumber.slice(-4)}`;
}

export function formatHeaderMessage(date: BriefDate): string {
  return `*Daily Summary:* ${date.iso}`;
}

export function formatSummaryMessage(summary: EventSummary): string {
  return `*Headline:* ${summary.title}\n*Event:*\n ${summary.sectionText}\n`;
}

export function formatFactMessage(fact: string): string {
  return `*Interesting Fact:* ${fact}`;
}
