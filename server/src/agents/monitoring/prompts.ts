import type { Alert, Communication, Deal } from '../types.js';
import { bullets } from '../prompt-context.js';

export const MAX_PROMPT_COMMUNICATIONS = 10;
const CONTENT_PREVIEW_CHARS = 1_000;

export function formatCommunications(communications: readonly Communication[]): string {
  return communications
    .slice(0, MAX_PROMPT_COMMUNICATIONS)
    .map((comm, i) => [
      `--- Communication ${i} (${comm.date || 'date unknown'}) ---`,
      `From: ${comm.from || 'Unknown'}`,
      `Subject: ${comm.subject || '(no subject)'}`,
      comm.content.slice(0, CONTENT_PREVIEW_CHARS),
    ].join('\n'))
    .join('\n\n');
}

export function buildSentimentPrompt(deal: Deal, communications: readonly Communication[]): string {
  return `Analyze the sentiment of these client communications for the deal "${deal.title}" with ${deal.client_name || 'the client'}.
Communications are listed newest first; "index" refers to the number in each header.

${formatCommunications(communications)}

Return a JSON object:
{
  "scores": [
    {
      "index": 0,
      "sentiment": -1.0 to 1.0,
      "signals": ["short phrases, e.g. 'budget concern', 'competitor mentioned', 'timeline pressure'"],
      "summary": "one sentence"
    }
  ],
  "overall_sentiment": -1.0 to 1.0,
  "key_concerns": ["..."],
  "positive_signals": ["..."]
}

Return ONLY valid JSON.`;
}

function formatAlerts(alerts: readonly Alert[]): string {
  return bullets(alerts.map((alert) => `[${alert.severity.toUpperCase()}] ${alert.title}: ${alert.description}`));
}

const SOURCE_PREVIEW_CHARS = 500;

export interface Recipient {
  name: string;
  email: string;
}

/**
 * The reply goes to the first sender with a usable From line:
 * `"Dana Lee" <dana@client.test>` gives the display name, a bare address its
 * local part. Without one the reply is addressed to the deal's client.
 */
export function replyRecipient(deal: Deal, communications: readonly Communication[]): Recipient {
  const from = communications.map((comm) => comm.from.trim()).find((value) => value.length > 0);
  if (!from) return { name: deal.client_name || 'the client', email: '' };

  const angle = /^(.*?)<([^>]*)>/.exec(from);
  if (angle) {
    const name = (angle[1] ?? '').trim().replace(/^"|"$/g, '').trim();
    const email = (angle[2] ?? '').trim();
    return { name: name || email.split('@')[0] || deal.client_name || 'the client', email };
  }
  return { name: from.split('@')[0] || deal.client_name || 'the client', email: from };
}

export function formatSourceEmails(communications: readonly Communication[]): string {
  if (communications.length === 0) return '(No source emails available)';
  return communications
    .slice(0, MAX_PROMPT_COMMUNICATIONS)
    .map((comm) => [
      `From: ${comm.from || 'Unknown'}`,
      `Subject: ${comm.subject || '(no subject)'}`,
      `Date: ${comm.date}`,
      comm.content.slice(0, SOURCE_PREVIEW_CHARS),
    ].join('\n'))
    .join('\n---\n');
}

function replyContext(deal: Deal, communications: readonly Communication[]): { recipient: Recipient; block: string } {
  const recipient = replyRecipient(deal, communications);
  const block = `SOURCE EMAILS:
${formatSourceEmails(communications)}

RECIPIENT: ${recipient.name} at ${recipient.email || 'their email'}`;
  return { recipient, block };
}

const REPLY_FORMAT = `Return a JSON object:
{
  "recovery_email": "Subject: ...\\n\\nemail body",
  "recovery_actions": ["..."]
}

Return ONLY valid JSON.`;

export function buildRecoveryPrompt(
  deal: Deal,
  alerts: readonly Alert[],
  concerns: readonly string[],
  communications: readonly Communication[],
): string {
  const { recipient, block } = replyContext(deal, communications);
  return `You are an account manager. The deal "${deal.title}" with ${deal.client_name || 'the client'} shows warning signs.

ALERTS:
${formatAlerts(alerts)}

CLIENT CONCERNS:
${bullets(concerns)}

${block}

Draft a short, professional reply to ${recipient.name} that answers the points raised in their email, acknowledges the concerns without being defensive, and closes with a sign-off. Also propose concrete recovery actions for the account team.

${REPLY_FORMAT}`;
}

export function buildFollowUpPrompt(
  deal: Deal,
  alerts: readonly Alert[],
  positives: readonly string[],
  communications: readonly Communication[],
): string {
  const { recipient, block } = replyContext(deal, communications);
  return `You are an account manager. The deal "${deal.title}" with ${deal.client_name || 'the client'} is trending well.

UPDATES:
${formatAlerts(alerts)}

POSITIVE SIGNALS:
${bullets(positives)}

${block}

Draft a warm reply to ${recipient.name} that thanks them, references specific points from their email and proposes a clear next step. Also list actions for the account team to keep the momentum going.

${REPLY_FORMAT}`;
}
