import type { AlertMessage, Event } from '../domain/index.js';

function formatTimestamp(seconds: number): string {
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? String(seconds) : date.toISOString();
}

/** Renders the alert sent for a triggered event. */
export function renderAlert(event: Event, score: number, recipient: string): AlertMessage {
  const subject = `Alert: ${event.action} (score=${score.toFixed(2)})`;

  const body = [
    'Event intelligence alert',
    '',
    `Event ID: ${event.id}`,
    `Action: ${event.action}`,
    `User: ${event.user ?? 'unknown'}`,
    `Timestamp: ${formatTimestamp(event.timestamp)}`,
    `Score: ${score.toFixed(3)}`,
    '',
    'Payload:',
    JSON.stringify(event.payload ?? {}, null, 2),
  ].join('\n');

  return { subject, body, recipient };
}
