import type { OutputEvent } from '../kernel/index.js';

/**
 * Plain-text rendering of output events. Inline text continues the current
 * line; screen and timing events have no textual form.
 */
export function renderEvents(events: readonly OutputEvent[]): string {
  let rendered = '';

  for (const event of events) {
    switch (event.kind) {
      case 'text':
        rendered += `${event.text}\n`;
        break;
      case 'inline':
        rendered += event.text;
        break;
      case 'clearScreen':
      case 'pause':
      case 'saveRequested':
      case 'loadRequested':
        break;
      default: {
        const exhaustive: never = event;
        return exhaustive;
      }
    }
  }

  return rendered;
}

export interface TranscriptEntry {
  readonly input: string | null;
  readonly events: readonly OutputEvent[];
}

export const renderTranscript = (entries: readonly TranscriptEntry[]): string =>
  entries.map((entry) => `${entry.input === null ? '' : `> ${entry.input}\n`}${renderEvents(entry.events)}`).join('');
