/**
 * Console Reporter
 *
 * One line per step: glyph, position, title and key result fields.
 * List-valued fields follow as indented lines; failures add the HTTP
 * status and response body.
 */

import type { EngineEvent } from '../workflows/engine.js';
import type { DetailValue, StepDetails } from '../workflows/types.js';
import type { ResultReporter } from './types.js';

export const GLYPHS = {
  success: '✓',
  failure: '✗',
  skipped: '–',
  fallback: '↳',
} as const;

function position(index: number): string {
  return `[${String(index).padStart(2, '0')}]`;
}

function formatScalar(value: Exclude<DetailValue, readonly string[]>): string {
  if (typeof value === 'string') {
    return /\s/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  return String(value);
}

function isList(value: DetailValue): value is readonly string[] {
  return Array.isArray(value);
}

export function formatDetails(details: StepDetails): { inline: string; lists: string[] } {
  const scalars: string[] = [];
  const lists: string[] = [];
  for (const [key, value] of Object.entries(details)) {
    if (isList(value)) {
      if (value.length === 0) continue;
      lists.push(`    ${key}:`);
      for (const item of value) {
        lists.push(`      - ${item}`);
      }
    } else {
      scalars.push(`${key}=${formatScalar(value)}`);
    }
  }
  return { inline: scalars.join(' '), lists };
}

export class ConsoleReporter implements ResultReporter {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  handle(event: EngineEvent): void {
    for (const line of this.render(event)) {
      this.write(line);
    }
  }

  render(event: EngineEvent): string[] {
    switch (event.type) {
      case 'RUN_STARTED':
        return [`=== ESP workflow run ${event.runId} (${event.steps} steps) ===`];

      case 'STEP_STARTED':
        return [];

      case 'STEP_FALLBACK':
        return [`${GLYPHS.fallback} ${position(event.index)} ${event.step}: using fallback for ${event.fields.join(', ')}`];

      case 'STEP_SUCCEEDED': {
        const { inline, lists } = formatDetails(event.result.value.details);
        const head = `${GLYPHS.success} ${position(event.index)} ${event.result.title}`;
        return [inline === '' ? head : `${head}: ${inline}`, ...lists];
      }

      case 'STEP_FAILED': {
        const { error, title } = event.result;
        const lines = [`${GLYPHS.failure} ${position(event.index)} ${title}: ${error.kind}`, `    error: ${error.message}`];
        if (error.statusCode !== undefined) lines.push(`    status: ${error.statusCode}`);
        if (error.responseBody !== undefined && error.responseBody !== '') lines.push(`    body: ${error.responseBody}`);
        return lines;
      }

      case 'STEP_SKIPPED':
        return [`${GLYPHS.skipped} ${position(event.index)} ${event.result.title}: skipped (${event.result.reason})`];

      case 'RUN_COMPLETED': {
        const { succeeded, failed, skipped, total, durationMs } = event.summary;
        return [
          `=== Summary: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped (${total} steps, ${durationMs}ms) ===`,
        ];
      }
    }
  }
}
