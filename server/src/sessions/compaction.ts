import { z } from 'zod';
import { generateEventId } from './types.js';
import type { CompactionPolicy, SessionEvent } from './types.js';

const compactionDataSchema = z.object({
  dropped_events: z.number().int().nonnegative(),
  dropped_types: z.record(z.number()),
  state_keys: z.array(z.string()),
});

export type CompactionData = z.infer<typeof compactionDataSchema>;

const stateKeySchema = z.object({ key: z.string() });

/**
 * Collapse everything but the newest `retain` events into a single
 * `compaction` event once the log grows past `threshold`. Earlier compaction
 * events are folded into the new one so the totals stay cumulative.
 *
 * Only the event log shrinks. The state snapshot lives beside it, so the
 * latest value of every key is untouched.
 */
export function compactEvents(events: SessionEvent[], policy: CompactionPolicy): SessionEvent[] {
  if (events.length <= policy.threshold) return events;

  const retain = Math.max(0, Math.min(policy.retain, policy.threshold));
  const cut = events.length - retain;
  const dropped = events.slice(0, cut);
  const kept = events.slice(cut);

  const summary: CompactionData = { dropped_events: 0, dropped_types: {}, state_keys: [] };
  const stateKeys = new Set<string>();

  for (const event of dropped) {
    if (event.type === 'compaction') {
      const prior = compactionDataSchema.safeParse(event.data);
      if (prior.success) {
        summary.dropped_events += prior.data.dropped_events;
        for (const [type, count] of Object.entries(prior.data.dropped_types)) {
          summary.dropped_types[type] = (summary.dropped_types[type] ?? 0) + count;
        }
        for (const key of prior.data.state_keys) stateKeys.add(key);
      }
      continue;
    }

    summary.dropped_events += 1;
    summary.dropped_types[event.type] = (summary.dropped_types[event.type] ?? 0) + 1;
    if (event.type === 'state_update') {
      const update = stateKeySchema.safeParse(event.data);
      if (update.success) stateKeys.add(update.data.key);
    }
  }
  summary.state_keys = [...stateKeys].sort();

  const compaction: SessionEvent = {
    id: generateEventId(),
    type: 'compaction',
    timestamp: new Date().toISOString(),
    data: summary,
  };

  return [compaction, ...kept];
}

export function readCompactionData(event: SessionEvent): CompactionData | null {
  if (event.type !== 'compaction') return null;
  const parsed = compactionDataSchema.safeParse(event.data);
  return parsed.success ? parsed.data : null;
}
