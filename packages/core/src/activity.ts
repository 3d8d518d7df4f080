import { z } from 'zod';
import { JsonStore } from './storage.js';
import { generateId, now } from './utils.js';

export const ActivityType = z.enum([
  'turn_started',
  'stage_completed',
  'turn_completed',
  'turn_failed',
  'temperatures_updated',
  'temperatures_reset',
  'conversation_created',
  'conversation_deleted',
]);
export type ActivityType = z.infer<typeof ActivityType>;

export const ActivityEventSchema = z.object({
  id: z.string(),
  type: ActivityType,
  description: z.string(),
  details: z.string(),
  timestamp: z.string(),
});

export type ActivityEvent = z.infer<typeof ActivityEventSchema>;

const ActivityDataSchema = z.object({
  activities: z.array(ActivityEventSchema),
});

type ActivityData = z.infer<typeof ActivityDataSchema>;

/** Sink the orchestrator and turn runner report to. */
export type ActivitySink = (type: ActivityType, description: string, details?: string) => void;

const MAX_EVENTS = 500;

export class ActivityStore {
  private store: JsonStore<ActivityData>;

  constructor(dataRoot: string) {
    this.store = new JsonStore<ActivityData>(dataRoot, 'activity.json', ActivityDataSchema, { activities: [] });
  }

  append(type: ActivityType, description: string, details = ''): ActivityEvent {
    const event: ActivityEvent = {
      id: generateId('act'),
      type,
      description,
      details,
      timestamp: now(),
    };

    this.store.invalidate();
    this.store.update(data => {
      const activities = [...data.activities, event];
      // Cap at MAX_EVENTS, keeping newest
      return { activities: activities.slice(-MAX_EVENTS) };
    });

    return event;
  }

  /** Bound sink for passing into the engine. */
  sink(): ActivitySink {
    return (type, description, details) => {
      this.append(type, description, details);
    };
  }

  getRecent(count = 200): ActivityEvent[] {
    this.store.invalidate();
    const all = this.store.read().activities;
    return all.slice(-count).reverse(); // newest first
  }
}
