import {
  deleteAssistants,
  deleteBriefs,
  deleteThreads,
  getAssistantId,
  getBrief,
  getThread,
  markThreadInitialized,
  saveBrief,
  upsertAssistant,
  upsertThread,
} from '../db.js';
import type { CachedBrief, ThreadBinding, Topic } from '../types.js';

export type ResetScope =
  | { kind: 'global' }
  | { kind: 'user'; userId: number; topic?: Topic };

export interface ResetSummary {
  assistants: number;
  threads: number;
  briefs: number;
}

/**
 * Where the session cache keeps its bindings: topic → assistant,
 * (user, topic) → thread, (user, topic) → last brief.
 */
export interface BindingStore {
  getAssistant(topic: Topic): string | undefined;
  saveAssistant(topic: Topic, assistantId: string): void;
  getThread(userId: number, topic: Topic): ThreadBinding | undefined;
  saveThread(userId: number, topic: Topic, threadId: string): void;
  markInitialized(userId: number, topic: Topic, threadId: string): boolean;
  getBrief(userId: number, topic: Topic): CachedBrief | undefined;
  saveBrief(userId: number, topic: Topic, content: string): void;
  reset(scope: ResetScope): ResetSummary;
}

export class SqliteBindingStore implements BindingStore {
  getAssistant(topic: Topic): string | undefined {
    return getAssistantId(topic);
  }

  saveAssistant(topic: Topic, assistantId: string): void {
    upsertAssistant(topic, assistantId);
  }

  getThread(userId: number, topic: Topic): ThreadBinding | undefined {
    return getThread(userId, topic);
  }

  saveThread(userId: number, topic: Topic, threadId: string): void {
    upsertThread(userId, topic, threadId);
  }

  markInitialized(userId: number, topic: Topic, threadId: string): boolean {
    return markThreadInitialized(userId, topic, threadId);
  }

  getBrief(userId: number, topic: Topic): CachedBrief | undefined {
    return getBrief(userId, topic);
  }

  saveBrief(userId: number, topic: Topic, content: string): void {
    saveBrief(userId, topic, content);
  }

  reset(scope: ResetScope): ResetSummary {
    if (scope.kind === 'global') {
      return {
        assistants: deleteAssistants(),
        threads: deleteThreads({}),
        briefs: deleteBriefs({}),
      };
    }
    const filter = { userId: scope.userId, topic: scope.topic };
    return {
      assistants: 0,
      threads: deleteThreads(filter),
      briefs: deleteBriefs(filter),
    };
  }
}
