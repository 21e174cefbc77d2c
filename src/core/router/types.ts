import { z } from 'zod';

export const INTENTS = [
  'general_chat',
  'web_search',
  'time_sensitive_answer',
  'reminder_management',
  'memory_store',
  'memory_recall',
  'memory_update',
  'memory_delete',
  'memory_purge',
] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return (INTENTS as readonly string[]).includes(value);
}

export const CAPABILITY_IDS = {
  chatGeneral: 'chat_general',
  currentDatetime: 'get_current_datetime',
  webSearchGeneral: 'web_search_general',
  webSearchNews: 'web_search_news',
  reminderCreate: 'reminder_create',
  reminderList: 'reminder_list',
  reminderDelete: 'reminder_delete',
  memoryStoreUserFact: 'memory_store_user_fact',
  memoryStoreSummary: 'memory_store_summary',
  memoryRecallProfile: 'memory_recall_profile',
  memoryRetrieval: 'memory_retrieval',
  memoryUpdateUserFact: 'memory_update_user_fact',
  memoryDeleteUserFact: 'memory_delete_user_fact',
  memoryPurgeAll: 'memory_purge_all',
} as const;

/**
 * Shape the classifier must reply with. Missing fields take the defaults a
 * plain chat turn would have; the intent stays an open string until sanitized.
 */
export const routeDecisionSchema = z.object({
  intent: z.string().default('general_chat'),
  entities: z.record(z.string(), z.unknown()).default({}),
  candidate_tools: z.array(z.string()).default([CAPABILITY_IDS.chatGeneral]),
  confidence: z.number().min(0).max(1).default(0.5),
  needs_clarification: z.boolean().default(false),
  clarification_question: z.string().default(''),
});

export type RawRouteDecision = z.infer<typeof routeDecisionSchema>;

export interface RouteDecision extends RawRouteDecision {
  intent: Intent;
}

export interface HistoryTurn {
  role: string;
  content: string;
}

export type DecisionSource = 'heuristic' | 'semantic';
