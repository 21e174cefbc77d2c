import { CAPABILITY_IDS, type RouteDecision } from './types.js';
import { extractSearchIntent, normalizeQuery } from './searchQuery.js';
import { hasTemporalReference } from '../time/temporal.js';
import { wordRegExp } from '../../utils/text.js';

const WEB_HINT_RE = wordRegExp(
  String.raw`\b(busca|buscar|investiga|consulta|averigua|google|internet|web|` +
    String.raw`noticias?|precio|cotizacion|cotización|valor|actual)\b`
);
const NEWS_HINT_RE = wordRegExp(String.raw`\b(noticias?|news|titulares|actualidad)\b`);
const REMINDER_HINT_RE = wordRegExp(
  String.raw`\b(recordatorios?|recuerdame|recuérdame|avisame|avísame|` +
    String.raw`elimina\s+recordatorio|lista\s+recordatorios|pendientes)\b`
);
const MEMORY_PURGE_HINT_RE = wordRegExp(
  String.raw`\b(protocolo\s+de\s+borrado|borrado\s+de\s+memoria|` +
    String.raw`resetea(?:r)?\s+memoria|reinicia(?:r)?\s+memoria)\b|` +
    String.raw`\b(borra|elimina|limpia|olvida)\b.{0,35}\b(toda|todo)\b.{0,35}\b(memoria|conversaciones?)\b`
);
const MEMORY_UPDATE_HINT_RE = wordRegExp(
  String.raw`\b(actualiza|corrige|edita|modifica|cambia)\b.{0,45}\b(` +
    String.raw`memoria|recuerdo|dato|lo\s+que\s+recuerdas|perfil)\b`
);
const MEMORY_DELETE_HINT_RE = wordRegExp(
  String.raw`\b(olvida|borra|elimina|quita|remueve)\b.{0,45}\b(` +
    String.raw`memoria|recuerdo|dato|lo\s+que\s+recuerdas|perfil)\b`
);
const MEMORY_RECALL_HINT_RE = wordRegExp(
  String.raw`\b(qu[eé]\s+recuerdas|qu[eé]\s+sabes\s+de\s+m[ií]|mi\s+perfil|` +
    String.raw`lo\s+que\s+tienes\s+guardado|recuerdos?\s+sobre)\b`
);
const MEMORY_STORE_HINT_RE = wordRegExp(
  String.raw`\b(recuerda\s+que|acu[eé]rdate\s+de|guarda(?:r)?\s+en\s+(?:tu\s+)?memoria|` +
    String.raw`ten\s+presente\s+que|anota(?:r)?\s+en\s+tu\s+memoria)\b`
);

interface KeywordDetector {
  pattern: RegExp;
  intent: RouteDecision['intent'];
  tools: string[];
  confidence: number;
}

// Evaluated in order; the first match wins.
const KEYWORD_DETECTORS: KeywordDetector[] = [
  {
    pattern: REMINDER_HINT_RE,
    intent: 'reminder_management',
    tools: [CAPABILITY_IDS.reminderCreate, CAPABILITY_IDS.reminderList, CAPABILITY_IDS.reminderDelete],
    confidence: 0.8,
  },
  {
    pattern: MEMORY_PURGE_HINT_RE,
    intent: 'memory_purge',
    tools: [CAPABILITY_IDS.memoryPurgeAll, CAPABILITY_IDS.chatGeneral],
    confidence: 0.76,
  },
  {
    pattern: MEMORY_UPDATE_HINT_RE,
    intent: 'memory_update',
    tools: [CAPABILITY_IDS.memoryUpdateUserFact, CAPABILITY_IDS.memoryRecallProfile],
    confidence: 0.72,
  },
  {
    pattern: MEMORY_DELETE_HINT_RE,
    intent: 'memory_delete',
    tools: [CAPABILITY_IDS.memoryDeleteUserFact, CAPABILITY_IDS.memoryRecallProfile],
    confidence: 0.72,
  },
  {
    pattern: MEMORY_RECALL_HINT_RE,
    intent: 'memory_recall',
    tools: [CAPABILITY_IDS.memoryRecallProfile, CAPABILITY_IDS.memoryRetrieval],
    confidence: 0.73,
  },
  {
    pattern: MEMORY_STORE_HINT_RE,
    intent: 'memory_store',
    tools: [CAPABILITY_IDS.memoryStoreUserFact, CAPABILITY_IDS.memoryStoreSummary],
    confidence: 0.73,
  },
];

function decision(
  intent: RouteDecision['intent'],
  entities: Record<string, unknown>,
  candidateTools: string[],
  confidence: number
): RouteDecision {
  return {
    intent,
    entities,
    candidate_tools: candidateTools,
    confidence,
    needs_clarification: false,
    clarification_question: '',
  };
}

/** Deterministic keyword classifier; always produces a decision. */
export function heuristicRoute(message: string): RouteDecision {
  const text = message.trim();
  const temporal = hasTemporalReference(text);

  for (const detector of KEYWORD_DETECTORS) {
    if (detector.pattern.test(text)) {
      return decision(detector.intent, { temporal_reference: temporal }, [...detector.tools], detector.confidence);
    }
  }

  const extractedQuery = extractSearchIntent(text);
  if (extractedQuery || WEB_HINT_RE.test(text)) {
    const preferNews = NEWS_HINT_RE.test(text);
    const primary = preferNews ? CAPABILITY_IDS.webSearchNews : CAPABILITY_IDS.webSearchGeneral;
    return decision(
      'web_search',
      {
        query: extractedQuery ?? normalizeQuery(text),
        temporal_reference: temporal,
        prefer_news: preferNews,
      },
      [primary, CAPABILITY_IDS.webSearchGeneral, CAPABILITY_IDS.chatGeneral],
      0.78
    );
  }

  if (temporal) {
    return decision(
      'time_sensitive_answer',
      { temporal_reference: true },
      [CAPABILITY_IDS.currentDatetime, CAPABILITY_IDS.chatGeneral],
      0.7
    );
  }

  return decision('general_chat', { temporal_reference: false }, [CAPABILITY_IDS.chatGeneral], 0.55);
}
