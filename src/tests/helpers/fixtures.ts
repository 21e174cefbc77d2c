import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';

export const ALL_CAPABILITY_IDS = [
  'chat_general',
  'get_current_datetime',
  'web_search_general',
  'web_search_news',
  'reminder_create',
  'reminder_list',
  'reminder_delete',
  'memory_store_user_fact',
  'memory_store_summary',
  'memory_recall_profile',
  'memory_retrieval',
  'memory_update_user_fact',
  'memory_delete_user_fact',
  'memory_purge_all',
  'media_stack_control',
];

export interface CapabilityFixture {
  id: string;
  phase: number;
  provider: string;
  summary: string;
  input_schema: { type: string };
  output_schema: { type: string };
  fallback_to: string[];
}

export function capability(id: string, fallbackTo: string[] = [], summary = `${id} capability`): CapabilityFixture {
  return {
    id,
    phase: 1,
    provider: 'test',
    summary,
    input_schema: { type: 'object' },
    output_schema: { type: 'object' },
    fallback_to: fallbackTo,
  };
}

export function scopeDocument(ids: string[]): string {
  return ['# Scope', '', ...ids.map((id) => `- \`${id}\``), ''].join('\n');
}

/** Temporary directory holding catalog documents for one test. */
export class CatalogFixture {
  readonly dir = mkdtempSync(join(tmpdir(), 'capability-router-'));
  readonly registryPath = join(this.dir, 'CAPABILITIES.yaml');
  readonly scopePath = join(this.dir, 'PRODUCT_SCOPE.md');

  writeRegistry(capabilities: CapabilityFixture[], version = 1, updatedAt = '2026-02-10'): this {
    // JSON is valid YAML
    writeFileSync(this.registryPath, JSON.stringify({ version, updated_at: updatedAt, capabilities }));
    return this;
  }

  writeRegistryText(text: string): this {
    writeFileSync(this.registryPath, text);
    return this;
  }

  writeScope(ids: string[]): this {
    writeFileSync(this.scopePath, scopeDocument(ids));
    return this;
  }

  writeScopeText(text: string): this {
    writeFileSync(this.scopePath, text);
    return this;
  }

  cleanup(): void {
    rmSync(this.dir, { recursive: true, force: true });
  }
}

export function fakeLLM(...replies: string[]) {
  const generateResponse = vi.fn<(request: LLMRequest) => Promise<LLMResponse>>();
  for (const reply of replies) {
    generateResponse.mockResolvedValueOnce({ text: reply });
  }
  generateResponse.mockResolvedValue({ text: 'invalid json' });
  const port: LLMPort = { generateResponse };
  return { port, generateResponse };
}
