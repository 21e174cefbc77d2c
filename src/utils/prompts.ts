import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const promptsDir = join(__dirname, '../../prompts');

export async function loadPrompt(name: string): Promise<string> {
  const filePath = join(promptsDir, name);
  return readFile(filePath, 'utf8');
}

/** Fills `{{KEY}}` placeholders. Values are inserted verbatim, `$` sequences included. */
export function renderPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}
