import { existsSync, readFileSync } from 'node:fs';
import { createLogger } from '../../utils/logger.js';
import { CatalogError, errorMessage } from '../../utils/errors.js';

/** Inline-code tokens such as `web_search_general`. */
const CAPABILITY_TOKEN_RE = /`([a-z0-9_]+)`/g;

export function extractCapabilityTokens(text: string): Set<string> {
  const found = new Set<string>();
  for (const match of text.matchAll(CAPABILITY_TOKEN_RE)) {
    const token = match[1]?.trim();
    if (token) {
      found.add(token);
    }
  }
  return found;
}

/**
 * Allow-list of capability ids read from the product scope document.
 * Whatever ids the document mentions in inline code are allowed; a missing
 * document allows nothing.
 */
export class ProductScope {
  private readonly logger = createLogger({ component: 'ProductScope' });
  private allowed: ReadonlySet<string> = new Set();

  constructor(readonly path: string) {
    this.reload();
  }

  get capabilities(): ReadonlySet<string> {
    return this.allowed;
  }

  reload(): void {
    try {
      this.allowed = extractCapabilityTokens(this.readDocument());
      this.logger.info({ path: this.path, count: this.allowed.size }, 'Product scope loaded');
    } catch (error) {
      this.allowed = new Set();
      this.logger.warn({ path: this.path, error: errorMessage(error) }, 'Product scope unavailable, denying all capabilities');
    }
  }

  isAllowed(capabilityId: string): boolean {
    return this.allowed.has(capabilityId);
  }

  /** Drops disallowed ids and duplicates, keeping first-occurrence order. */
  filterAllowed(capabilityIds: readonly string[]): string[] {
    const seen = new Set<string>();
    const filtered: string[] = [];
    for (const capabilityId of capabilityIds) {
      if (seen.has(capabilityId)) continue;
      seen.add(capabilityId);
      if (this.allowed.has(capabilityId)) {
        filtered.push(capabilityId);
      }
    }
    return filtered;
  }

  private readDocument(): string {
    if (!existsSync(this.path)) {
      throw new CatalogError(this.path, `Product scope document not found: ${this.path}`);
    }
    try {
      return readFileSync(this.path, 'utf8');
    } catch (error) {
      throw new CatalogError(this.path, `Product scope document unreadable: ${this.path}`, { cause: error });
    }
  }
}
