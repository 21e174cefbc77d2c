import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { ProductScope } from '../scope/ProductScope.js';
import {
  capabilityDocumentSchema,
  type CapabilityDefinition,
  type RegistrySnapshot,
  type ScopeConsistencyReport,
} from './types.js';
import { createLogger } from '../../utils/logger.js';
import { CatalogError, errorMessage } from '../../utils/errors.js';

const EMPTY_SNAPSHOT: RegistrySnapshot = {
  version: 0,
  updatedAt: '',
  capabilities: new Map(),
};

/**
 * Versioned capability catalog loaded from CAPABILITIES.yaml.
 *
 * Every read goes through the attached product scope, so a capability that
 * exists but is not allowed looks exactly like one that does not exist.
 * A reload that fails for any reason leaves the registry empty rather than
 * keeping the previous snapshot.
 */
export class CapabilityRegistry {
  private readonly logger = createLogger({ component: 'CapabilityRegistry' });
  private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;

  constructor(
    readonly path: string,
    private readonly productScope?: ProductScope
  ) {
    this.reload();
  }

  get version(): number {
    return this.snapshot.version;
  }

  get updatedAt(): string {
    return this.snapshot.updatedAt;
  }

  reload(): void {
    const logger = this.logger.child({ path: this.path });

    if (!existsSync(this.path)) {
      logger.warn('Capability registry not found');
      this.snapshot = EMPTY_SNAPSHOT;
      return;
    }

    try {
      this.snapshot = this.parseSnapshot(readFileSync(this.path, 'utf8'));
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Capability registry invalid, no capabilities loaded');
      this.snapshot = EMPTY_SNAPSHOT;
      return;
    }

    logger.info(
      { version: this.snapshot.version, count: this.snapshot.capabilities.size },
      'Capability registry loaded'
    );
  }

  get(capabilityId: string): CapabilityDefinition | undefined {
    const capability = this.snapshot.capabilities.get(capabilityId);
    if (!capability) {
      return undefined;
    }
    if (this.productScope && !this.productScope.isAllowed(capabilityId)) {
      return undefined;
    }
    return capability;
  }

  allIds(): string[] {
    const ids = [...this.snapshot.capabilities.keys()];
    const scope = this.productScope;
    return scope ? ids.filter((id) => scope.isAllowed(id)) : ids;
  }

  /** Primary followed by its fallbacks, keeping only ids that resolve and dropping repeats. */
  resolveChain(primaryCapability: string): string[] {
    const first = this.get(primaryCapability);
    if (!first) {
      return [];
    }

    const chain = [primaryCapability];
    const seen = new Set(chain);
    for (const fallbackId of first.fallback_to) {
      if (seen.has(fallbackId)) continue;
      if (this.get(fallbackId)) {
        chain.push(fallbackId);
        seen.add(fallbackId);
      }
    }
    return chain;
  }

  ensureScopeConsistency(): ScopeConsistencyReport {
    if (!this.productScope) {
      return { missingInRegistry: new Set(), missingInScope: new Set() };
    }

    const registryIds = new Set(this.snapshot.capabilities.keys());
    const scopeIds = this.productScope.capabilities;
    return {
      missingInRegistry: new Set([...scopeIds].filter((id) => !registryIds.has(id))),
      missingInScope: new Set([...registryIds].filter((id) => !scopeIds.has(id))),
    };
  }

  private parseSnapshot(source: string): RegistrySnapshot {
    let data: unknown;
    try {
      data = parseYaml(source) ?? {};
    } catch (error) {
      throw new CatalogError(this.path, 'Capability registry is not valid YAML', { cause: error });
    }

    const parsed = capabilityDocumentSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new CatalogError(this.path, `Capability registry failed validation: ${issues.join('; ')}`);
    }

    const capabilities = new Map<string, CapabilityDefinition>();
    for (const capability of parsed.data.capabilities) {
      if (capabilities.has(capability.id)) {
        this.logger.warn({ capabilityId: capability.id }, 'Duplicate capability ignored');
        continue;
      }
      capabilities.set(capability.id, capability);
    }

    return {
      version: parsed.data.version,
      updatedAt: parsed.data.updated_at,
      capabilities,
    };
  }
}
