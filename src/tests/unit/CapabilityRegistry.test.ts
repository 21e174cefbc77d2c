import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { rmSync } from 'node:fs';
import { CapabilityRegistry } from '../../core/registry/CapabilityRegistry.js';
import { ProductScope } from '../../core/scope/ProductScope.js';
import { CatalogFixture, capability } from '../helpers/fixtures.js';

describe('CapabilityRegistry', () => {
  let fixture: CatalogFixture;

  beforeEach(() => {
    fixture = new CatalogFixture();
  });

  afterEach(() => {
    fixture.cleanup();
  });

  describe('loading', () => {
    it('should load definitions and snapshot metadata', () => {
      fixture.writeRegistry([capability('chat_general'), capability('web_search_general', ['chat_general'])], 7, '2026-03-01');
      const registry = new CapabilityRegistry(fixture.registryPath);

      expect(registry.version).toBe(7);
      expect(registry.updatedAt).toBe('2026-03-01');
      expect(registry.allIds()).toEqual(['chat_general', 'web_search_general']);
      expect(registry.get('web_search_general')?.fallback_to).toEqual(['chat_general']);
      expect(registry.get('web_search_general')?.input_schema).toEqual({ type: 'object', required: [], properties: {} });
    });

    it('should keep the first definition of a duplicated id', () => {
      fixture.writeRegistry([
        capability('chat_general', [], 'first'),
        capability('chat_general', [], 'second'),
        capability('get_current_datetime'),
      ]);
      const registry = new CapabilityRegistry(fixture.registryPath);

      expect(registry.get('chat_general')?.summary).toBe('first');
      expect(registry.allIds()).toEqual(['chat_general', 'get_current_datetime']);
    });

    it('should be empty when the document is missing', () => {
      const registry = new CapabilityRegistry(fixture.registryPath);

      expect(registry.allIds()).toEqual([]);
      expect(registry.version).toBe(0);
      expect(registry.get('chat_general')).toBeUndefined();
    });

    it('should be empty when the document is not valid YAML', () => {
      fixture.writeRegistryText('version: [unclosed\n');
      const registry = new CapabilityRegistry(fixture.registryPath);

      expect(registry.allIds()).toEqual([]);
    });

    it('should be empty when a definition breaks the schema', () => {
      fixture.writeRegistry([capability('chat_general'), { ...capability('bad_phase'), phase: 0 }]);
      const registry = new CapabilityRegistry(fixture.registryPath);

      expect(registry.allIds()).toEqual([]);
    });

    it('should drop the previous snapshot when a reload fails', () => {
      fixture.writeRegistry([capability('chat_general')], 3);
      const registry = new CapabilityRegistry(fixture.registryPath);
      expect(registry.allIds()).toEqual(['chat_general']);

      rmSync(fixture.registryPath);
      registry.reload();

      expect(registry.allIds()).toEqual([]);
      expect(registry.version).toBe(0);
      expect(registry.updatedAt).toBe('');
    });
  });

  describe('scope filtering', () => {
    it('should hide capabilities the scope does not allow', () => {
      fixture
        .writeRegistry([capability('chat_general'), capability('media_stack_control'), capability('web_search_general')])
        .writeScope(['chat_general', 'web_search_general', 'not_registered']);
      const scope = new ProductScope(fixture.scopePath);
      const registry = new CapabilityRegistry(fixture.registryPath, scope);

      expect(registry.get('media_stack_control')).toBeUndefined();
      expect(registry.get('not_registered')).toBeUndefined();
      expect(registry.allIds()).toEqual(['chat_general', 'web_search_general']);
      for (const id of registry.allIds()) {
        expect(scope.isAllowed(id)).toBe(true);
      }
    });

    it('should return nothing when the scope is empty', () => {
      fixture.writeRegistry([capability('chat_general')]).writeScopeText('# Nothing allowed yet\n');
      const registry = new CapabilityRegistry(fixture.registryPath, new ProductScope(fixture.scopePath));

      expect(registry.allIds()).toEqual([]);
    });
  });

  describe('resolveChain', () => {
    it('should follow fallbacks in order, skipping unresolvable and repeated ids', () => {
      fixture
        .writeRegistry([
          capability('chat_general'),
          capability('web_search_general', ['chat_general']),
          capability('web_search_news', [
            'web_search_general',
            'web_search_news',
            'missing_tool',
            'media_stack_control',
            'chat_general',
            'web_search_general',
          ]),
          capability('media_stack_control'),
        ])
        .writeScope(['chat_general', 'web_search_general', 'web_search_news']);
      const registry = new CapabilityRegistry(fixture.registryPath, new ProductScope(fixture.scopePath));

      const chain = registry.resolveChain('web_search_news');

      expect(chain).toEqual(['web_search_news', 'web_search_general', 'chat_general']);
      expect(new Set(chain).size).toBe(chain.length);
      for (const id of chain) {
        expect(registry.get(id)).toBeDefined();
      }
    });

    it('should be empty when the primary does not resolve', () => {
      fixture.writeRegistry([capability('media_stack_control', ['chat_general']), capability('chat_general')]).writeScope(['chat_general']);
      const registry = new CapabilityRegistry(fixture.registryPath, new ProductScope(fixture.scopePath));

      expect(registry.resolveChain('media_stack_control')).toEqual([]);
      expect(registry.resolveChain('unknown')).toEqual([]);
    });
  });

  describe('ensureScopeConsistency', () => {
    it('should report ids missing on either side', () => {
      fixture.writeRegistry([capability('a_tool'), capability('b_tool'), capability('extra_tool')]).writeScope(['a_tool', 'b_tool', 'ghost_tool']);
      const registry = new CapabilityRegistry(fixture.registryPath, new ProductScope(fixture.scopePath));

      expect(registry.ensureScopeConsistency()).toEqual({
        missingInRegistry: new Set(['ghost_tool']),
        missingInScope: new Set(['extra_tool']),
      });
    });

    it('should report nothing without a scope', () => {
      fixture.writeRegistry([capability('a_tool')]);
      const registry = new CapabilityRegistry(fixture.registryPath);

      expect(registry.ensureScopeConsistency()).toEqual({ missingInRegistry: new Set(), missingInScope: new Set() });
    });
  });
});
