import { z } from 'zod';

/** Minimal JSON-schema descriptor kept for auditability; not enforced at runtime. */
export const jsonSchemaDescriptorSchema = z.object({
  type: z.string().default('object'),
  required: z.array(z.string()).default([]),
  properties: z.record(z.string(), z.unknown()).default({}),
});

export const capabilityDefinitionSchema = z.object({
  id: z.string().min(1),
  phase: z.number().int().min(1),
  provider: z.string(),
  summary: z.string(),
  input_schema: jsonSchemaDescriptorSchema,
  output_schema: jsonSchemaDescriptorSchema,
  fallback_to: z.array(z.string()).default([]),
});

export const capabilityDocumentSchema = z.object({
  version: z.number().int(),
  // YAML 1.1 documents turn unquoted dates into Date objects
  updated_at: z.union([z.string(), z.date().transform((date) => date.toISOString().slice(0, 10))]),
  capabilities: z.array(capabilityDefinitionSchema),
});

export type CapabilityDefinition = z.infer<typeof capabilityDefinitionSchema>;

export interface RegistrySnapshot {
  version: number;
  updatedAt: string;
  capabilities: ReadonlyMap<string, CapabilityDefinition>;
}

export interface ScopeConsistencyReport {
  /** Ids the scope allows that the registry does not define. */
  missingInRegistry: Set<string>;
  /** Ids the registry defines that the scope does not allow. */
  missingInScope: Set<string>;
}
