// ============================================================================
// Tool Registry
// ============================================================================
// Name -> ToolSpec, built once at startup by buildRegistry() and read-only
// afterwards. Insertion order is the listing order.
// ============================================================================

import type { Toolset } from '../config.js';
import { RegistryError } from '../errors.js';
import { toInputSchema } from './shared/validation.js';
import type { McpToolDefinition, ToolSpec } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<string, ToolSpec>();
  private frozen = false;

  register(spec: ToolSpec): void {
    const name = spec.definition.name;
    if (this.frozen) {
      throw new RegistryError(`Cannot register '${name}': registry is frozen`);
    }
    if (this.tools.has(name)) {
      throw new RegistryError(`Duplicate tool name: '${name}'`);
    }
    this.tools.set(name, spec);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  lookup(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  listAll(): ToolSpec[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }
}

/**
 * Register a fixed list of tools and freeze the result. Throws RegistryError
 * on an empty list or a duplicate name; either one aborts startup.
 */
export function buildRegistry(tools: readonly ToolSpec[]): ToolRegistry {
  if (tools.length === 0) {
    throw new RegistryError('No tools to register');
  }
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry.freeze();
}

// ============================================================================
// Listing
// ============================================================================

export interface ListingOptions {
  /** 'baseline' restricts the listing to the first baselineCount tools */
  toolset: Toolset;
  baselineCount: number;
}

export function toMcpDefinition(spec: ToolSpec): McpToolDefinition {
  const definition: McpToolDefinition = {
    name: spec.definition.name,
    description: spec.definition.description,
    inputSchema: toInputSchema(spec),
  };
  if (spec.definition.annotations) definition.annotations = spec.definition.annotations;
  return definition;
}

/**
 * MCP definitions in registration order. Tools past the baseline prefix are
 * hidden from the listing but stay callable.
 */
export function listTools(
  registry: ToolRegistry,
  options: ListingOptions = { toolset: 'full', baselineCount: 0 }
): McpToolDefinition[] {
  const all = registry.listAll();
  const visible = options.toolset === 'baseline' ? all.slice(0, Math.max(0, options.baselineCount)) : all;
  return visible.map(toMcpDefinition);
}
