// Tool Registry - Read-only catalog of the tools advertised to the reasoning service
// Built once at startup; order of construction is the advertised order

import type { ProviderTool, ProviderToolProperty } from '../../providers/types.js';
import type { ToolDefinition, ToolParameter } from './types.js';

export interface OpenAIFunctionDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ProviderToolProperty>;
    required: string[];
  };
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;

  constructor(tools: readonly ToolDefinition[]) {
    const byName = new Map<string, ToolDefinition>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`Tool "${tool.name}" is declared more than once`);
      }
      byName.set(tool.name, tool);
    }
    this.tools = byName;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  toOpenAIFunctions(): OpenAIFunctionDef[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: this.parametersToOpenAISchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  toProviderTools(): ProviderTool[] {
    return this.toOpenAIFunctions().map(fn => ({ type: 'function', function: fn }));
  }

  private parametersToOpenAISchema(params: ToolParameter[]): Record<string, ProviderToolProperty> {
    const schema: Record<string, ProviderToolProperty> = {};

    for (const param of params) {
      const paramSchema: ProviderToolProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
