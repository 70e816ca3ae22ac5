import { z } from 'zod';
import { Actor } from '../../types';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';
import { parseOrThrow } from '../validation';

export interface ToolContext {
  actor: Actor;
  /** Aborted when the client goes away. */
  signal: AbortSignal;
}

export type JsonSchema = Record<string, unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  run(args: unknown, context: ToolContext): Promise<unknown>;
}

interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  inputSchema: JsonSchema;
  handler(args: z.output<S>, context: ToolContext): Promise<unknown>;
}

/**
 * Bind a tool's argument schema to its handler. Arguments are parsed
 * (and sanitized) before the handler sees them.
 */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    run: (args, context) => spec.handler(parseOrThrow(spec.schema, args ?? {}, `arguments for ${spec.name}`), context)
  };
}

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new ValidationError(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  describe(): Array<Pick<ToolDefinition, 'name' | 'description' | 'inputSchema'>> {
    return this.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));
  }

  /**
   * @throws {NotFoundError} for an unknown tool; handler errors propagate unchanged
   */
  async execute(name: string, args: unknown, context: ToolContext): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError(`Tool '${name}'`);
    }
    return tool.run(args, context);
  }
}
