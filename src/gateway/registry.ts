/**
 * Tool Registry
 *
 * Name → descriptor + handler. Filled once at startup, read-only afterwards,
 * so concurrent invocations need no locking.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { MCPTool } from '../types.js';
import { DuplicateToolError, MissingArgumentError, ToolError, UnknownToolError } from './errors.js';
import { ResultEnvelope, wrap } from './envelope.js';
import { classifyError, isRecord, normalizeFailure } from './normalizer.js';
import { invalid, success, ToolOutcome } from './outcome.js';

export interface ToolDescriptor<S extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly input: S;
  readonly inputSchema: MCPTool['inputSchema'];
}

export type ToolHandler<Args> = (args: Args) => Promise<ToolOutcome>;

export type ToolResponse =
  | { ok: true; content: [ResultEnvelope] }
  | { ok: false; error: ToolError };

interface RegisteredTool {
  descriptor: ToolDescriptor;
  execute(args: unknown): Promise<ToolOutcome>;
}

function toInputSchema(schema: z.ZodTypeAny): MCPTool['inputSchema'] {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = 'properties' in json && isRecord(json.properties) ? json.properties : {};
  const required = 'required' in json && Array.isArray(json.required)
    ? json.required.filter((name): name is string => typeof name === 'string')
    : [];
  return {
    type: 'object',
    properties,
    ...(required.length > 0 && { required }),
  };
}

/**
 * Describe a tool whose arguments are the given object shape
 */
export function defineTool<Shape extends z.ZodRawShape>(
  name: string,
  description: string,
  shape: Shape
): ToolDescriptor<z.ZodObject<Shape>> {
  const input = z.object(shape);
  return Object.freeze({
    name,
    description,
    input,
    inputSchema: toInputSchema(input),
  });
}

function describePath(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : 'arguments';
}

/**
 * Check arguments against a tool's schema, applying declared defaults.
 */
export function validateArguments<S extends z.ZodTypeAny>(schema: S, args: unknown): ToolOutcome<z.output<S>> {
  const parsed = schema.safeParse(args ?? {});
  if (parsed.success) {
    return success(parsed.data);
  }

  const missingNames = parsed.error.issues
    .filter((issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined')
    .map((issue) => describePath(issue.path));
  const [firstMissing, ...otherMissing] = missingNames;
  if (firstMissing !== undefined) {
    return { kind: 'validation', error: new MissingArgumentError(firstMissing, ...otherMissing) };
  }

  const [issue] = parsed.error.issues;
  const argument = describePath(issue?.path ?? []);
  return invalid(`Invalid argument '${argument}': ${issue?.message ?? 'invalid value'}`, argument);
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<S extends z.ZodTypeAny>(descriptor: ToolDescriptor<S>, handler: ToolHandler<z.output<S>>): void {
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name);
    }

    this.tools.set(descriptor.name, {
      descriptor,
      execute: async (args) => {
        const validated = validateArguments(descriptor.input, args);
        return validated.kind === 'success' ? handler(validated.payload) : validated;
      },
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.descriptor);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Run a tool. Resolves with exactly one envelope or one normalized error;
   * rejects only with UnknownToolError.
   */
  async invoke(name: string, args: unknown): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    let outcome: ToolOutcome;
    try {
      outcome = await tool.execute(args);
    } catch (error) {
      outcome = classifyError(error);
    }

    if (outcome.kind === 'success') {
      return { ok: true, content: [wrap(outcome.payload)] };
    }
    return { ok: false, error: normalizeFailure(outcome, { tool: name }) };
  }
}
