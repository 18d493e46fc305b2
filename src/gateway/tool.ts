/**
 * Tool builder
 *
 * One generic handler shape for every provider-backed tool: validated
 * arguments in, one provider call (or one drained listing) out, an optional
 * post-processing step, and an outcome back to the registry. Services declare
 * their tools as data on top of this instead of repeating the control flow.
 */

import { z } from 'zod';
import { drainPages, Page } from './pagination.js';
import {
  attempt,
  OperationMap,
  OperationName,
  ProviderClient,
  stripMetadata,
} from './provider.js';
import { andThen, success, ToolOutcome } from './outcome.js';
import { defineTool, ToolDescriptor, ToolHandler, ToolRegistry } from './registry.js';

type Args<Shape extends z.ZodRawShape> = z.output<z.ZodObject<Shape>>;

type Respond<Output, A> = (output: Output, args: A) => ToolOutcome | Promise<ToolOutcome>;

export class ToolFactory<Ops extends OperationMap<Ops>> {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly provider: ProviderClient<Ops>
  ) {}

  /**
   * Call one provider operation, capturing failure as an outcome
   */
  call<K extends OperationName<Ops>>(operation: K, input: Ops[K]['input']): Promise<ToolOutcome<Ops[K]['output']>> {
    return attempt(() => this.provider.call(operation, input));
  }

  /**
   * Call a paged operation until the provider reports no further page
   */
  drain<K extends OperationName<Ops>, T>(
    operation: K,
    request: (cursor: string | undefined) => Ops[K]['input'],
    page: (output: Ops[K]['output']) => Page<T>
  ): Promise<ToolOutcome<T[]>> {
    return drainPages(async (cursor) => {
      const result = await this.call(operation, request(cursor));
      return result.kind === 'success' ? success(page(result.payload)) : result;
    });
  }

  tool<Shape extends z.ZodRawShape>(name: string, description: string, shape: Shape): ToolBuilder<Ops, Shape> {
    return new ToolBuilder(this, this.registry, defineTool(name, description, shape));
  }
}

export class ToolBuilder<Ops extends OperationMap<Ops>, Shape extends z.ZodRawShape> {
  constructor(
    private readonly factory: ToolFactory<Ops>,
    private readonly registry: ToolRegistry,
    private readonly descriptor: ToolDescriptor<z.ZodObject<Shape>>
  ) {}

  /**
   * Register a handler written out by hand (multi-step or local I/O tools)
   */
  handle(handler: ToolHandler<Args<Shape>>): void {
    this.registry.register(this.descriptor, handler);
  }

  /**
   * Register a single-call tool. Without `respond` the payload is the
   * response minus SDK metadata.
   */
  call<K extends OperationName<Ops>>(
    operation: K,
    request: (args: Args<Shape>) => Ops[K]['input'],
    respond: Respond<Ops[K]['output'], Args<Shape>> = (output) => success(stripMetadata(output))
  ): void {
    this.handle(async (args) => {
      const result = await this.factory.call(operation, request(args));
      return andThen(result, (output) => respond(output, args));
    });
  }

  /**
   * Register a listing tool that drains every page before responding.
   */
  drain<K extends OperationName<Ops>, T>(
    operation: K,
    request: (args: Args<Shape>, cursor: string | undefined) => Ops[K]['input'],
    page: (output: Ops[K]['output']) => Page<T>,
    respond: Respond<T[], Args<Shape>> = (items) => success(items)
  ): void {
    this.handle(async (args) => {
      const result = await this.factory.drain(operation, (cursor) => request(args, cursor), page);
      return andThen(result, (items) => respond(items, args));
    });
  }
}
