/**
 * Function Registry
 *
 * Uniform calling convention over the Namecheap client: a discovery listing
 * of every function with its parameter schema, and call(name, params).
 */

import { z } from 'zod';
import pino from 'pino';
import { HttpError, InvalidParameterError, MissingParameterError, UnknownFunctionError } from '../lib/errors';
import { logger } from '../middleware/logging';
import { incFunctionCall } from '../metrics';
import { NamecheapClient } from '../providers/namecheap';

export type ParameterType =
  | 'string'
  | 'integer'
  | 'string[]'
  | 'host_record[]'
  | 'email_forward[]';

export interface ParameterDescriptor {
  name: string;
  type: ParameterType;
  required: boolean;
  description: string;
}

/**
 * Behavior hints for agents deciding whether a call is safe to make
 */
export interface FunctionAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint: boolean;
}

export interface FunctionDescriptor {
  name: string;
  title: string;
  description: string;
  parameters: ParameterDescriptor[];
  annotations: FunctionAnnotations;
}

export type FunctionParams = Record<string, unknown>;

/**
 * A descriptor bound to its schema and client operation
 */
export interface RegisteredFunction extends FunctionDescriptor {
  run(client: NamecheapClient, params: FunctionParams): Promise<unknown>;
}

export interface FunctionDefinition<S extends z.ZodTypeAny> extends FunctionDescriptor {
  schema: S;
  invoke(client: NamecheapClient, params: z.output<S>): Promise<unknown>;
}

/**
 * Bind a definition's schema to its operation.
 * Validation failures become InvalidParameter errors listing each offending field.
 */
export function defineFunction<S extends z.ZodTypeAny>(definition: FunctionDefinition<S>): RegisteredFunction {
  const { schema, invoke, ...descriptor } = definition;

  return {
    ...descriptor,
    async run(client, params) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        throw new InvalidParameterError(
          `Invalid parameters for ${descriptor.name}`,
          parsed.error.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
            code: e.code,
          }))
        );
      }
      return invoke(client, parsed.data);
    },
  };
}

function isPresent(params: FunctionParams, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(params, name) && params[name] !== undefined && params[name] !== null;
}

/**
 * Registry / Dispatcher
 */
export class FunctionRegistry {
  private functions = new Map<string, RegisteredFunction>();
  private client: NamecheapClient;
  private log: pino.Logger;

  constructor(client: NamecheapClient, definitions: RegisteredFunction[], log: pino.Logger = logger) {
    this.client = client;
    this.log = log.child({ component: 'functions' });

    for (const definition of definitions) {
      if (this.functions.has(definition.name)) {
        throw new Error(`Duplicate function name: ${definition.name}`);
      }
      this.functions.set(definition.name, definition);
    }
  }

  /**
   * Supported functions with their declared parameters
   */
  listFunctions(): FunctionDescriptor[] {
    return Array.from(this.functions.values()).map((fn) => ({
      name: fn.name,
      title: fn.title,
      description: fn.description,
      parameters: fn.parameters.map((p) => ({ ...p })),
      annotations: { ...fn.annotations },
    }));
  }

  /**
   * Validate params against the named function and run it
   *
   * @throws UnknownFunctionError if no function has that name
   * @throws MissingParameterError naming the first absent required parameter
   * @throws InvalidParameterError if a value does not match its schema
   * @throws ProviderRejectedError / TransportFailureError from the client, unchanged
   */
  async call(name: string, params: FunctionParams = {}): Promise<unknown> {
    const startTime = Date.now();

    try {
      const fn = this.functions.get(name);
      if (!fn) {
        throw new UnknownFunctionError(name);
      }

      const missing = fn.parameters.find((p) => p.required && !isPresent(params, p.name));
      if (missing) {
        throw new MissingParameterError(name, missing.name);
      }

      const result = await fn.run(this.client, params);

      incFunctionCall(name, 'ok');
      this.log.info({ event: 'function_call', function: name, outcome: 'ok', latency: Date.now() - startTime });
      return result;
    } catch (error) {
      const outcome = error instanceof HttpError ? error.name : 'InternalError';
      // Unknown names are caller-supplied; keep them out of metric labels
      incFunctionCall(this.functions.has(name) ? name : 'unknown', outcome);
      this.log.warn({
        event: 'function_call',
        function: name,
        outcome,
        latency: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
