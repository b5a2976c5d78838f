import { zodToJsonSchema } from 'zod-to-json-schema';
import { isJsonMap, type JsonMap } from '@strata/core';
import { type ClientFunction, type ClientFunctionReturnType } from './contracts';

export interface FunctionDescription {
  name: string;
  description: string;
  returnType: ClientFunctionReturnType;
  parameters: JsonMap;
}

export class FunctionRegistry {
  private readonly functions = new Map<string, ClientFunction>();

  public constructor(functions: Iterable<ClientFunction> = []) {
    for (const fn of functions) {
      this.register(fn);
    }
  }

  /** Registers `fn`, replacing any function already registered under its name. */
  public register(fn: ClientFunction): this {
    this.functions.set(fn.name, fn);
    return this;
  }

  public get(name: string): ClientFunction | undefined {
    return this.functions.get(name);
  }

  public has(name: string): boolean {
    return this.functions.has(name);
  }

  public list(): ClientFunction[] {
    return [...this.functions.values()];
  }

  /** Describes every function for a generating model. */
  public describe(): FunctionDescription[] {
    return this.list().map((fn) => ({
      name: fn.name,
      description: fn.description,
      returnType: fn.returnType,
      parameters: toJsonMap(zodToJsonSchema(fn.argumentSchema, { $refStrategy: 'none' }))
    }));
  }
}

function toJsonMap(schema: object): JsonMap {
  const parsed: unknown = JSON.parse(JSON.stringify(schema));
  if (!isJsonMap(parsed)) return {};
  const { $schema: _ignored, ...rest } = parsed;
  return rest;
}
