import { defer, of, throwError, type Observable } from 'rxjs';
import { type z } from 'zod';
import { type ClientFunction, type ClientFunctionReturnType, type ExecutionContext } from './contracts';

interface FunctionDefinition<TArgs extends z.ZodTypeAny> {
  name: string;
  description: string;
  argumentSchema: TArgs;
  returnType?: ClientFunctionReturnType;
}

export function defineClientFunction<TArgs extends z.ZodTypeAny>(
  definition: FunctionDefinition<TArgs> & {
    execute: (args: z.infer<TArgs>, context: ExecutionContext) => Observable<unknown>;
  }
): ClientFunction<TArgs> {
  return {
    name: definition.name,
    description: definition.description,
    argumentSchema: definition.argumentSchema,
    returnType: definition.returnType ?? 'any',
    execute: definition.execute
  };
}

/**
 * Wraps a plain computation into a single-value stream. A throw becomes a
 * stream error so one failing binding never escapes into its caller.
 */
export function defineSynchronousFunction<TArgs extends z.ZodTypeAny>(
  definition: FunctionDefinition<TArgs> & {
    run: (args: z.infer<TArgs>, context: ExecutionContext) => unknown;
  }
): ClientFunction<TArgs> {
  return defineClientFunction({
    name: definition.name,
    description: definition.description,
    argumentSchema: definition.argumentSchema,
    returnType: definition.returnType ?? 'any',
    execute: (args, context) =>
      defer(() => {
        try {
          return of(definition.run(args, context));
        } catch (error) {
          return throwError(() => error);
        }
      })
  });
}
