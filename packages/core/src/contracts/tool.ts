import type { z } from 'zod';
import { type JsonMap } from '../entities/json';

/**
 * A capability the generating model can invoke. Parameters are described and
 * validated with zod; the handler resolves to a JSON payload sent back to the model.
 */
export interface Tool<TParameters extends z.ZodTypeAny = z.ZodTypeAny> {
    name: string;
    description: string;
    parameters: TParameters;
    before?(params: z.infer<TParameters>): Promise<z.infer<TParameters> | void>;
    handler(params: z.infer<TParameters>): Promise<JsonMap>;
    after?(params: z.infer<TParameters>, result: JsonMap): Promise<JsonMap | void>;
}

export type ToolLifecycleResult =
    | { status: 'ok'; result: JsonMap }
    | { status: 'recoverable_error'; formatted: string };

export function defineTool<TParameters extends z.ZodTypeAny>(tool: Tool<TParameters>): Tool<TParameters> {
    return tool;
}
