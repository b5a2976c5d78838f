import { z } from 'zod';
import { MessageParseError } from '../errors';
import { type Component } from './component';
import { type JsonValue } from './json';

export const SURFACE_ID_KEY = 'surfaceId';

export interface SurfaceUpdateMessage {
    type: 'surfaceUpdate';
    surfaceId: string;
    components: Component[];
}

export interface BeginRenderingMessage {
    type: 'beginRendering';
    surfaceId: string;
    root: string;
}

export interface DataModelUpdateMessage {
    type: 'dataModelUpdate';
    surfaceId: string;
    path?: string | undefined;
    contents: JsonValue;
}

export interface SurfaceDeletionMessage {
    type: 'surfaceDeletion';
    surfaceId: string;
}

/** Messages a generator streams to the client to build and mutate surfaces. */
export type ServerMessage =
    | SurfaceUpdateMessage
    | BeginRenderingMessage
    | DataModelUpdateMessage
    | SurfaceDeletionMessage;

export type ServerMessageType = ServerMessage['type'];

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema)
    ])
);

export const JsonMapSchema = z.record(JsonValueSchema);

export const ComponentSchema = z.object({
    id: z.string().min(1),
    component: z.record(JsonMapSchema).refine(
        (bundle) => Object.keys(bundle).length === 1,
        { message: 'component must carry exactly one kind key' }
    )
});

export const SurfaceUpdatePayloadSchema = z.object({
    surfaceId: z.string().min(1),
    components: z.array(ComponentSchema)
});

export const BeginRenderingPayloadSchema = z.object({
    surfaceId: z.string().min(1),
    root: z.string().min(1)
});

export const DataModelUpdatePayloadSchema = z.object({
    surfaceId: z.string().min(1),
    path: z.string().optional(),
    contents: JsonValueSchema
});

export const SurfaceDeletionPayloadSchema = z.object({
    surfaceId: z.string().min(1)
});

const WireMessageSchema = z.union([
    z.object({ surfaceUpdate: SurfaceUpdatePayloadSchema }).strict(),
    z.object({ beginRendering: BeginRenderingPayloadSchema }).strict(),
    z.object({ dataModelUpdate: DataModelUpdatePayloadSchema }).strict(),
    z.object({ surfaceDeletion: SurfaceDeletionPayloadSchema }).strict()
]);

export type WireMessage = z.infer<typeof WireMessageSchema>;

/**
 * Parses a wire envelope such as `{ "beginRendering": { ... } }` into a tagged message.
 */
export function parseServerMessage(json: unknown): ServerMessage {
    const parsed = WireMessageSchema.safeParse(json);
    if (!parsed.success) {
        throw new MessageParseError(parsed.error.message);
    }

    const wire = parsed.data;
    if ('surfaceUpdate' in wire) {
        return { type: 'surfaceUpdate', ...wire.surfaceUpdate };
    }
    if ('beginRendering' in wire) {
        return { type: 'beginRendering', ...wire.beginRendering };
    }
    if ('dataModelUpdate' in wire) {
        const { surfaceId, path, contents } = wire.dataModelUpdate;
        const message: DataModelUpdateMessage = { type: 'dataModelUpdate', surfaceId, contents };
        if (path !== undefined) {
            message.path = path;
        }
        return message;
    }
    return { type: 'surfaceDeletion', ...wire.surfaceDeletion };
}

export function toWireMessage(message: ServerMessage): WireMessage {
    switch (message.type) {
        case 'surfaceUpdate':
            return { surfaceUpdate: { surfaceId: message.surfaceId, components: message.components } };
        case 'beginRendering':
            return { beginRendering: { surfaceId: message.surfaceId, root: message.root } };
        case 'dataModelUpdate': {
            const payload: z.infer<typeof DataModelUpdatePayloadSchema> = {
                surfaceId: message.surfaceId,
                contents: message.contents
            };
            if (message.path !== undefined) {
                payload.path = message.path;
            }
            return { dataModelUpdate: payload };
        }
        case 'surfaceDeletion':
            return { surfaceDeletion: { surfaceId: message.surfaceId } };
    }
}
