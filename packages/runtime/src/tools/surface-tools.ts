import { z } from 'zod';
import {
  BeginRenderingPayloadSchema,
  DataModelUpdatePayloadSchema,
  SURFACE_ID_KEY,
  SurfaceDeletionPayloadSchema,
  SurfaceUpdatePayloadSchema,
  defineTool,
  type ActionsConfig,
  type DataModelUpdateMessage,
  type ServerMessage,
  type Tool
} from '@strata/core';

export interface SurfaceToolsInput {
  handleMessage: (message: ServerMessage) => void;
  config: { actions: ActionsConfig };
}

const surfaceUpdateParameters = SurfaceUpdatePayloadSchema.describe(
  'Components to add to a surface. Components with an existing id are replaced.'
);

const beginRenderingParameters = BeginRenderingPayloadSchema.extend({
  root: z.string().min(1).describe('Id of the root component. It must match one of the surface components.')
});

const deleteSurfaceParameters = SurfaceDeletionPayloadSchema.extend({
  surfaceId: z.string().min(1).describe('The unique identifier for the UI surface to remove.')
});

const dataModelUpdateParameters = DataModelUpdatePayloadSchema.extend({
  path: z.string().optional().describe('Path to write, e.g. /user/name. Omit to replace the whole data model.')
});

/**
 * Builds the tools a generating model uses to drive surfaces. Each tool turns
 * its arguments into a protocol message and hands it to `handleMessage`.
 */
export function createSurfaceTools(input: SurfaceToolsInput): Tool[] {
  const { actions } = input.config;
  const tools: Tool[] = [];

  if (actions.allowCreate || actions.allowUpdate) {
    tools.push(defineTool({
      name: 'surfaceUpdate',
      description: 'Updates a surface with a new set of components.',
      parameters: surfaceUpdateParameters,
      handler: async ({ surfaceId, components }) => {
        input.handleMessage({ type: 'surfaceUpdate', surfaceId, components });
        return { [SURFACE_ID_KEY]: surfaceId, status: 'ok' };
      }
    }));

    tools.push(defineTool({
      name: 'beginRendering',
      description: 'Signals the client to begin rendering a surface with a root component.',
      parameters: beginRenderingParameters,
      handler: async ({ surfaceId, root }) => {
        input.handleMessage({ type: 'beginRendering', surfaceId, root });
        return { [SURFACE_ID_KEY]: surfaceId, status: 'ok' };
      }
    }));
  }

  if (actions.allowDelete) {
    tools.push(defineTool({
      name: 'deleteSurface',
      description: 'Removes a UI surface that is no longer needed.',
      parameters: deleteSurfaceParameters,
      handler: async ({ surfaceId }) => {
        input.handleMessage({ type: 'surfaceDeletion', surfaceId });
        return { [SURFACE_ID_KEY]: surfaceId, status: 'ok' };
      }
    }));
  }

  if (actions.allowDataUpdate) {
    tools.push(defineTool({
      name: 'dataModelUpdate',
      description: 'Updates the data model of a surface.',
      parameters: dataModelUpdateParameters,
      handler: async ({ surfaceId, path, contents }) => {
        const message: DataModelUpdateMessage = { type: 'dataModelUpdate', surfaceId, contents };
        if (path !== undefined) {
          message.path = path;
        }
        input.handleMessage(message);
        return { [SURFACE_ID_KEY]: surfaceId, status: 'ok' };
      }
    }));
  }

  return tools;
}

/** Instruction text telling the model how to use the surface tools. */
export function buildSurfaceToolsPrompt(toolNames: readonly string[], rootComponentId = 'root'): string {
  const toolDescription = toolNames.length > 1
    ? `the following UI generation tools: ${toolNames.map((name) => `"${name}"`).join(', ')}`
    : `the UI generation tool "${toolNames[0] ?? 'surfaceUpdate'}"`;

  return [
    `To show generated UI, use ${toolDescription}.`,
    `When generating UI, always provide a unique ${SURFACE_ID_KEY} to identify the UI surface:`,
    '',
    `* To create new UI, use a new ${SURFACE_ID_KEY}.`,
    `* To update existing UI, use the existing ${SURFACE_ID_KEY}.`,
    '',
    `Use the root component id: '${rootComponentId}'.`,
    `Ensure one of the generated components has an id of '${rootComponentId}'.`,
    ''
  ].join('\n');
}
