import { type JsonMap } from './json';

/**
 * A single node of a surface's UI tree.
 *
 * `component` is a kind-tagged property bundle, e.g. `{ Text: { text: 'Hi' } }`.
 * Interpreting the bundle is left to whatever renders the surface.
 */
export interface Component {
    id: string;
    component: Readonly<Record<string, JsonMap>>;
}

export interface UiDefinition {
    surfaceId: string;
    components: Readonly<Record<string, Component>>;
    rootComponentId?: string;
}

/** Returns the kind key of a component's property bundle, or undefined when it carries none. */
export function componentKind(component: Component): string | undefined {
    return Object.keys(component.component)[0];
}

export function createUiDefinition(surfaceId: string): UiDefinition {
    return { surfaceId, components: {} };
}
