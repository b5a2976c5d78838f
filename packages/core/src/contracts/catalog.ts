import { type JsonMap } from '../entities/json';

/**
 * A component catalog as advertised to a generator. `components` maps each
 * component kind to the JSON Schema of its properties.
 */
export interface CatalogDocument {
    catalogId?: string;
    components: Record<string, JsonMap>;
    functions?: Record<string, JsonMap>;
}

export type InlineCatalogHandling = 'none' | 'missingIds' | 'all';
