import { type CatalogDocument, type InlineCatalogHandling } from '../contracts/catalog';
import { type JsonMap, type JsonValue } from '../entities/json';
import { CapabilityNegotiationError } from '../errors';

export const CAPABILITIES_VERSION = 'v0.9';

export interface ClientCapabilities {
  supportedCatalogIds: string[];
  inlineCatalogs?: CatalogDocument[];
}

export interface BuildClientCapabilitiesOptions {
  inlineHandling?: InlineCatalogHandling;
}

/**
 * Describes which catalogs this client can render.
 *
 * - `none`: advertise ids only; a catalog without an id is an error.
 * - `missingIds`: advertise ids, inline the catalogs that have none.
 * - `all`: inline every catalog.
 *
 * Inlined catalogs without an id receive `inline_catalog_<n>`.
 */
export function buildClientCapabilities(
  catalogs: Iterable<CatalogDocument>,
  options: BuildClientCapabilitiesOptions = {}
): ClientCapabilities {
  const inlineHandling = options.inlineHandling ?? 'missingIds';
  const supportedCatalogIds: string[] = [];
  const inlineCatalogs: CatalogDocument[] = [];
  let anonymous = 0;

  const inline = (catalog: CatalogDocument) => {
    if (catalog.catalogId !== undefined) {
      inlineCatalogs.push(catalog);
      return;
    }
    anonymous += 1;
    inlineCatalogs.push({ ...catalog, catalogId: `inline_catalog_${anonymous}` });
  };

  for (const catalog of catalogs) {
    if (inlineHandling === 'all') {
      inline(catalog);
      continue;
    }

    if (catalog.catalogId !== undefined) {
      supportedCatalogIds.push(catalog.catalogId);
      continue;
    }

    if (inlineHandling === 'none') {
      throw new CapabilityNegotiationError(
        "Catalog provided without a catalogId, but inlineHandling is 'none'"
      );
    }
    inline(catalog);
  }

  const capabilities: ClientCapabilities = { supportedCatalogIds };
  if (inlineCatalogs.length > 0) {
    capabilities.inlineCatalogs = inlineCatalogs;
  }
  return capabilities;
}

function catalogToJson(catalog: CatalogDocument): JsonMap {
  const json: JsonMap = { components: catalog.components };
  if (catalog.catalogId !== undefined) {
    json.catalogId = catalog.catalogId;
  }
  if (catalog.functions !== undefined) {
    json.functions = catalog.functions;
  }
  return json;
}

/** Wraps capabilities in the versioned envelope sent alongside client messages. */
export function toCapabilitiesJson(capabilities: ClientCapabilities): Record<string, JsonValue> {
  const body: JsonMap = { supportedCatalogIds: capabilities.supportedCatalogIds };
  if (capabilities.inlineCatalogs !== undefined) {
    body.inlineCatalogs = capabilities.inlineCatalogs.map(catalogToJson);
  }
  return { [CAPABILITIES_VERSION]: body };
}
